#!/usr/bin/env node
/**
 * src/index.ts
 *
 * WHY:
 * - Single entrypoint: load config -> build deps -> run the command -> exit code.
 */

import { buildConfig } from './app/config';
import { buildDeps } from './app/di';
import { runCli } from './cli/run-cli';
import { logger } from './shared/logger/logger';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
  }

  // `echo` adds one trailing newline; it is not part of the password.
  return Buffer.concat(chunks).toString('utf8').replace(/\r?\n$/, '');
}

async function main(): Promise<void> {
  const config = buildConfig();
  const deps = buildDeps(config);

  process.exitCode = await runCli(process.argv.slice(2), {
    service: deps.credentials.service,
    io: {
      readPassword: readStdin,
      stdout: (line) => process.stdout.write(`${line}\n`),
      stderr: (line) => process.stderr.write(`${line}\n`),
    },
  });
}

void main().catch((err: unknown) => {
  logger.error('cli.fatal_error', { err });
  process.exit(1);
});
