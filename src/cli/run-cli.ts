/**
 * src/cli/run-cli.ts
 *
 * WHY:
 * - Operators need to hash a password for a seed account, check a stored hash,
 *   or see which parameters a stored hash was made with, without writing code.
 * - Kept apart from src/index.ts so tests drive it with fake IO.
 *
 * HOW TO USE:
 *   echo -n 'secret' | credential-hasher hash [algorithm]
 *   echo -n 'secret' | credential-hasher verify '<encoded>'
 *   credential-hasher decode '<encoded>'
 *   credential-hasher needs-rehash '<encoded>'
 *
 * RULES:
 * - The password is only ever read from stdin (keeps it out of argv / shell history).
 * - decode prints parameters only, never salt or hash bytes.
 */

import {
  type CredentialService,
  type DecodedHash,
  isCredentialError,
} from '../modules/credentials';

export type CliIo = {
  readPassword: () => Promise<string>;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

export const EXIT_CODES = {
  ok: 0,
  noMatch: 1,
  failure: 2,
  usage: 64,
} as const;

export const USAGE = [
  'usage: credential-hasher <command> [args]',
  '',
  '  hash [algorithm]        hash the password read from stdin',
  '  verify <encoded>        check the password read from stdin (exit 0 match, 1 no match)',
  '  decode <encoded>        print the algorithm and parameters of an encoded hash',
  '  needs-rehash <encoded>  print "yes" when the hash differs from the current configuration',
].join('\n');

function describe(decoded: DecodedHash): Record<string, unknown> {
  const { algorithm, version, params } = decoded;
  return version === undefined ? { algorithm, params } : { algorithm, version, params };
}

export async function runCli(
  argv: readonly string[],
  deps: { service: CredentialService; io: CliIo },
): Promise<number> {
  const { service, io } = deps;
  const [command, arg, ...extra] = argv;

  if (command === 'help' || command === '--help' || command === '-h') {
    io.stdout(USAGE);
    return EXIT_CODES.ok;
  }

  const needsArg = command === 'verify' || command === 'decode' || command === 'needs-rehash';
  if (extra.length > 0 || (needsArg && arg === undefined)) {
    io.stderr(USAGE);
    return EXIT_CODES.usage;
  }

  try {
    switch (command) {
      case 'hash': {
        const password = await io.readPassword();
        const encoded =
          arg === undefined ? await service.hash(password) : await service.hashWith(arg, password);
        io.stdout(encoded);
        return EXIT_CODES.ok;
      }

      case 'verify': {
        const password = await io.readPassword();
        const match = await service.verify(password, arg ?? '');
        io.stdout(match ? 'match' : 'no match');
        return match ? EXIT_CODES.ok : EXIT_CODES.noMatch;
      }

      case 'decode': {
        io.stdout(JSON.stringify(describe(service.decode(arg ?? ''))));
        return EXIT_CODES.ok;
      }

      case 'needs-rehash': {
        const stale = await service.needsRehash(arg ?? '');
        io.stdout(stale ? 'yes' : 'no');
        return EXIT_CODES.ok;
      }

      default:
        io.stderr(USAGE);
        return EXIT_CODES.usage;
    }
  } catch (err: unknown) {
    if (!isCredentialError(err)) throw err;

    io.stderr(`error: ${err.code} ${err.message}`);
    return EXIT_CODES.failure;
  }
}
