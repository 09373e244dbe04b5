import { describe, it, expect } from 'vitest';
import { constantTimeEqual } from '../../../../src/shared/security/constant-time';

describe('constantTimeEqual', () => {
  it('true for identical bytes', () => {
    expect(constantTimeEqual(Buffer.from([1, 2, 3]), Buffer.from([1, 2, 3]))).toBe(true);
  });

  it('false when the last byte differs', () => {
    expect(constantTimeEqual(Buffer.from([1, 2, 3]), Buffer.from([1, 2, 4]))).toBe(false);
  });

  it('false when the first byte differs', () => {
    expect(constantTimeEqual(Buffer.from([9, 2, 3]), Buffer.from([1, 2, 3]))).toBe(false);
  });

  it('false (without throwing) for different lengths', () => {
    expect(constantTimeEqual(Buffer.from([1, 2, 3]), Buffer.from([1, 2]))).toBe(false);
    expect(constantTimeEqual(Buffer.from([1, 2]), Buffer.from([1, 2, 3]))).toBe(false);
  });

  it('true for two empty inputs', () => {
    expect(constantTimeEqual(Buffer.alloc(0), Buffer.alloc(0))).toBe(true);
  });
});
