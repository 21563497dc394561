// Tests for serializable transaction retries

import { describe, it, expect, vi } from 'vitest';
import { retrySerializable, isSerializationFailure } from './retry.js';

function pgError(code: string, message = 'could not serialize access'): Error {
  return Object.assign(new Error(message), { code });
}

describe('isSerializationFailure', () => {
  it('accepts serialization failures and deadlocks', () => {
    expect(isSerializationFailure(pgError('40001'))).toBe(true);
    expect(isSerializationFailure(pgError('40P01', 'deadlock detected'))).toBe(true);
  });

  it('looks through a wrapping error', () => {
    const wrapped = new Error('Failed query', { cause: pgError('40001') });
    expect(isSerializationFailure(wrapped)).toBe(true);
  });

  it('rejects other errors', () => {
    expect(isSerializationFailure(pgError('23505', 'duplicate key value'))).toBe(false);
    expect(isSerializationFailure(new Error('connection reset'))).toBe(false);
    expect(isSerializationFailure('40001')).toBe(false);
  });
});

describe('retrySerializable', () => {
  it('runs the transaction again after a serialization failure', async () => {
    const run = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(pgError('40001'))
      .mockResolvedValueOnce('committed');

    await expect(retrySerializable(run)).resolves.toBe('committed');
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('rethrows other errors without retrying', async () => {
    const run = vi.fn<() => Promise<string>>().mockRejectedValue(pgError('23505', 'duplicate key value'));

    await expect(retrySerializable(run)).rejects.toThrow('duplicate key value');
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('gives up after the attempt limit', async () => {
    const run = vi.fn<() => Promise<string>>().mockRejectedValue(pgError('40001'));

    await expect(retrySerializable(run, 3)).rejects.toThrow('could not serialize access');
    expect(run).toHaveBeenCalledTimes(3);
  });
});
