// Serializable transactions
//
// Catalog writes check the store (alias chains, the next credit index) and
// then write what the check allowed. Under SERIALIZABLE isolation Postgres
// aborts one of two transactions whose checks and writes interleave, with
// SQLSTATE 40001 (or 40P01 on a deadlock). The aborted one is run again from
// the start, so it sees the winner's commit.

const RETRYABLE_SQLSTATES = new Set(['40001', '40P01']);

export const DEFAULT_MAX_TRANSACTION_ATTEMPTS = 5;

function sqlState(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  return sqlState(error.cause);
}

/**
 * Check whether an error is a serialization failure or deadlock that a
 * fresh attempt can resolve.
 */
export function isSerializationFailure(error: unknown): boolean {
  const state = sqlState(error);
  return state !== undefined && RETRYABLE_SQLSTATES.has(state);
}

/**
 * Run a transaction, starting it again after a serialization failure.
 *
 * @param run Starts one complete transaction
 * @param maxAttempts Attempts before the last failure is rethrown
 */
export async function retrySerializable<T>(
  run: () => Promise<T>,
  maxAttempts: number = DEFAULT_MAX_TRANSACTION_ATTEMPTS
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await run();
    } catch (error) {
      if (attempt >= maxAttempts || !isSerializationFailure(error)) {
        throw error;
      }
    }
  }
}
