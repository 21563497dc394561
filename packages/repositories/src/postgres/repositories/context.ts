import type { Database } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgEntryRepository } from './entry-repository.js';
import { PgTitleAliasRepository } from './title-alias-repository.js';
import { PgIdentityRepository } from './identity-repository.js';
import { PgAssociationRepository } from './association-repository.js';
import { PgReferenceRepository } from './reference-repository.js';
import { retrySerializable, DEFAULT_MAX_TRANSACTION_ATTEMPTS } from './retry.js';

/**
 * Options for a transactional Postgres context.
 */
export type PgTransactionOptions = {
  /** Attempts per transaction before a serialization failure is rethrown (default: 5) */
  maxAttempts?: number;
};

function createRepositories(db: Database): RepositoryContext {
  return {
    entries: new PgEntryRepository(db),
    titleAliases: new PgTitleAliasRepository(db),
    identities: new PgIdentityRepository(db),
    associations: new PgAssociationRepository(db),
    reference: new PgReferenceRepository(db),
  };
}

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase(loadDatabaseConfig());
 * const repos = createPgRepositoryContext(db);
 *
 * const entry = await repos.entries.getByPath('games/arcade/rolanrop.zip');
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return createRepositories(db);
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * await repos.transaction(async (txRepos) => {
 *   const entry = await txRepos.entries.create({ path: 'games/arcade/rolanrop.zip' });
 *   await txRepos.titleAliases.add({ entryId: entry.id, title: 'Roland in the Ring' });
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database,
  options: PgTransactionOptions = {}
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(
    db,
    options.maxAttempts ?? DEFAULT_MAX_TRANSACTION_ATTEMPTS
  );
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly entries: PgEntryRepository;
  readonly titleAliases: PgTitleAliasRepository;
  readonly identities: PgIdentityRepository;
  readonly associations: PgAssociationRepository;
  readonly reference: PgReferenceRepository;

  constructor(
    private db: Database,
    private maxAttempts: number
  ) {
    this.entries = new PgEntryRepository(db);
    this.titleAliases = new PgTitleAliasRepository(db);
    this.identities = new PgIdentityRepository(db);
    this.associations = new PgAssociationRepository(db);
    this.reference = new PgReferenceRepository(db);
  }

  /**
   * Execute a function within a SERIALIZABLE database transaction.
   *
   * Checks made inside the function (alias cycles, next credit index) hold
   * at commit: a concurrent transaction that would invalidate them makes one
   * side fail with a serialization error, and that side runs again. The
   * function may therefore be called more than once.
   *
   * @param fn Function to execute within the transaction
   * @returns The return value of the function
   * @throws Rolls back the transaction and rethrows if the function throws
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    return retrySerializable(
      () =>
        this.db.transaction(
          async (tx) => {
            // Drizzle's transaction handle exposes the same query API as the database
            const txDb = tx as unknown as Database;
            return fn(createRepositories(txDb));
          },
          { isolationLevel: 'serializable' }
        ),
      this.maxAttempts
    );
  }
}
