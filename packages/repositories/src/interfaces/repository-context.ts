import type { EntryRepository } from './entry-repository.js';
import type { TitleAliasRepository } from './title-alias-repository.js';
import type { IdentityRepository } from './identity-repository.js';
import type { AssociationRepository } from './association-repository.js';
import type { ReferenceRepository } from './reference-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to any code that needs data access,
 * and you can swap implementations (Postgres, in-memory, etc.)
 * without changing the consuming code.
 */
export interface RepositoryContext {
  readonly entries: EntryRepository;
  readonly titleAliases: TitleAliasRepository;
  readonly identities: IdentityRepository;
  readonly associations: AssociationRepository;
  readonly reference: ReferenceRepository;
}

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a transaction.
   * All repository operations within the function will be atomic.
   *
   * @param fn Function to execute within the transaction
   * @returns The return value of the function
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
