// @archivist/repositories
// Repository interfaces and implementations for catalog storage.
//
// The interfaces define WHAT operations the catalog needs; the Postgres and
// in-memory implementations fulfill them, so the runtime works against
// either store unchanged.

export * from './interfaces/index.js';
export * as postgres from './postgres/index.js';
export {
  createInMemoryRepositoryContext,
  InMemoryConstraintError,
  likeToRegExp,
  matchesLike,
  createLikeMatcher,
  type InMemoryDataStore,
  type InMemoryRepositoryContext,
} from './in-memory/index.js';
