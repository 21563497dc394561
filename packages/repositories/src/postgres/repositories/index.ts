export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
  type PgTransactionOptions,
} from './context.js';
export {
  retrySerializable,
  isSerializationFailure,
  DEFAULT_MAX_TRANSACTION_ATTEMPTS,
} from './retry.js';
export { PgEntryRepository } from './entry-repository.js';
export { PgTitleAliasRepository } from './title-alias-repository.js';
export { PgIdentityRepository } from './identity-repository.js';
export { PgAssociationRepository } from './association-repository.js';
export { PgReferenceRepository } from './reference-repository.js';
