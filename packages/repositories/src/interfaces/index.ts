// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  EntryRepository,
  CreateEntryRecord,
  UpdateEntryRecord,
} from './entry-repository.js';

export type { TitleAliasRepository } from './title-alias-repository.js';

export type {
  IdentityRepository,
  CreateIdentityRecord,
  UpdateIdentityRecord,
} from './identity-repository.js';

export type {
  AssociationRepository,
  AssociationFilter,
} from './association-repository.js';

export type {
  ReferenceRepository,
  CreateCategoryRecord,
} from './reference-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
