// Catalog - The Commit Boundary
//
// All catalog mutations go through the Catalog, which wraps each write in a
// transaction, validates it and records an audit entry.

export { Catalog, createCatalog, type CatalogOptions, type RemoveCreditsFilter } from './catalog.js';

export {
  createInMemoryAuditStore,
  type AuditStore,
  type AuditQueryOptions,
  type AuditQueryFilter,
} from './audit.js';
