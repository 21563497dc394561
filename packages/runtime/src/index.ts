// @archivist/runtime
// Identity graph, version inference, validation and manifest rendering

// Catalog (the commit boundary for every write)
export {
  Catalog,
  createCatalog,
  createInMemoryAuditStore,
  type CatalogOptions,
  type RemoveCreditsFilter,
  type AuditStore,
  type AuditQueryOptions,
  type AuditQueryFilter,
} from './catalog/index.js';

// Error types
export {
  CatalogError,
  ValidationError,
  CycleError,
  NotFoundError,
  RenderError,
  type ValidationRule,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type CatalogLogger,
  type LogEntry,
  type LogLevel,
  type LogData,
} from './logging.js';

// Identity graph
export {
  DEFAULT_MAX_ALIAS_HOPS,
  resolveRoot,
  aliasesOf,
  assertNoAliasCycle,
  findOrCreateIdentity,
} from './identities/index.js';

// Version inference
export {
  inferVersion,
  fieldVersion,
  loadVersionFacts,
  NO_VERSION_FACTS,
  type VersionFacts,
  type VersionedFields,
} from './versions/index.js';

// Field validation
export {
  VALID_MEMORY_SIZES,
  parseInput,
  validateLanguages,
  validateEntryFields,
  assertCreditsAllowed,
} from './validation/index.js';

// Credits
export {
  CREDIT_SEPARATOR,
  nextIndex,
  orderedAssociations,
  joinNamesForRole,
  namesForRole,
} from './associations/index.js';

// Manifest rendering and reading
export {
  renderManifest,
  platformFor,
  formatUploaded,
  resolveEntry,
  toEntryInfo,
  readManifest,
  DEFAULT_PLATFORM_PREFIXES,
  DEFAULT_RENDER_OPTIONS,
  MANIFEST_FIELDS,
  MANDATORY_FIELDS,
  type RenderOptions,
  type EntryInfo,
  type ManifestDocument,
  type ManifestReadResult,
  type ManifestWarning,
  type ManifestWarningCode,
  type ManifestFieldSpec,
} from './manifest/index.js';

// Search
export { searchPaths, searchTitles, searchIdentities } from './search/index.js';
