import type { Id, Timestamp } from './common.js';
import type { AuthorRole } from './associations.js';
import type { Platform } from './manifest.js';

/**
 * Maps a path prefix to the platform shown in the manifest banner.
 */
export type PlatformPrefix = {
  prefix: string;
  platform: Platform;
};

/**
 * Catalog configuration. Every field has a default.
 */
export type CatalogConfig = {
  /** Upper bound on alias-of hops walked before the graph is considered corrupt (default: 65535) */
  maxAliasHops?: number;

  /** Path prefixes that select a platform (default: 'pcw/' → PCW) */
  platformPrefixes?: PlatformPrefix[];

  /** Platform used when no prefix matches (default: 'CPC') */
  defaultPlatform?: Platform;

  /** Host named in the manifest banner (default: 'FTP.NVG.NTNU.NO') */
  archiveHost?: string;

  /** Whether to record audit entries (default: true) */
  auditEnabled?: boolean;

  /** Callback for audit entries (e.g., for external logging) */
  onAudit?: (entry: AuditEntry) => void | Promise<void>;
};

/**
 * Operations exposed by the catalog write boundary.
 */
export type CatalogOperationType =
  | 'create_entry'
  | 'update_entry'
  | 'delete_entry'
  | 'add_title_alias'
  | 'remove_title_aliases'
  | 'add_credit'
  | 'remove_credits'
  | 'create_identity'
  | 'set_alias_of'
  | 'rename_identity'
  | 'add_language'
  | 'update_language'
  | 'delete_language'
  | 'add_type_category'
  | 'add_publication_category';

export type CatalogResourceType =
  | 'entry'
  | 'title_alias'
  | 'association'
  | 'identity'
  | 'language'
  | 'type_category'
  | 'publication_category';

/**
 * Record of one catalog write, successful or not.
 */
export type AuditEntry = {
  id: string;
  timestamp: Timestamp;
  operationType: CatalogOperationType;
  resourceType: CatalogResourceType;
  resourceId?: string;
  details: Record<string, unknown>;
  success: boolean;
  error?: string;
  durationMs: number;
};

/**
 * Options for title and identity searches.
 */
export type SearchOptions = {
  /** Match letters with and without diacritics alike, 'e' matching 'é' (default: false) */
  ignoreDiacritics?: boolean;
};

/**
 * Row returned by a path search.
 */
export type PathMatch = {
  entryId: Id;
  path: string;
};

/**
 * Row returned by a title search; `isAlias` marks title aliases.
 */
export type TitleMatch = {
  entryId: Id;
  title: string;
  isAlias: boolean;
};

/**
 * Row returned by an identity search, one per distinct (identity, role).
 * `role` is null for identities with no credits.
 */
export type IdentityMatch = {
  identityId: Id;
  name: string;
  aliasOfId: Id | null;
  role: AuthorRole | null;
};

/**
 * An entry credited to an identity.
 */
export type CreditedTitle = {
  entryId: Id;
  title: string | null;
  role: AuthorRole;
};
