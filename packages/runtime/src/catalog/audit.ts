// Catalog Audit Store
//
// Stores audit entries for all Catalog write operations.
// In production, this would be backed by a database.
// For testing and development, an in-memory store is provided.

import type { AuditEntry, CatalogOperationType, CatalogResourceType } from '@archivist/protocol';

/**
 * Interface for storing and querying audit entries.
 */
export interface AuditStore {
  /**
   * Append an audit entry.
   */
  append(entry: AuditEntry): Promise<void>;

  /**
   * Get an audit entry by ID.
   */
  get(id: string): Promise<AuditEntry | null>;

  /**
   * Query audit entries by resource.
   */
  getByResource(
    resourceType: CatalogResourceType,
    resourceId: string,
    options?: AuditQueryOptions
  ): Promise<AuditEntry[]>;

  /**
   * Query all audit entries with optional filters.
   */
  query(filter?: AuditQueryFilter): Promise<AuditEntry[]>;
}

/**
 * Options for querying audit entries.
 */
export type AuditQueryOptions = {
  /** Maximum entries to return */
  limit?: number;

  /** Offset for pagination */
  offset?: number;

  /** Start time filter */
  since?: string;

  /** End time filter */
  until?: string;
};

/**
 * Filter for audit queries.
 */
export type AuditQueryFilter = AuditQueryOptions & {
  resourceType?: CatalogResourceType;
  resourceId?: string;
  operationType?: CatalogOperationType;
  success?: boolean;
};

/**
 * Create an in-memory audit store for testing and development.
 *
 * This store keeps all entries in memory and is not persisted.
 * For production use, implement AuditStore backed by a database.
 */
export function createInMemoryAuditStore(): AuditStore {
  const entries: AuditEntry[] = [];

  return {
    async append(entry: AuditEntry): Promise<void> {
      entries.push(entry);
    },

    async get(id: string): Promise<AuditEntry | null> {
      return entries.find((e) => e.id === id) ?? null;
    },

    async getByResource(
      resourceType: CatalogResourceType,
      resourceId: string,
      options?: AuditQueryOptions
    ): Promise<AuditEntry[]> {
      return filterAndPaginate(
        entries.filter((e) => e.resourceType === resourceType && e.resourceId === resourceId),
        options
      );
    },

    async query(filter?: AuditQueryFilter): Promise<AuditEntry[]> {
      let result = [...entries];

      if (filter?.resourceType) {
        result = result.filter((e) => e.resourceType === filter.resourceType);
      }

      if (filter?.resourceId) {
        result = result.filter((e) => e.resourceId === filter.resourceId);
      }

      if (filter?.operationType) {
        result = result.filter((e) => e.operationType === filter.operationType);
      }

      if (filter?.success !== undefined) {
        result = result.filter((e) => e.success === filter.success);
      }

      return filterAndPaginate(result, filter);
    },
  };
}

/**
 * Apply time filtering and pagination to a list of audit entries.
 */
function filterAndPaginate(entries: AuditEntry[], options?: AuditQueryOptions): AuditEntry[] {
  let result = entries;

  if (options?.since) {
    const since = new Date(options.since);
    result = result.filter((e) => new Date(e.timestamp) >= since);
  }

  if (options?.until) {
    const until = new Date(options.until);
    result = result.filter((e) => new Date(e.timestamp) <= until);
  }

  // Most recent first; ties go to the later append
  result = result
    .map((entry, position) => ({ entry, position }))
    .sort(
      (a, b) =>
        new Date(b.entry.timestamp).getTime() - new Date(a.entry.timestamp).getTime() ||
        b.position - a.position
    )
    .map(({ entry }) => entry);

  if (options?.offset) {
    result = result.slice(options.offset);
  }

  if (options?.limit) {
    result = result.slice(0, options.limit);
  }

  return result;
}
