import type { Id, Identity, IdentityMatch, SearchOptions } from '@archivist/protocol';

/**
 * Input for creating a new Identity
 */
export type CreateIdentityRecord = {
  id?: Id;
  name: string;
  aliasOfId?: Id | null;
};

/**
 * Changes to an Identity. The id never changes.
 */
export type UpdateIdentityRecord = {
  name?: string;
  aliasOfId?: Id | null;
};

/**
 * Repository interface for credited people and organizations.
 *
 * The repository stores alias-of links as given; keeping them acyclic is
 * the job of the identity graph, which checks every link change before it
 * reaches the store.
 */
export interface IdentityRepository {
  /**
   * Create a new Identity
   */
  create(input: CreateIdentityRecord): Promise<Identity>;

  /**
   * Get an Identity by ID
   */
  get(id: Id): Promise<Identity | null>;

  /**
   * Get the Identity with an exact name (lowest id when names repeat)
   */
  getByName(name: string): Promise<Identity | null>;

  /**
   * Identities whose alias-of target is one of the given ids, ordered by id
   */
  listAliasesOf(targetIds: Id[]): Promise<Identity[]>;

  /**
   * Update an Identity
   * @returns The updated identity, or null if it does not exist
   */
  update(id: Id, input: UpdateIdentityRecord): Promise<Identity | null>;

  /**
   * Identities whose name matches a pattern, one row per distinct credited
   * role (role null when uncredited), ordered by name then id
   */
  search(pattern: string, options?: SearchOptions): Promise<IdentityMatch[]>;
}
