import type {
  Id,
  Association,
  AuthorRole,
  CreditedName,
  CreditedTitle,
} from '@archivist/protocol';

/**
 * Filter for removing associations of an entry
 */
export type AssociationFilter = {
  entryId: Id;
  identityId?: Id;
  role?: AuthorRole;
};

/**
 * Repository interface for credits linking identities to entries.
 *
 * (entry, identity, role) and (entry, role, index) are both unique.
 */
export interface AssociationRepository {
  /**
   * Store a credit with its index already assigned
   */
  create(association: Association): Promise<Association>;

  /**
   * Get the credit of an identity under a role on an entry
   */
  find(entryId: Id, identityId: Id, role: AuthorRole): Promise<Association | null>;

  /**
   * Get the credit stored at a position
   */
  findAt(entryId: Id, role: AuthorRole, index: number): Promise<Association | null>;

  /**
   * Highest index used for a role on an entry, or null if there is none
   */
  maxIndex(entryId: Id, role: AuthorRole): Promise<number | null>;

  /**
   * Credits of an entry joined with identity names, ordered by role then index
   */
  listByEntry(entryId: Id): Promise<CreditedName[]>;

  /**
   * Number of credits on an entry, optionally for one role
   */
  countByEntry(entryId: Id, role?: AuthorRole): Promise<number>;

  /**
   * Entries credited to an identity, ordered by title
   */
  listTitlesByIdentity(identityId: Id): Promise<CreditedTitle[]>;

  /**
   * Remove credits of an entry
   * @returns Number of credits removed
   */
  delete(filter: AssociationFilter): Promise<number>;
}
