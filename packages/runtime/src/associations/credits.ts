// Association Index
//
// Credits on an entry are ordered first by role, in the canonical role
// order, and then by their index within the role. Indexes start at 0 and a
// new credit without one goes after the last.

import type { AuthorRole, CreditedName, Id } from '@archivist/protocol';
import type { AssociationRepository } from '@archivist/repositories';

export const CREDIT_SEPARATOR = ', ';

/**
 * Index for the next credit of a role on an entry.
 */
export async function nextIndex(
  associations: AssociationRepository,
  entryId: Id,
  role: AuthorRole
): Promise<number> {
  const highest = await associations.maxIndex(entryId, role);
  return highest === null ? 0 : highest + 1;
}

/**
 * Credits of an entry with identity names, in (role, index) order.
 */
export async function orderedAssociations(
  associations: AssociationRepository,
  entryId: Id
): Promise<CreditedName[]> {
  return associations.listByEntry(entryId);
}

/**
 * Join the names credited under one role, in index order.
 * @returns null when nobody is credited under the role
 */
export function joinNamesForRole(credits: readonly CreditedName[], role: AuthorRole): string | null {
  const names = credits
    .filter((c) => c.role === role)
    .sort((a, b) => a.index - b.index)
    .map((c) => c.name);
  return names.length > 0 ? names.join(CREDIT_SEPARATOR) : null;
}

/**
 * Stored names credited under a role on an entry, joined with ", ".
 * Names are shown as credited; aliases are not resolved to their root.
 */
export async function namesForRole(
  associations: AssociationRepository,
  entryId: Id,
  role: AuthorRole
): Promise<string | null> {
  return joinNamesForRole(await associations.listByEntry(entryId), role);
}
