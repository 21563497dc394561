// Identity Graph
//
// Identities may be aliases of other identities (a pen name of a person, a
// label of a publisher). Alias-of links form a forest: every identity has at
// most one target and following targets always ends at a root. Walks are
// bounded by a hop limit so a corrupted store cannot hang a request.

import type { Id, Identity } from '@archivist/protocol';
import type { IdentityRepository } from '@archivist/repositories';
import { CycleError, NotFoundError } from '../errors.js';

export const DEFAULT_MAX_ALIAS_HOPS = 65535;

/**
 * Follow alias-of links from an identity to the identity with no target.
 *
 * @throws NotFoundError if `id` does not exist
 * @throws CycleError if the walk exceeds `maxHops`
 */
export async function resolveRoot(
  identities: IdentityRepository,
  id: Id,
  maxHops: number = DEFAULT_MAX_ALIAS_HOPS
): Promise<Identity> {
  let current = await identities.get(id);
  if (!current) {
    throw new NotFoundError('identity', id);
  }

  let hops = 0;
  while (current.aliasOfId !== null) {
    if (hops >= maxHops) {
      throw new CycleError(id, current.aliasOfId, `Alias chain from identity ${id} exceeds ${maxHops} hops`);
    }
    const next: Identity | null = await identities.get(current.aliasOfId);
    // A dangling link ends the chain
    if (!next) break;
    current = next;
    hops++;
  }

  return current;
}

/**
 * Every identity in the same alias tree as `id`, the root included,
 * ordered by id.
 */
export async function aliasesOf(
  identities: IdentityRepository,
  id: Id,
  maxHops: number = DEFAULT_MAX_ALIAS_HOPS
): Promise<Identity[]> {
  const root = await resolveRoot(identities, id, maxHops);
  const found = new Map<Id, Identity>([[root.id, root]]);

  let frontier: Id[] = [root.id];
  let depth = 0;
  while (frontier.length > 0) {
    if (depth >= maxHops) {
      throw new CycleError(id, root.id, `Alias tree under identity ${root.id} exceeds ${maxHops} levels`);
    }
    const layer = (await identities.listAliasesOf(frontier)).filter((i) => !found.has(i.id));
    for (const identity of layer) found.set(identity.id, identity);
    frontier = layer.map((i) => i.id);
    depth++;
  }

  return Array.from(found.values()).sort((a, b) => a.id - b.id);
}

/**
 * Refuse an alias-of link from `id` to `targetId` when walking from the
 * target toward its root reaches `id`. The target itself counts, so an
 * identity can never be its own alias.
 *
 * @throws NotFoundError if the target does not exist
 * @throws CycleError if the link would close a loop
 */
export async function assertNoAliasCycle(
  identities: IdentityRepository,
  id: Id,
  targetId: Id,
  maxHops: number = DEFAULT_MAX_ALIAS_HOPS
): Promise<void> {
  let current: Id | null = targetId;
  let hops = 0;

  while (current !== null) {
    if (current === id) {
      throw new CycleError(id, targetId);
    }
    if (hops > maxHops) {
      throw new CycleError(id, targetId, `Alias chain from identity ${targetId} exceeds ${maxHops} hops`);
    }

    const identity: Identity | null = await identities.get(current);
    if (!identity) {
      if (current === targetId) throw new NotFoundError('identity', targetId);
      break;
    }
    current = identity.aliasOfId;
    hops++;
  }
}

/**
 * Look an identity up by exact name, creating it on first reference.
 */
export async function findOrCreateIdentity(
  identities: IdentityRepository,
  name: string
): Promise<{ identity: Identity; created: boolean }> {
  const existing = await identities.getByName(name);
  if (existing) {
    return { identity: existing, created: false };
  }
  const identity = await identities.create({ name });
  return { identity, created: true };
}
