import type { Id } from '@archivist/protocol';
import type { RepositoryContext } from '@archivist/repositories';
import type { VersionFacts } from './inference.js';

/**
 * Read the version facts of a stored entry.
 */
export async function loadVersionFacts(repos: RepositoryContext, entryId: Id): Promise<VersionFacts> {
  const [aliasCount, creditCount, designerCount] = await Promise.all([
    repos.titleAliases.countByEntry(entryId),
    repos.associations.countByEntry(entryId),
    repos.associations.countByEntry(entryId, 'DESIGNER'),
  ]);

  return {
    hasTitleAliases: aliasCount > 0,
    hasAssociations: creditCount > 0,
    hasDesigner: designerCount > 0,
  };
}
