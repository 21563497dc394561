// Search/Lookup
//
// Pattern matching over paths, titles and identity names. Patterns use two
// wildcards, `_` for one character and `%` for any run, with `\` escaping
// the next character; matching ignores case, and optionally diacritics.

import {
  compareText,
  searchPatternSchema,
  type IdentityMatch,
  type PathMatch,
  type SearchOptions,
  type TitleMatch,
} from '@archivist/protocol';
import type { RepositoryContext } from '@archivist/repositories';
import { parseInput } from '../validation/index.js';

/**
 * Entries whose path matches, ordered by path.
 */
export async function searchPaths(repos: RepositoryContext, pattern: string): Promise<PathMatch[]> {
  return repos.entries.searchPaths(parseInput(searchPatternSchema, pattern));
}

/**
 * Canonical titles and title aliases that match, ordered by entry id, then
 * canonical titles before aliases, then title.
 */
export async function searchTitles(
  repos: RepositoryContext,
  pattern: string,
  options: SearchOptions = {}
): Promise<TitleMatch[]> {
  const parsed = parseInput(searchPatternSchema, pattern);
  const [titles, aliases] = await Promise.all([
    repos.entries.searchTitles(parsed, options),
    repos.titleAliases.search(parsed, options),
  ]);

  return [...titles, ...aliases].sort(
    (a, b) =>
      a.entryId - b.entryId || Number(a.isAlias) - Number(b.isAlias) || compareText(a.title, b.title)
  );
}

/**
 * Identities whose name matches, one row per distinct credited role (role
 * null for identities without credits), ordered by name then id.
 */
export async function searchIdentities(
  repos: RepositoryContext,
  pattern: string,
  options: SearchOptions = {}
): Promise<IdentityMatch[]> {
  return repos.identities.search(parseInput(searchPatternSchema, pattern), options);
}
