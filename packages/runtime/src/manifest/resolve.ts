// Looks up everything a manifest or catalog view needs for one entry.

import {
  compareText,
  type AuthorRole,
  type Entry,
  type Id,
  type InferredVersion,
  type ResolvedEntry,
} from '@archivist/protocol';
import type { RepositoryContext } from '@archivist/repositories';
import { inferVersion } from '../versions/index.js';
import { joinNamesForRole } from '../associations/index.js';
import { NotFoundError } from '../errors.js';

/**
 * One entry with its aliases, credits and languages joined into display
 * strings, as shown in a catalog listing.
 */
export type EntryInfo = {
  entry: Entry;
  version: InferredVersion;
  /** Title aliases joined with "; ", or null */
  titleAliases: string | null;
  /** Names per role joined with ", ", null for roles without credits */
  credits: Record<AuthorRole, string | null>;
  /** Language descriptions joined with ", ", or null */
  languages: string | null;
  typeName: string | null;
  publicationName: string | null;
};

/**
 * Load an entry and resolve its aliases, credits, language names and
 * category names.
 *
 * @throws NotFoundError if the entry does not exist
 */
export async function resolveEntry(repos: RepositoryContext, entryId: Id): Promise<ResolvedEntry> {
  const entry = await repos.entries.get(entryId);
  if (!entry) {
    throw new NotFoundError('entry', entryId);
  }

  const [aliases, credits] = await Promise.all([
    repos.titleAliases.listByEntry(entryId),
    repos.associations.listByEntry(entryId),
  ]);

  const languageNames: string[] = [];
  for (const code of entry.languages) {
    const language = await repos.reference.getLanguage(code);
    languageNames.push(language ? language.description : code);
  }
  languageNames.sort(compareText);

  const type = entry.typeId !== null ? await repos.reference.getTypeCategory(entry.typeId) : null;
  const publication =
    entry.publicationTypeId !== null
      ? await repos.reference.getPublicationCategory(entry.publicationTypeId)
      : null;

  const version = inferVersion(entry, {
    hasTitleAliases: aliases.length > 0,
    hasAssociations: credits.length > 0,
    hasDesigner: credits.some((c) => c.role === 'DESIGNER'),
  });

  return {
    entry,
    version,
    titleAliases: aliases.map((a) => a.title).sort(compareText),
    credits,
    languageNames,
    typeName: type ? type.description : null,
    publicationName: publication ? publication.description : null,
  };
}

/**
 * Collapse a resolved entry into display strings.
 */
export function toEntryInfo(resolved: ResolvedEntry): EntryInfo {
  const names = (role: AuthorRole) => joinNamesForRole(resolved.credits, role);
  const credits: Record<AuthorRole, string | null> = {
    PUBLISHER: names('PUBLISHER'),
    'RE-RELEASED BY': names('RE-RELEASED BY'),
    CRACKER: names('CRACKER'),
    DEVELOPER: names('DEVELOPER'),
    AUTHOR: names('AUTHOR'),
    DESIGNER: names('DESIGNER'),
    ARTIST: names('ARTIST'),
    MUSICIAN: names('MUSICIAN'),
  };

  return {
    entry: resolved.entry,
    version: resolved.version,
    titleAliases: resolved.titleAliases.length > 0 ? resolved.titleAliases.join('; ') : null,
    credits,
    languages: resolved.languageNames.length > 0 ? resolved.languageNames.join(', ') : null,
    typeName: resolved.typeName,
    publicationName: resolved.publicationName,
  };
}
