// Manifest Renderer
//
// Produces file_id.diz text for a resolved entry. Output must match the
// historical layouts byte for byte: downstream tools parse these files by
// column, so label widths, rule widths and line order are fixed.

import {
  isPresent,
  isVersionAtLeast,
  AUTHOR_ROLES,
  type AuthorRole,
  type IsoDate,
  type Platform,
  type PlatformPrefix,
  type ResolvedEntry,
} from '@archivist/protocol';
import { joinNamesForRole } from '../associations/index.js';
import { RenderError } from '../errors.js';

export type RenderOptions = {
  platformPrefixes: PlatformPrefix[];
  defaultPlatform: Platform;
  archiveHost: string;
};

export const DEFAULT_PLATFORM_PREFIXES: PlatformPrefix[] = [{ prefix: 'pcw/', platform: 'PCW' }];

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  platformPrefixes: DEFAULT_PLATFORM_PREFIXES,
  defaultPlatform: 'CPC',
  archiveHost: 'FTP.NVG.NTNU.NO',
};

const LEGACY_RULE = '-'.repeat(71);
const LEGACY_LABEL_WIDTH = 14;
const EXTENDED_RULE = '-'.repeat(79);
const EXTENDED_LABEL_WIDTH = 17;

const TITLE_ALIAS_SEPARATOR = '; ';
const LANGUAGE_SEPARATOR = ', ';

/**
 * Platform named in the banner, chosen by the first matching path prefix.
 */
export function platformFor(path: string, options: RenderOptions = DEFAULT_RENDER_OPTIONS): Platform {
  const match = options.platformPrefixes.find((p) => path.startsWith(p.prefix));
  return match ? match.platform : options.defaultPlatform;
}

/**
 * The UPLOADED value: `DD/MM/YYYY by <uploader>`, with `?` for either
 * missing half.
 */
export function formatUploaded(uploadDate: IsoDate | null, uploader: string | null): string {
  let date = '?';
  if (uploadDate !== null) {
    const [year, month, day] = uploadDate.split('-');
    date = `${day}/${month}/${year}`;
  }
  return `${date} by ${isPresent(uploader) ? uploader : '?'}`;
}

function line(label: string, width: number, value: string): string {
  return `${`${label}:`.padEnd(width)}${value}\n`;
}

function legacyValue(value: string | null, placeholder: '?' | '-'): string {
  return isPresent(value) ? value : placeholder;
}

function renderLegacy(resolved: ResolvedEntry): string {
  const { entry } = resolved;
  const field = (label: string, value: string) => line(label, LEGACY_LABEL_WIDTH, value);
  const languages = resolved.languageNames.join(LANGUAGE_SEPARATOR);

  return [
    `${LEGACY_RULE}\n`,
    field('TITLE', legacyValue(entry.title, '-')),
    field('COMPANY', legacyValue(entry.company, '?')),
    field('YEAR', entry.year !== null ? String(entry.year) : '?'),
    field('LANGUAGE', legacyValue(languages, '-')),
    field('TYPE', legacyValue(resolved.typeName, '?')),
    field('SUBTYPE', legacyValue(entry.subtype, '-')),
    field('TITLE SCREEN', legacyValue(entry.titleScreen, '-')),
    field('CHEAT MODE', legacyValue(entry.cheatMode, '-')),
    field('PROTECTED', legacyValue(entry.protected, '-')),
    field('PROBLEMS', legacyValue(entry.problems, '-')),
    field('UPLOADED', formatUploaded(entry.uploadDate, entry.uploader)),
    field('COMMENTS', legacyValue(entry.comments, '?')),
    `${LEGACY_RULE}\n`,
  ].join('');
}

function renderExtended(resolved: ResolvedEntry): string {
  const { entry, credits } = resolved;
  const lines: string[] = [`${EXTENDED_RULE}\n`];

  const optional = (label: string, value: string | null) => {
    if (isPresent(value)) lines.push(line(label, EXTENDED_LABEL_WIDTH, value));
  };
  const role = (name: AuthorRole) => optional(name, joinNamesForRole(credits, name));

  optional('TITLE', entry.title);
  optional('ALSO KNOWN AS', resolved.titleAliases.join(TITLE_ALIAS_SEPARATOR));
  optional('ORIGINAL TITLE', entry.originalTitle);
  optional('YEAR', entry.year !== null ? String(entry.year) : null);
  role('PUBLISHER');
  role('RE-RELEASED BY');
  optional('PUBLICATION', resolved.publicationName);
  optional('PUBLISHER CODE', entry.publisherCode);
  optional('BARCODE', entry.barcode);
  optional('DL CODE', entry.dlCode);
  for (const name of AUTHOR_ROLES.slice(AUTHOR_ROLES.indexOf('CRACKER'))) {
    role(name);
  }
  optional('LANGUAGE', resolved.languageNames.join(LANGUAGE_SEPARATOR));
  optional('MEMORY REQUIRED', entry.memoryRequired !== null ? `${entry.memoryRequired}K` : null);
  optional('TYPE', resolved.typeName);
  optional('SUBTYPE', entry.subtype);
  optional('TITLE SCREEN', entry.titleScreen);
  optional('CHEAT MODE', entry.cheatMode);
  optional('PROTECTION', entry.protection);
  optional('PROBLEMS', entry.problems);
  optional('RUN COMMAND', entry.runCommand);
  lines.push(line('UPLOADED', EXTENDED_LABEL_WIDTH, formatUploaded(entry.uploadDate, entry.uploader)));
  optional('COMMENTS', entry.comments);
  lines.push(`${EXTENDED_RULE}\n`);

  return lines.join('');
}

/**
 * Render the manifest text of a resolved entry.
 *
 * @throws RenderError if the entry's version is INCONSISTENT
 */
export function renderManifest(
  resolved: ResolvedEntry,
  options: RenderOptions = DEFAULT_RENDER_OPTIONS
): string {
  const { entry, version } = resolved;
  if (version === 'INCONSISTENT') {
    throw new RenderError(entry.id, 'the entry mixes fields from incompatible manifest versions');
  }

  const extended = isVersionAtLeast(version, '3.00');
  const indent = extended ? '    ' : '';
  const platform = platformFor(entry.path, options);
  const banner = `${indent}** AMSTRAD ${platform} SOFTWARE AT ${options.archiveHost} : file_id.diz FILE V ${version} **\n`;

  return banner + (extended ? renderExtended(resolved) : renderLegacy(resolved));
}
