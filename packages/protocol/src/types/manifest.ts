import type { Entry } from './entries.js';
import type { CreditedName } from './associations.js';

/**
 * Historical schema versions of the file_id.diz manifest, oldest first.
 */
export const MANIFEST_VERSIONS = ['2.00', '3.00', '3.10'] as const;

export type ManifestVersion = (typeof MANIFEST_VERSIONS)[number];

/**
 * Result of version inference. INCONSISTENT means the entry mixes fields
 * that no single manifest version allows together.
 */
export type InferredVersion = ManifestVersion | 'INCONSISTENT';

export function isManifestVersion(value: string): value is ManifestVersion {
  return (MANIFEST_VERSIONS as readonly string[]).includes(value);
}

/**
 * Compare two manifest versions (negative when `a` is older).
 */
export function compareVersions(a: ManifestVersion, b: ManifestVersion): number {
  return MANIFEST_VERSIONS.indexOf(a) - MANIFEST_VERSIONS.indexOf(b);
}

/**
 * True when `version` is a real version no older than `minimum`.
 */
export function isVersionAtLeast(version: InferredVersion, minimum: ManifestVersion): boolean {
  return version !== 'INCONSISTENT' && compareVersions(version, minimum) >= 0;
}

/**
 * Platform token in the manifest banner.
 */
export type Platform = 'CPC' | 'PCW';

/**
 * An entry with everything the renderer needs already looked up.
 */
export type ResolvedEntry = {
  entry: Entry;
  version: InferredVersion;
  /** Title aliases in alphabetical order */
  titleAliases: string[];
  /** Credits in (role, index) order */
  credits: CreditedName[];
  /** Language descriptions in alphabetical order */
  languageNames: string[];
  typeName: string | null;
  publicationName: string | null;
};
