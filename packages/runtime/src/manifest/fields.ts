import type { ManifestVersion } from '@archivist/protocol';

/**
 * A field label a manifest may contain.
 */
export type ManifestFieldSpec = {
  /** First version the field appears in */
  since: ManifestVersion;
  /** Version from which the field should no longer be written */
  deprecatedFrom?: ManifestVersion;
};

export const MANIFEST_FIELDS: Readonly<Record<string, ManifestFieldSpec>> = {
  TITLE: { since: '2.00' },
  COMPANY: { since: '2.00', deprecatedFrom: '3.00' },
  YEAR: { since: '2.00' },
  LANGUAGE: { since: '2.00' },
  TYPE: { since: '2.00' },
  SUBTYPE: { since: '2.00' },
  'TITLE SCREEN': { since: '2.00' },
  'CHEAT MODE': { since: '2.00' },
  PROTECTED: { since: '2.00', deprecatedFrom: '3.00' },
  PROBLEMS: { since: '2.00' },
  UPLOADED: { since: '2.00' },
  COMMENTS: { since: '2.00' },

  'ALSO KNOWN AS': { since: '3.00' },
  'ORIGINAL TITLE': { since: '3.00' },
  PUBLISHER: { since: '3.00' },
  'RE-RELEASED BY': { since: '3.00' },
  PUBLICATION: { since: '3.00' },
  'PUBLISHER CODE': { since: '3.00' },
  CRACKER: { since: '3.00' },
  DEVELOPER: { since: '3.00' },
  AUTHOR: { since: '3.00' },
  ARTIST: { since: '3.00' },
  MUSICIAN: { since: '3.00' },
  'MEMORY REQUIRED': { since: '3.00' },
  PROTECTION: { since: '3.00' },
  'RUN COMMAND': { since: '3.00' },

  DESIGNER: { since: '3.10' },
  BARCODE: { since: '3.10' },
  'DL CODE': { since: '3.10' },
};

/**
 * Fields every manifest of a version must contain.
 */
export const MANDATORY_FIELDS: Readonly<Record<ManifestVersion, readonly string[]>> = {
  '2.00': [
    'TITLE',
    'COMPANY',
    'YEAR',
    'LANGUAGE',
    'TYPE',
    'SUBTYPE',
    'TITLE SCREEN',
    'CHEAT MODE',
    'PROTECTED',
    'PROBLEMS',
    'UPLOADED',
    'COMMENTS',
  ],
  '3.00': ['TITLE', 'UPLOADED'],
  '3.10': ['TITLE', 'UPLOADED'],
};
