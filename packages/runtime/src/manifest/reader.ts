// Manifest Reader
//
// Parses file_id.diz text back into fields. Problems are collected as
// warnings rather than thrown: archived manifests were written by hand over
// many years and a reader has to make the most of each one.

import {
  compareVersions,
  isManifestVersion,
  type IsoDate,
  type ManifestVersion,
  type Platform,
} from '@archivist/protocol';
import { MANIFEST_FIELDS, MANDATORY_FIELDS } from './fields.js';

const HEADER_PATTERN =
  /^\s*\*\* AMSTRAD (CPC|PCW) SOFTWARE AT FTP\.NVG\.(UNIT|NTNU)\.NO : file_id\.diz FILE V (\d\.\d{2}) \*\*\s*$/;

const UPLOADED_PATTERN = /^(\?|\d{2}\/\d{2}\/\d{4})\s+by\s+(.+?)\s*$/;

export type ManifestWarningCode =
  | 'UNSUITABLE_FORMAT'
  | 'INVALID_VERSION'
  | 'SEMICOLON_IN_VALUE'
  | 'UNKNOWN_FIELD'
  | 'FIELD_TOO_NEW'
  | 'DEPRECATED_FIELD'
  | 'BLANK_FIELD'
  | 'MISSING_FIELD'
  | 'INVALID_UPLOADED'
  | 'INVALID_UPLOAD_DATE';

export type ManifestWarning = {
  code: ManifestWarningCode;
  field?: string;
  message: string;
};

export type ManifestDocument = {
  version: ManifestVersion;
  platform: Platform;
  /** Archive host named in the banner */
  host: 'UNIT' | 'NTNU';
  /** Accepted fields by label, values trimmed */
  fields: Record<string, string>;
  /** YEAR as a number, or null when absent or not a number */
  year: number | null;
  uploadDate: IsoDate | null;
  uploader: string | null;
};

export type ManifestReadResult = {
  /** Null when the banner is missing or names an unknown version */
  document: ManifestDocument | null;
  warnings: ManifestWarning[];
};

function parseYear(value: string): number | null {
  return /^[+-]?\d+$/.test(value) ? Number.parseInt(value, 10) : null;
}

function parseUploadDate(value: string): IsoDate | null {
  const [day, month, year] = value.split('/');
  const iso = `${year}-${month}-${day}`;
  const time = Date.parse(`${iso}T00:00:00Z`);
  if (Number.isNaN(time) || new Date(time).toISOString().slice(0, 10) !== iso) {
    return null;
  }
  return iso;
}

/**
 * Read manifest text.
 *
 * Fields unknown to the manifest's version, newer than it, or deprecated in
 * it are reported and left out of `fields`.
 */
export function readManifest(text: string): ManifestReadResult {
  const warnings: ManifestWarning[] = [];
  const warn = (code: ManifestWarningCode, message: string, field?: string) => {
    warnings.push(field === undefined ? { code, message } : { code, field, message });
  };

  const lines = text.split(/\r?\n/);
  const header = HEADER_PATTERN.exec(lines[0] ?? '');
  if (!header) {
    warn('UNSUITABLE_FORMAT', 'The first line is not a file_id.diz banner');
    return { document: null, warnings };
  }

  const [, platformToken, hostToken, versionToken] = header;
  if (!isManifestVersion(versionToken)) {
    warn('INVALID_VERSION', `${versionToken} is not a file_id.diz version`);
    return { document: null, warnings };
  }
  const version = versionToken;
  const legacy = compareVersions(version, '3.00') < 0;

  const fields: Record<string, string> = {};
  let year: number | null = null;

  for (const raw of lines.slice(1)) {
    const lineText = raw.trim();
    const colon = lineText.indexOf(':');
    if (colon === -1) continue;

    const name = lineText.slice(0, colon).trim();
    let value = lineText.slice(colon + 1).trim();

    // Pre-3.00 manifests were generated from semicolon-separated records
    if (legacy && value.includes(';')) {
      warn('SEMICOLON_IN_VALUE', `Value of ${name} contains semicolons`, name);
      value = value.replaceAll(';', ' ');
    }

    const fieldSpec = Object.hasOwn(MANIFEST_FIELDS, name) ? MANIFEST_FIELDS[name] : undefined;
    if (fieldSpec === undefined) {
      warn('UNKNOWN_FIELD', `Unknown field ${name}`, name);
    } else if (compareVersions(version, fieldSpec.since) < 0) {
      warn('FIELD_TOO_NEW', `${name} is not part of version ${version}`, name);
    } else if (
      fieldSpec.deprecatedFrom !== undefined &&
      compareVersions(version, fieldSpec.deprecatedFrom) >= 0
    ) {
      warn('DEPRECATED_FIELD', `${name} is deprecated in version ${version}`, name);
    } else {
      fields[name] = value;
      if (name === 'YEAR') year = parseYear(value);
    }
  }

  for (const [name, value] of Object.entries(fields)) {
    if (value === '' && name !== 'YEAR') {
      warn('BLANK_FIELD', `${name} is blank`, name);
    }
  }

  for (const name of MANDATORY_FIELDS[version]) {
    if (!(name in fields)) {
      warn('MISSING_FIELD', `${name} is missing`, name);
    }
  }

  let uploadDate: IsoDate | null = null;
  let uploader: string | null = null;
  const uploaded = fields['UPLOADED'];
  if (uploaded !== undefined) {
    const match = UPLOADED_PATTERN.exec(uploaded);
    if (match) {
      const [, date, by] = match;
      if (date !== '?') {
        uploadDate = parseUploadDate(date);
        if (uploadDate === null) {
          warn('INVALID_UPLOAD_DATE', `Invalid date in UPLOADED: ${date}`, 'UPLOADED');
        }
      }
      uploader = by;
    } else if (uploaded !== '') {
      warn('INVALID_UPLOADED', 'UPLOADED is not in the form "DD/MM/YYYY by <uploader>"', 'UPLOADED');
    }
  }

  return {
    document: {
      version,
      platform: platformToken === 'PCW' ? 'PCW' : 'CPC',
      host: hostToken === 'UNIT' ? 'UNIT' : 'NTNU',
      fields,
      year,
      uploadDate,
      uploader,
    },
    warnings,
  };
}
