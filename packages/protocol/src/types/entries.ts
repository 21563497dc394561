import type { Id, IsoDate } from './common.js';

/**
 * Descriptive fields of a catalog entry.
 *
 * Absent values are always `null`; writes normalize empty strings to `null`.
 * `company` and `protected` are the legacy free-text fields of manifest
 * version 2.00 and may not be combined with any 3.00 field.
 */
export type EntryFields = {
  fileSize: number | null;
  title: string | null;
  /** Alternate (original-language) title, rendered as ORIGINAL TITLE */
  originalTitle: string | null;
  company: string | null;
  year: number | null;
  /** Normalized language tags, sorted and unique */
  languages: string[];
  typeId: Id | null;
  subtype: string | null;
  titleScreen: string | null;
  cheatMode: string | null;
  protected: string | null;
  problems: string | null;
  uploadDate: IsoDate | null;
  uploader: string | null;
  comments: string | null;
  publicationTypeId: Id | null;
  publisherCode: string | null;
  barcode: string | null;
  dlCode: string | null;
  /** Kilobytes; one of 64, 128 or 256 */
  memoryRequired: number | null;
  protection: string | null;
  runCommand: string | null;
};

/**
 * One archived package. The path is unique and never changes.
 */
export type Entry = EntryFields & {
  id: Id;
  path: string;
};

/**
 * Alternate title of an entry, rendered under ALSO KNOWN AS.
 */
export type TitleAlias = {
  entryId: Id;
  title: string;
};

export const ENTRY_FIELD_NAMES = [
  'fileSize',
  'title',
  'originalTitle',
  'company',
  'year',
  'languages',
  'typeId',
  'subtype',
  'titleScreen',
  'cheatMode',
  'protected',
  'problems',
  'uploadDate',
  'uploader',
  'comments',
  'publicationTypeId',
  'publisherCode',
  'barcode',
  'dlCode',
  'memoryRequired',
  'protection',
  'runCommand',
] as const satisfies readonly (keyof EntryFields)[];

/**
 * Fields of an entry with nothing set.
 */
export function emptyEntryFields(): EntryFields {
  return {
    fileSize: null,
    title: null,
    originalTitle: null,
    company: null,
    year: null,
    languages: [],
    typeId: null,
    subtype: null,
    titleScreen: null,
    cheatMode: null,
    protected: null,
    problems: null,
    uploadDate: null,
    uploader: null,
    comments: null,
    publicationTypeId: null,
    publisherCode: null,
    barcode: null,
    dlCode: null,
    memoryRequired: null,
    protection: null,
    runCommand: null,
  };
}

/**
 * Changes to entry fields. A key that is missing or holds `undefined` leaves
 * the field as it is; `null` clears it.
 */
export type EntryChanges = {
  [K in keyof EntryFields]?: EntryFields[K] | undefined;
};

const keep = <T>(change: T | undefined, current: T): T => (change === undefined ? current : change);

/**
 * Apply changes to a full field set.
 */
export function mergeEntryFields(base: EntryFields, changes: EntryChanges): EntryFields {
  return {
    fileSize: keep(changes.fileSize, base.fileSize),
    title: keep(changes.title, base.title),
    originalTitle: keep(changes.originalTitle, base.originalTitle),
    company: keep(changes.company, base.company),
    year: keep(changes.year, base.year),
    languages: keep(changes.languages, base.languages),
    typeId: keep(changes.typeId, base.typeId),
    subtype: keep(changes.subtype, base.subtype),
    titleScreen: keep(changes.titleScreen, base.titleScreen),
    cheatMode: keep(changes.cheatMode, base.cheatMode),
    protected: keep(changes.protected, base.protected),
    problems: keep(changes.problems, base.problems),
    uploadDate: keep(changes.uploadDate, base.uploadDate),
    uploader: keep(changes.uploader, base.uploader),
    comments: keep(changes.comments, base.comments),
    publicationTypeId: keep(changes.publicationTypeId, base.publicationTypeId),
    publisherCode: keep(changes.publisherCode, base.publisherCode),
    barcode: keep(changes.barcode, base.barcode),
    dlCode: keep(changes.dlCode, base.dlCode),
    memoryRequired: keep(changes.memoryRequired, base.memoryRequired),
    protection: keep(changes.protection, base.protection),
    runCommand: keep(changes.runCommand, base.runCommand),
  };
}
