import {
  pgTable,
  serial,
  integer,
  varchar,
  date,
  text,
  primaryKey,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';
import { typeCategories, publicationCategories } from './reference.js';

/**
 * Entries table - one row per archived package.
 *
 * `company` and `protected` hold the legacy 2.00 free text; the catalog
 * refuses to combine them with any 3.00 field.
 */
export const entries = pgTable(
  'entries',
  {
    id: serial('id').primaryKey(),
    path: varchar('path', { length: 260 }).notNull(),
    fileSize: integer('file_size'),
    title: varchar('title', { length: 255 }),
    originalTitle: varchar('original_title', { length: 255 }),
    company: varchar('company', { length: 255 }),
    year: integer('year'),
    languages: text('languages').array().notNull().default([]),
    typeId: integer('type_id').references(() => typeCategories.id, { onUpdate: 'cascade' }),
    subtype: varchar('subtype', { length: 255 }),
    titleScreen: varchar('title_screen', { length: 50 }),
    cheatMode: varchar('cheat_mode', { length: 50 }),
    protected: varchar('protected', { length: 50 }),
    problems: varchar('problems', { length: 255 }),
    uploadDate: date('upload_date', { mode: 'string' }),
    uploader: varchar('uploader', { length: 255 }),
    comments: varchar('comments', { length: 1000 }),
    publicationTypeId: integer('publication_type_id').references(() => publicationCategories.id, {
      onUpdate: 'cascade',
    }),
    publisherCode: varchar('publisher_code', { length: 16 }),
    barcode: varchar('barcode', { length: 13 }),
    dlCode: varchar('dl_code', { length: 26 }),
    memoryRequired: integer('memory_required'),
    protection: varchar('protection', { length: 255 }),
    runCommand: varchar('run_command', { length: 1000 }),
  },
  (table) => [
    uniqueIndex('entries_path_idx').on(table.path),
    index('entries_title_idx').on(table.title),
  ]
);

/**
 * Title aliases table - alternate titles, removed with their entry.
 */
export const titleAliases = pgTable(
  'title_aliases',
  {
    entryId: integer('entry_id')
      .notNull()
      .references(() => entries.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    title: varchar('title', { length: 255 }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.entryId, table.title] }),
    index('title_aliases_title_idx').on(table.title),
  ]
);
