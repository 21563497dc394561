import { pgTable, serial, varchar, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * Language tags and descriptions (e.g. 'en' = 'English', 'en-US' = 'English (American)').
 */
export const languages = pgTable(
  'languages',
  {
    code: varchar('code', { length: 5 }).primaryKey(),
    description: varchar('description', { length: 30 }).notNull(),
  },
  (table) => [uniqueIndex('languages_description_idx').on(table.description)]
);

/**
 * Program types (e.g. 'Arcade game', 'Board game', 'Utility').
 */
export const typeCategories = pgTable(
  'type_categories',
  {
    id: serial('id').primaryKey(),
    description: varchar('description', { length: 255 }).notNull(),
  },
  (table) => [uniqueIndex('type_categories_description_idx').on(table.description)]
);

/**
 * Publication types (e.g. 'Commercial', 'Crack', 'Freeware', 'Type-in').
 */
export const publicationCategories = pgTable(
  'publication_categories',
  {
    id: serial('id').primaryKey(),
    description: varchar('description', { length: 255 }).notNull(),
  },
  (table) => [uniqueIndex('publication_categories_description_idx').on(table.description)]
);
