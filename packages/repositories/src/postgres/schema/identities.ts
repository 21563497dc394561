import {
  pgTable,
  pgEnum,
  serial,
  integer,
  varchar,
  primaryKey,
  uniqueIndex,
  index,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';
import { AUTHOR_ROLES } from '@archivist/protocol';
import { entries } from './entries.js';

/**
 * Credit roles. Postgres orders enum values by declaration, so ORDER BY role
 * follows the canonical role order.
 */
export const authorRole = pgEnum('author_role', AUTHOR_ROLES);

/**
 * Identities table - credited people and organizations.
 *
 * alias_of_id points at the identity this one is an alternate name of.
 * Ids are never updated, so the self-reference needs no cascade.
 */
export const identities = pgTable(
  'identities',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
    aliasOfId: integer('alias_of_id').references((): AnyPgColumn => identities.id),
  },
  (table) => [
    index('identities_name_idx').on(table.name),
    index('identities_alias_of_idx').on(table.aliasOfId),
  ]
);

/**
 * Associations table - credits of identities on entries.
 */
export const associations = pgTable(
  'associations',
  {
    entryId: integer('entry_id')
      .notNull()
      .references(() => entries.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    identityId: integer('identity_id')
      .notNull()
      .references(() => identities.id),
    role: authorRole('role').notNull(),
    index: integer('index').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.entryId, table.identityId, table.role] }),
    uniqueIndex('associations_entry_role_index_idx').on(table.entryId, table.role, table.index),
    index('associations_identity_idx').on(table.identityId),
  ]
);
