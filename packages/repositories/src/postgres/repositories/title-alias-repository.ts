import { and, eq, asc, ilike, count } from 'drizzle-orm';
import type { Database } from '../db.js';
import { titleAliases } from '../schema/index.js';
import type { TitleAliasRepository } from '../../interfaces/index.js';
import {
  compareText,
  foldDiacritics,
  type Id,
  type SearchOptions,
  type TitleAlias,
  type TitleMatch,
} from '@archivist/protocol';
import { foldedText } from './fold.js';

export class PgTitleAliasRepository implements TitleAliasRepository {
  constructor(private db: Database) {}

  async add(alias: TitleAlias): Promise<TitleAlias> {
    const [row] = await this.db.insert(titleAliases).values(alias).returning();
    return row;
  }

  async exists(entryId: Id, title: string): Promise<boolean> {
    const [row] = await this.db
      .select({ entryId: titleAliases.entryId })
      .from(titleAliases)
      .where(and(eq(titleAliases.entryId, entryId), eq(titleAliases.title, title)));
    return row !== undefined;
  }

  async listByEntry(entryId: Id): Promise<TitleAlias[]> {
    const rows = await this.db
      .select()
      .from(titleAliases)
      .where(eq(titleAliases.entryId, entryId));

    return rows.sort((a, b) => compareText(a.title, b.title));
  }

  async countByEntry(entryId: Id): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(titleAliases)
      .where(eq(titleAliases.entryId, entryId));
    return row?.value ?? 0;
  }

  async deleteByEntry(entryId: Id): Promise<number> {
    const rows = await this.db
      .delete(titleAliases)
      .where(eq(titleAliases.entryId, entryId))
      .returning({ entryId: titleAliases.entryId });
    return rows.length;
  }

  async search(pattern: string, options: SearchOptions = {}): Promise<TitleMatch[]> {
    const condition = options.ignoreDiacritics
      ? ilike(foldedText(titleAliases.title), foldDiacritics(pattern))
      : ilike(titleAliases.title, pattern);
    const rows = await this.db
      .select()
      .from(titleAliases)
      .where(condition)
      .orderBy(asc(titleAliases.entryId));

    return rows.map((row) => ({ entryId: row.entryId, title: row.title, isAlias: true }));
  }
}
