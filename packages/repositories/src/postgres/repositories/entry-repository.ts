import { eq, asc, ilike, arrayContains, count } from 'drizzle-orm';
import type { Database } from '../db.js';
import { entries } from '../schema/index.js';
import type {
  EntryRepository,
  CreateEntryRecord,
  UpdateEntryRecord,
} from '../../interfaces/index.js';
import { foldDiacritics, type Entry, type Id, type PathMatch, type SearchOptions, type TitleMatch } from '@archivist/protocol';
import { foldedText } from './fold.js';

export class PgEntryRepository implements EntryRepository {
  constructor(private db: Database) {}

  async create(input: CreateEntryRecord): Promise<Entry> {
    const [row] = await this.db
      .insert(entries)
      .values({ ...input, languages: input.languages ?? [] })
      .returning();

    return this.rowToEntry(row);
  }

  async get(id: Id): Promise<Entry | null> {
    const [row] = await this.db.select().from(entries).where(eq(entries.id, id));
    return row ? this.rowToEntry(row) : null;
  }

  async getByPath(path: string): Promise<Entry | null> {
    const [row] = await this.db.select().from(entries).where(eq(entries.path, path));
    return row ? this.rowToEntry(row) : null;
  }

  async update(id: Id, input: UpdateEntryRecord): Promise<Entry | null> {
    if (Object.keys(input).length === 0) return this.get(id);

    const [row] = await this.db
      .update(entries)
      .set(input)
      .where(eq(entries.id, id))
      .returning();

    return row ? this.rowToEntry(row) : null;
  }

  async delete(id: Id): Promise<boolean> {
    // title_aliases and associations cascade on the foreign keys
    const rows = await this.db
      .delete(entries)
      .where(eq(entries.id, id))
      .returning({ id: entries.id });
    return rows.length > 0;
  }

  async searchPaths(pattern: string): Promise<PathMatch[]> {
    const rows = await this.db
      .select({ entryId: entries.id, path: entries.path })
      .from(entries)
      .where(ilike(entries.path, pattern))
      .orderBy(asc(entries.path));

    return rows;
  }

  async searchTitles(pattern: string, options: SearchOptions = {}): Promise<TitleMatch[]> {
    const condition = options.ignoreDiacritics
      ? ilike(foldedText(entries.title), foldDiacritics(pattern))
      : ilike(entries.title, pattern);
    const rows = await this.db
      .select({ entryId: entries.id, title: entries.title })
      .from(entries)
      .where(condition)
      .orderBy(asc(entries.id));

    const matches: TitleMatch[] = [];
    for (const row of rows) {
      if (row.title !== null) {
        matches.push({ entryId: row.entryId, title: row.title, isAlias: false });
      }
    }
    return matches;
  }

  async countByLanguage(code: string): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(entries)
      .where(arrayContains(entries.languages, [code]));
    return row?.value ?? 0;
  }

  private rowToEntry(row: typeof entries.$inferSelect): Entry {
    return {
      ...row,
      languages: [...row.languages].sort(),
    };
  }
}
