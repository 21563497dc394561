import type { Id, Entry, EntryFields, PathMatch, SearchOptions, TitleMatch } from '@archivist/protocol';

/**
 * Input for creating a new Entry. Fields left out are stored as null.
 */
export type CreateEntryRecord = Partial<EntryFields> & {
  id?: Id;
  path: string;
};

/**
 * Changes to an Entry's descriptive fields. The path is immutable.
 */
export type UpdateEntryRecord = Partial<EntryFields>;

/**
 * Repository interface for Entry operations.
 *
 * Entries are the archived packages. Deleting an entry removes its title
 * aliases and associations with it.
 */
export interface EntryRepository {
  /**
   * Create a new Entry
   */
  create(input: CreateEntryRecord): Promise<Entry>;

  /**
   * Get an Entry by ID
   */
  get(id: Id): Promise<Entry | null>;

  /**
   * Get an Entry by its path
   */
  getByPath(path: string): Promise<Entry | null>;

  /**
   * Update descriptive fields
   * @returns The updated entry, or null if it does not exist
   */
  update(id: Id, input: UpdateEntryRecord): Promise<Entry | null>;

  /**
   * Delete an Entry together with its title aliases and associations
   * @returns true if an entry was deleted
   */
  delete(id: Id): Promise<boolean>;

  /**
   * Entries whose path matches a pattern, ordered by path
   */
  searchPaths(pattern: string): Promise<PathMatch[]>;

  /**
   * Canonical titles matching a pattern (isAlias is always false)
   */
  searchTitles(pattern: string, options?: SearchOptions): Promise<TitleMatch[]>;

  /**
   * Number of entries tagged with a language
   */
  countByLanguage(code: string): Promise<number>;
}
