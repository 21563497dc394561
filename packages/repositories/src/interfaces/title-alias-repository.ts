import type { Id, SearchOptions, TitleAlias, TitleMatch } from '@archivist/protocol';

/**
 * Repository interface for alternate titles of entries.
 */
export interface TitleAliasRepository {
  /**
   * Add an alias; the (entry, title) pair must be new
   */
  add(alias: TitleAlias): Promise<TitleAlias>;

  /**
   * Check whether an entry already carries an alias
   */
  exists(entryId: Id, title: string): Promise<boolean>;

  /**
   * Aliases of an entry, ordered by title
   */
  listByEntry(entryId: Id): Promise<TitleAlias[]>;

  /**
   * Number of aliases of an entry
   */
  countByEntry(entryId: Id): Promise<number>;

  /**
   * Remove every alias of an entry
   * @returns Number of aliases removed
   */
  deleteByEntry(entryId: Id): Promise<number>;

  /**
   * Aliases matching a pattern (isAlias is always true)
   */
  search(pattern: string, options?: SearchOptions): Promise<TitleMatch[]>;
}
