// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing of the catalog runtime
//
// Transactions run one at a time and restore a snapshot when the callback
// throws. Data does not persist between restarts.

import {
  compareText,
  emptyEntryFields,
  roleRank,
  type Association,
  type CreditedName,
  type CreditedTitle,
  type Entry,
  type Id,
  type Identity,
  type IdentityMatch,
  type Language,
  type PublicationCategory,
  type TitleAlias,
  type TitleMatch,
  type TypeCategory,
} from '@archivist/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
  EntryRepository,
  TitleAliasRepository,
  IdentityRepository,
  AssociationRepository,
  ReferenceRepository,
} from '../interfaces/index.js';
import { likeToRegExp, matchesLike, createLikeMatcher } from './like.js';

export { likeToRegExp, matchesLike, createLikeMatcher } from './like.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  entries: Map<Id, Entry>;
  /** Keyed by entry id */
  titleAliases: Map<Id, TitleAlias[]>;
  identities: Map<Id, Identity>;
  associations: Association[];
  languages: Map<string, Language>;
  typeCategories: Map<Id, TypeCategory>;
  publicationCategories: Map<Id, PublicationCategory>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

/**
 * Raised where the relational store would reject a write on a key constraint.
 */
export class InMemoryConstraintError extends Error {
  constructor(readonly constraint: string, message: string) {
    super(message);
    this.name = 'InMemoryConstraintError';
  }
}

function compareNullableText(a: string | null, b: string | null): number {
  // Nulls sort last, as ascending ORDER BY does in Postgres
  if (a === null) return b === null ? 0 : 1;
  if (b === null) return -1;
  return compareText(a, b);
}

function compareCredits(a: Association, b: Association): number {
  return roleRank(a.role) - roleRank(b.role) || a.index - b.index;
}

/**
 * Id sequence that follows explicitly supplied ids, like a serial column
 * whose sequence is kept past the highest inserted value.
 */
function createSequence() {
  let last = 0;
  return {
    next(explicit?: Id): Id {
      const id = explicit ?? last + 1;
      if (id > last) last = id;
      return id;
    },
    reset() {
      last = 0;
    },
  };
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * const entry = await repos.entries.create({ path: 'games/arcade/rolanrop.zip' });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.entries.size);
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  // Data stores
  const entries = new Map<Id, Entry>();
  const titleAliases = new Map<Id, TitleAlias[]>();
  const identities = new Map<Id, Identity>();
  const associations: Association[] = [];
  const languages = new Map<string, Language>();
  const typeCategories = new Map<Id, TypeCategory>();
  const publicationCategories = new Map<Id, PublicationCategory>();

  const entryIds = createSequence();
  const identityIds = createSequence();
  const typeIds = createSequence();
  const publicationIds = createSequence();

  const data: InMemoryDataStore = {
    entries,
    titleAliases,
    identities,
    associations,
    languages,
    typeCategories,
    publicationCategories,
  };

  // Entry repository
  const entryRepo: EntryRepository = {
    async create(input) {
      for (const existing of entries.values()) {
        if (existing.path === input.path) {
          throw new InMemoryConstraintError('entries_path_idx', `Duplicate path: ${input.path}`);
        }
      }
      if (input.id !== undefined && entries.has(input.id)) {
        throw new InMemoryConstraintError('entries_pkey', `Duplicate entry id: ${input.id}`);
      }

      const { id: requestedId, path, ...fields } = input;
      const id = entryIds.next(requestedId);
      const entry: Entry = {
        ...emptyEntryFields(),
        ...fields,
        languages: [...(fields.languages ?? [])].sort(),
        id,
        path,
      };
      entries.set(id, entry);
      return { ...entry, languages: [...entry.languages] };
    },
    async get(id) {
      const entry = entries.get(id);
      return entry ? { ...entry, languages: [...entry.languages] } : null;
    },
    async getByPath(path) {
      for (const entry of entries.values()) {
        if (entry.path === path) return { ...entry, languages: [...entry.languages] };
      }
      return null;
    },
    async update(id, input) {
      const entry = entries.get(id);
      if (!entry) return null;
      const updated: Entry = {
        ...entry,
        ...input,
        languages: [...(input.languages ?? entry.languages)].sort(),
        id: entry.id,
        path: entry.path,
      };
      entries.set(id, updated);
      return { ...updated, languages: [...updated.languages] };
    },
    async delete(id) {
      if (!entries.delete(id)) return false;
      titleAliases.delete(id);
      removeAssociations((a) => a.entryId === id);
      return true;
    },
    async searchPaths(pattern) {
      const re = likeToRegExp(pattern);
      return Array.from(entries.values())
        .filter((e) => matchesLike(e.path, re))
        .sort((a, b) => compareText(a.path, b.path))
        .map((e) => ({ entryId: e.id, path: e.path }));
    },
    async searchTitles(pattern, options) {
      const matches = createLikeMatcher(pattern, options);
      const rows: TitleMatch[] = [];
      for (const entry of entries.values()) {
        if (entry.title !== null && matches(entry.title)) {
          rows.push({ entryId: entry.id, title: entry.title, isAlias: false });
        }
      }
      return rows.sort((a, b) => a.entryId - b.entryId);
    },
    async countByLanguage(code) {
      let total = 0;
      for (const entry of entries.values()) {
        if (entry.languages.includes(code)) total++;
      }
      return total;
    },
  };

  // Title alias repository
  const titleAliasRepo: TitleAliasRepository = {
    async add(alias) {
      if (!entries.has(alias.entryId)) {
        throw new InMemoryConstraintError(
          'title_aliases_entry_id_fkey',
          `Unknown entry: ${alias.entryId}`
        );
      }
      const list = titleAliases.get(alias.entryId) ?? [];
      if (list.some((a) => a.title === alias.title)) {
        throw new InMemoryConstraintError(
          'title_aliases_pkey',
          `Duplicate alias for entry ${alias.entryId}: ${alias.title}`
        );
      }
      list.push({ ...alias });
      titleAliases.set(alias.entryId, list);
      return { ...alias };
    },
    async exists(entryId, title) {
      return (titleAliases.get(entryId) ?? []).some((a) => a.title === title);
    },
    async listByEntry(entryId) {
      return (titleAliases.get(entryId) ?? [])
        .map((a) => ({ ...a }))
        .sort((a, b) => compareText(a.title, b.title));
    },
    async countByEntry(entryId) {
      return titleAliases.get(entryId)?.length ?? 0;
    },
    async deleteByEntry(entryId) {
      const removed = titleAliases.get(entryId)?.length ?? 0;
      titleAliases.delete(entryId);
      return removed;
    },
    async search(pattern, options) {
      const matches = createLikeMatcher(pattern, options);
      const rows: TitleMatch[] = [];
      for (const list of titleAliases.values()) {
        for (const alias of list) {
          if (matches(alias.title)) {
            rows.push({ entryId: alias.entryId, title: alias.title, isAlias: true });
          }
        }
      }
      return rows.sort((a, b) => a.entryId - b.entryId);
    },
  };

  // Identity repository
  const identityRepo: IdentityRepository = {
    async create(input) {
      if (input.id !== undefined && identities.has(input.id)) {
        throw new InMemoryConstraintError('identities_pkey', `Duplicate identity id: ${input.id}`);
      }
      const identity: Identity = {
        id: identityIds.next(input.id),
        name: input.name,
        aliasOfId: input.aliasOfId ?? null,
      };
      identities.set(identity.id, identity);
      return { ...identity };
    },
    async get(id) {
      const identity = identities.get(id);
      return identity ? { ...identity } : null;
    },
    async getByName(name) {
      let found: Identity | null = null;
      for (const identity of identities.values()) {
        if (identity.name === name && (found === null || identity.id < found.id)) {
          found = identity;
        }
      }
      return found ? { ...found } : null;
    },
    async listAliasesOf(targetIds) {
      const targets = new Set(targetIds);
      return Array.from(identities.values())
        .filter((i) => i.aliasOfId !== null && targets.has(i.aliasOfId))
        .sort((a, b) => a.id - b.id)
        .map((i) => ({ ...i }));
    },
    async update(id, input) {
      const identity = identities.get(id);
      if (!identity) return null;
      const updated: Identity = {
        id,
        name: input.name ?? identity.name,
        aliasOfId: input.aliasOfId !== undefined ? input.aliasOfId : identity.aliasOfId,
      };
      identities.set(id, updated);
      return { ...updated };
    },
    async search(pattern, options) {
      const matches = createLikeMatcher(pattern, options);
      const rows: IdentityMatch[] = [];
      for (const identity of identities.values()) {
        if (!matches(identity.name)) continue;

        const roles = new Set(
          associations.filter((a) => a.identityId === identity.id).map((a) => a.role)
        );
        const base = { identityId: identity.id, name: identity.name, aliasOfId: identity.aliasOfId };
        if (roles.size === 0) {
          rows.push({ ...base, role: null });
        } else {
          for (const role of roles) rows.push({ ...base, role });
        }
      }
      return rows.sort(
        (a, b) =>
          compareText(a.name, b.name) ||
          a.identityId - b.identityId ||
          (a.role === null ? 0 : roleRank(a.role)) - (b.role === null ? 0 : roleRank(b.role))
      );
    },
  };

  function removeAssociations(predicate: (a: Association) => boolean): number {
    let removed = 0;
    for (let i = associations.length - 1; i >= 0; i--) {
      if (predicate(associations[i])) {
        associations.splice(i, 1);
        removed++;
      }
    }
    return removed;
  }

  // Association repository
  const associationRepo: AssociationRepository = {
    async create(association) {
      if (!entries.has(association.entryId)) {
        throw new InMemoryConstraintError(
          'associations_entry_id_fkey',
          `Unknown entry: ${association.entryId}`
        );
      }
      if (!identities.has(association.identityId)) {
        throw new InMemoryConstraintError(
          'associations_identity_id_fkey',
          `Unknown identity: ${association.identityId}`
        );
      }
      for (const a of associations) {
        if (a.entryId !== association.entryId || a.role !== association.role) continue;
        if (a.identityId === association.identityId) {
          throw new InMemoryConstraintError('associations_pkey', 'Duplicate credit');
        }
        if (a.index === association.index) {
          throw new InMemoryConstraintError('associations_index_idx', 'Duplicate credit index');
        }
      }
      associations.push({ ...association });
      return { ...association };
    },
    async find(entryId, identityId, role) {
      const found = associations.find(
        (a) => a.entryId === entryId && a.identityId === identityId && a.role === role
      );
      return found ? { ...found } : null;
    },
    async findAt(entryId, role, index) {
      const found = associations.find(
        (a) => a.entryId === entryId && a.role === role && a.index === index
      );
      return found ? { ...found } : null;
    },
    async maxIndex(entryId, role) {
      let highest: number | null = null;
      for (const a of associations) {
        if (a.entryId === entryId && a.role === role && (highest === null || a.index > highest)) {
          highest = a.index;
        }
      }
      return highest;
    },
    async listByEntry(entryId) {
      const rows: CreditedName[] = [];
      for (const a of associations) {
        if (a.entryId !== entryId) continue;
        const identity = identities.get(a.identityId);
        if (identity) rows.push({ ...a, name: identity.name });
      }
      return rows.sort(compareCredits);
    },
    async countByEntry(entryId, role) {
      return associations.filter(
        (a) => a.entryId === entryId && (role === undefined || a.role === role)
      ).length;
    },
    async listTitlesByIdentity(identityId) {
      const rows: CreditedTitle[] = [];
      for (const a of associations) {
        if (a.identityId !== identityId) continue;
        const entry = entries.get(a.entryId);
        if (entry) rows.push({ entryId: entry.id, title: entry.title, role: a.role });
      }
      return rows.sort(
        (a, b) =>
          compareNullableText(a.title, b.title) ||
          a.entryId - b.entryId ||
          roleRank(a.role) - roleRank(b.role)
      );
    },
    async delete(filter) {
      return removeAssociations(
        (a) =>
          a.entryId === filter.entryId &&
          (filter.identityId === undefined || a.identityId === filter.identityId) &&
          (filter.role === undefined || a.role === filter.role)
      );
    },
  };

  function assertUniqueDescription(
    table: Map<Id, { id: Id; description: string }>,
    name: string,
    description: string
  ): void {
    for (const row of table.values()) {
      if (row.description === description) {
        throw new InMemoryConstraintError(
          `${name}_description_idx`,
          `Duplicate description: ${description}`
        );
      }
    }
  }

  // Reference repository
  const referenceRepo: ReferenceRepository = {
    async addLanguage(language) {
      if (languages.has(language.code)) {
        throw new InMemoryConstraintError('languages_pkey', `Duplicate language: ${language.code}`);
      }
      for (const existing of languages.values()) {
        if (existing.description === language.description) {
          throw new InMemoryConstraintError(
            'languages_description_idx',
            `Duplicate description: ${language.description}`
          );
        }
      }
      languages.set(language.code, { ...language });
      return { ...language };
    },
    async getLanguage(code) {
      const language = languages.get(code);
      return language ? { ...language } : null;
    },
    async updateLanguage(code, description) {
      if (!languages.has(code)) return null;
      const updated: Language = { code, description };
      languages.set(code, updated);
      return { ...updated };
    },
    async deleteLanguage(code) {
      return languages.delete(code);
    },
    async listLanguages() {
      return Array.from(languages.values())
        .sort((a, b) => compareText(a.description, b.description))
        .map((l) => ({ ...l }));
    },

    async addTypeCategory(input) {
      assertUniqueDescription(typeCategories, 'type_categories', input.description);
      const category: TypeCategory = { id: typeIds.next(input.id), description: input.description };
      typeCategories.set(category.id, category);
      return { ...category };
    },
    async getTypeCategory(id) {
      const category = typeCategories.get(id);
      return category ? { ...category } : null;
    },
    async getTypeCategoryByDescription(description) {
      for (const category of typeCategories.values()) {
        if (category.description === description) return { ...category };
      }
      return null;
    },
    async listTypeCategories() {
      return Array.from(typeCategories.values())
        .sort((a, b) => a.id - b.id)
        .map((c) => ({ ...c }));
    },

    async addPublicationCategory(input) {
      assertUniqueDescription(publicationCategories, 'publication_categories', input.description);
      const category: PublicationCategory = {
        id: publicationIds.next(input.id),
        description: input.description,
      };
      publicationCategories.set(category.id, category);
      return { ...category };
    },
    async getPublicationCategory(id) {
      const category = publicationCategories.get(id);
      return category ? { ...category } : null;
    },
    async getPublicationCategoryByDescription(description) {
      for (const category of publicationCategories.values()) {
        if (category.description === description) return { ...category };
      }
      return null;
    },
    async listPublicationCategories() {
      return Array.from(publicationCategories.values())
        .sort((a, b) => a.id - b.id)
        .map((c) => ({ ...c }));
    },
  };

  // Build context
  const context: RepositoryContext = {
    entries: entryRepo,
    titleAliases: titleAliasRepo,
    identities: identityRepo,
    associations: associationRepo,
    reference: referenceRepo,
  };

  function snapshot(): InMemoryDataStore {
    return structuredClone(data);
  }

  function restore(saved: InMemoryDataStore): void {
    replaceMap(entries, saved.entries);
    replaceMap(titleAliases, saved.titleAliases);
    replaceMap(identities, saved.identities);
    associations.splice(0, associations.length, ...saved.associations);
    replaceMap(languages, saved.languages);
    replaceMap(typeCategories, saved.typeCategories);
    replaceMap(publicationCategories, saved.publicationCategories);
  }

  // Transactions queue behind each other
  let queue: Promise<unknown> = Promise.resolve();

  return {
    ...context,
    async transaction<T>(fn: TransactionFn<T>): Promise<T> {
      const run = async (): Promise<T> => {
        const saved = snapshot();
        try {
          return await fn(context);
        } catch (error) {
          restore(saved);
          throw error;
        }
      };

      const result = queue.then(run, run);
      queue = result.catch(() => undefined);
      return result;
    },
    _data: data,
    clear() {
      entries.clear();
      titleAliases.clear();
      identities.clear();
      associations.length = 0;
      languages.clear();
      typeCategories.clear();
      publicationCategories.clear();
      entryIds.reset();
      identityIds.reset();
      typeIds.reset();
      publicationIds.reset();
    },
  };
}

function replaceMap<K, V>(target: Map<K, V>, source: Map<K, V>): void {
  target.clear();
  for (const [key, value] of source) target.set(key, value);
}
