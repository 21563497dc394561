// Catalog - The Commit Boundary
//
// Every write to the catalog goes through this class, which:
// 1. Parses the input with its zod schema
// 2. Runs validation, cycle checks and index assignment inside one transaction
// 3. Creates an audit entry for the outcome
// 4. Logs committed and rejected writes

import { randomUUID } from 'node:crypto';
import {
  emptyEntryFields,
  mergeEntryFields,
  normalizeLanguageTag,
  createEntryInputSchema,
  updateEntryInputSchema,
  addCreditInputSchema,
  createIdentityInputSchema,
  languageInputSchema,
  categoryInputSchema,
  titleAliasSchema,
  identityNameSchema,
  type AuditEntry,
  type Association,
  type AuthorRole,
  type CatalogConfig,
  type CatalogOperationType,
  type CatalogResourceType,
  type CreditedName,
  type CreditedTitle,
  type Entry,
  type EntryFields,
  type Id,
  type Identity,
  type IdentityMatch,
  type InferredVersion,
  type Language,
  type PathMatch,
  type PublicationCategory,
  type ResolvedEntry,
  type SearchOptions,
  type TitleAlias,
  type TitleMatch,
  type TypeCategory,
  type CreateEntryInput,
  type UpdateEntryInput,
  type AddCreditInput,
  type CreateIdentityInput,
  type LanguageInput,
  type CategoryInput,
} from '@archivist/protocol';
import type { RepositoryContext, TransactionalRepositoryContext } from '@archivist/repositories';
import type { AuditStore } from './audit.js';
import { CatalogError, NotFoundError, ValidationError } from '../errors.js';
import { consoleLogger, type CatalogLogger } from '../logging.js';
import {
  DEFAULT_MAX_ALIAS_HOPS,
  resolveRoot,
  aliasesOf,
  assertNoAliasCycle,
  findOrCreateIdentity,
} from '../identities/index.js';
import { inferVersion, loadVersionFacts } from '../versions/index.js';
import { parseInput, validateEntryFields, assertCreditsAllowed } from '../validation/index.js';
import { nextIndex, orderedAssociations, namesForRole } from '../associations/index.js';
import {
  renderManifest,
  resolveEntry,
  toEntryInfo,
  DEFAULT_PLATFORM_PREFIXES,
  type EntryInfo,
  type RenderOptions,
} from '../manifest/index.js';
import { searchPaths, searchTitles, searchIdentities } from '../search/index.js';

/**
 * Options for creating a Catalog instance.
 */
export type CatalogOptions = {
  /** Repository context; every write runs in one of its transactions */
  repos: TransactionalRepositoryContext;

  /** Audit store for recording operations */
  auditStore: AuditStore;

  /** Logger for committed and rejected writes (default: console) */
  logger?: CatalogLogger;

  /** Optional configuration */
  config?: CatalogConfig;
};

/**
 * Credits to remove from an entry; omitted fields match every credit.
 */
export type RemoveCreditsFilter = {
  identityId?: Id;
  role?: AuthorRole;
};

type OperationMeta = {
  operationType: CatalogOperationType;
  resourceType: CatalogResourceType;
  resourceId?: string;
  details?: Record<string, unknown>;
};

function entryFieldsOf(entry: Entry): EntryFields {
  const { id: _id, path: _path, ...fields } = entry;
  return fields;
}

async function requireEntry(repos: RepositoryContext, entryId: Id): Promise<Entry> {
  const entry = await repos.entries.get(entryId);
  if (!entry) {
    throw new NotFoundError('entry', entryId);
  }
  return entry;
}

async function requireIdentity(repos: RepositoryContext, identityId: Id): Promise<Identity> {
  const identity = await repos.identities.get(identityId);
  if (!identity) {
    throw new NotFoundError('identity', identityId);
  }
  return identity;
}

function requireLanguageTag(code: string): string {
  const normalized = normalizeLanguageTag(code);
  if (normalized === null) {
    throw new ValidationError('INVALID_LANGUAGE', `Invalid language tag: ${code}`, {
      field: 'code',
      details: { tag: code },
    });
  }
  return normalized;
}

/**
 * Store a credit, assigning the next index for its role when none is given.
 */
async function storeCredit(
  repos: RepositoryContext,
  entryId: Id,
  identityId: Id,
  role: AuthorRole,
  index: number | undefined
): Promise<Association> {
  if (await repos.associations.find(entryId, identityId, role)) {
    throw new ValidationError(
      'DUPLICATE_CREDIT',
      `Identity ${identityId} is already credited as ${role} on entry ${entryId}`,
      { field: 'role' }
    );
  }

  let position = index;
  if (position === undefined) {
    position = await nextIndex(repos.associations, entryId, role);
  } else if (await repos.associations.findAt(entryId, role, position)) {
    throw new ValidationError(
      'DUPLICATE_INDEX',
      `Entry ${entryId} already has a ${role} credit at index ${position}`,
      { field: 'index' }
    );
  }

  return repos.associations.create({ entryId, identityId, role, index: position });
}

/**
 * Catalog - The Commit Boundary
 *
 * All mutations to the catalog MUST go through Catalog.
 * Catalog provides:
 * - Transaction wrapping (a rejected write leaves nothing behind)
 * - Validation of every entry and credit against the manifest version rules
 * - Alias cycle prevention for identities
 * - Audit logging (what changed, when, and whether it succeeded)
 *
 * @example
 * ```ts
 * const catalog = createCatalog({
 *   repos: createTransactionalPgRepositoryContext(db),
 *   auditStore: createInMemoryAuditStore(),
 * });
 *
 * const entry = await catalog.createEntry({
 *   path: 'games/arcade/rolanrop.zip',
 *   title: 'Roland on the Ropes',
 *   memoryRequired: 64,
 *   credits: [{ identityName: 'Amsoft', role: 'PUBLISHER' }],
 * });
 *
 * console.log(await catalog.render(entry.id));
 * ```
 */
export class Catalog {
  private repos: TransactionalRepositoryContext;
  private auditStore: AuditStore;
  private logger: CatalogLogger;
  private config: Required<CatalogConfig>;

  constructor(options: CatalogOptions) {
    this.repos = options.repos;
    this.auditStore = options.auditStore;
    this.logger = options.logger ?? consoleLogger;
    this.config = {
      maxAliasHops: options.config?.maxAliasHops ?? DEFAULT_MAX_ALIAS_HOPS,
      platformPrefixes: options.config?.platformPrefixes ?? DEFAULT_PLATFORM_PREFIXES,
      defaultPlatform: options.config?.defaultPlatform ?? 'CPC',
      archiveHost: options.config?.archiveHost ?? 'FTP.NVG.NTNU.NO',
      auditEnabled: options.config?.auditEnabled ?? true,
      onAudit: options.config?.onAudit ?? (() => {}),
    };
  }

  private get renderOptions(): RenderOptions {
    return {
      platformPrefixes: this.config.platformPrefixes,
      defaultPlatform: this.config.defaultPlatform,
      archiveHost: this.config.archiveHost,
    };
  }

  /**
   * Run a write in one transaction, then audit and log the outcome. Errors
   * are rethrown after they are recorded.
   */
  private async commit<T>(
    meta: OperationMeta,
    fn: (repos: RepositoryContext) => Promise<T>,
    resultId?: (result: T) => string
  ): Promise<T> {
    const startTime = Date.now();
    const auditEntry: AuditEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      operationType: meta.operationType,
      resourceType: meta.resourceType,
      resourceId: meta.resourceId,
      details: meta.details ?? {},
      success: false,
      durationMs: 0,
    };

    let result: T;
    try {
      result = await this.repos.transaction(fn);
    } catch (error) {
      auditEntry.durationMs = Date.now() - startTime;
      auditEntry.error = error instanceof Error ? error.message : String(error);
      auditEntry.details = {
        ...auditEntry.details,
        errorType: error instanceof Error ? error.name : 'UnknownError',
        ...(error instanceof CatalogError ? { code: error.code } : {}),
        ...(error instanceof ValidationError ? { rule: error.rule } : {}),
      };
      await this.recordAudit(auditEntry);

      const data = {
        operationType: meta.operationType,
        resourceType: meta.resourceType,
        resourceId: auditEntry.resourceId,
        error: auditEntry.error,
      };
      if (error instanceof CatalogError) {
        this.logger.warn(`Rejected ${meta.operationType}`, data);
      } else {
        this.logger.error(`Failed ${meta.operationType}`, data);
      }
      throw error;
    }

    auditEntry.success = true;
    auditEntry.durationMs = Date.now() - startTime;
    if (resultId) {
      auditEntry.resourceId = resultId(result);
    }
    await this.recordAudit(auditEntry);

    this.logger.info(`Committed ${meta.operationType}`, {
      resourceType: meta.resourceType,
      resourceId: auditEntry.resourceId,
      durationMs: auditEntry.durationMs,
    });
    return result;
  }

  private async recordAudit(entry: AuditEntry): Promise<void> {
    if (!this.config.auditEnabled) return;
    await this.auditStore.append(entry);
    await this.config.onAudit(entry);
  }

  // --- Entries ---

  /**
   * Create an entry together with its title aliases and credits.
   * Credited identities are looked up by exact name and created when new.
   */
  async createEntry(input: CreateEntryInput): Promise<Entry> {
    return this.commit(
      { operationType: 'create_entry', resourceType: 'entry', details: { path: input.path } },
      async (repos) => {
        const {
          id,
          path,
          titleAliases = [],
          credits = [],
          ...changes
        } = parseInput(createEntryInputSchema, input);

        if (await repos.entries.getByPath(path)) {
          throw new ValidationError('DUPLICATE_PATH', `An entry with path ${path} already exists`, {
            field: 'path',
          });
        }
        if (id !== undefined && (await repos.entries.get(id))) {
          throw new ValidationError('DUPLICATE_ENTRY_ID', `Entry ${id} already exists`, { field: 'id' });
        }

        const aliases = new Set<string>();
        for (const title of titleAliases) {
          if (aliases.has(title)) {
            throw new ValidationError('DUPLICATE_TITLE_ALIAS', `Title alias listed twice: ${title}`, {
              field: 'titleAliases',
            });
          }
          aliases.add(title);
        }

        const credited = new Set<string>();
        for (const credit of credits) {
          const key = `${credit.role}\u0000${credit.identityName}`;
          if (credited.has(key)) {
            throw new ValidationError(
              'DUPLICATE_CREDIT',
              `${credit.identityName} is credited twice as ${credit.role}`,
              { field: 'credits' }
            );
          }
          credited.add(key);
        }

        const hasTitleAliases = aliases.size > 0;
        const fields = await validateEntryFields(
          repos,
          mergeEntryFields(emptyEntryFields(), changes),
          {
            hasTitleAliases,
            hasAssociations: credits.length > 0,
            hasDesigner: credits.some((c) => c.role === 'DESIGNER'),
          }
        );
        if (credits.length > 0) {
          assertCreditsAllowed(fields, hasTitleAliases);
        }

        const entry = await repos.entries.create({ ...fields, id, path });
        for (const title of aliases) {
          await repos.titleAliases.add({ entryId: entry.id, title });
        }
        for (const credit of credits) {
          const { identity } = await findOrCreateIdentity(repos.identities, credit.identityName);
          await storeCredit(repos, entry.id, identity.id, credit.role, credit.index);
        }
        return entry;
      },
      (entry) => String(entry.id)
    );
  }

  /**
   * Change an entry's descriptive fields. The result is validated as a
   * whole, with the entry's current aliases and credits.
   */
  async updateEntry(entryId: Id, input: UpdateEntryInput): Promise<Entry> {
    return this.commit(
      { operationType: 'update_entry', resourceType: 'entry', resourceId: String(entryId) },
      async (repos) => {
        const changes = parseInput(updateEntryInputSchema, input);
        const entry = await requireEntry(repos, entryId);
        const facts = await loadVersionFacts(repos, entryId);
        const fields = await validateEntryFields(
          repos,
          mergeEntryFields(entryFieldsOf(entry), changes),
          facts
        );

        const updated = await repos.entries.update(entryId, fields);
        if (!updated) {
          throw new NotFoundError('entry', entryId);
        }
        return updated;
      }
    );
  }

  /**
   * Delete an entry with its title aliases and credits.
   */
  async deleteEntry(entryId: Id): Promise<void> {
    return this.commit(
      { operationType: 'delete_entry', resourceType: 'entry', resourceId: String(entryId) },
      async (repos) => {
        await requireEntry(repos, entryId);
        await repos.entries.delete(entryId);
      }
    );
  }

  /**
   * Add an alternate title. The entry is re-validated as if the alias
   * already existed, since an alias moves it to version 3.00.
   */
  async addTitleAlias(entryId: Id, title: string): Promise<TitleAlias> {
    return this.commit(
      { operationType: 'add_title_alias', resourceType: 'title_alias', resourceId: String(entryId) },
      async (repos) => {
        const parsed = parseInput(titleAliasSchema, title);
        const entry = await requireEntry(repos, entryId);
        if (await repos.titleAliases.exists(entryId, parsed)) {
          throw new ValidationError('DUPLICATE_TITLE_ALIAS', `Entry ${entryId} already has alias ${parsed}`, {
            field: 'title',
          });
        }

        const facts = await loadVersionFacts(repos, entryId);
        await validateEntryFields(repos, entryFieldsOf(entry), { ...facts, hasTitleAliases: true });
        return repos.titleAliases.add({ entryId, title: parsed });
      }
    );
  }

  /**
   * Remove every title alias of an entry.
   * @returns Number of aliases removed
   */
  async removeTitleAliases(entryId: Id): Promise<number> {
    return this.commit(
      { operationType: 'remove_title_aliases', resourceType: 'title_alias', resourceId: String(entryId) },
      async (repos) => {
        await requireEntry(repos, entryId);
        return repos.titleAliases.deleteByEntry(entryId);
      }
    );
  }

  // --- Credits ---

  /**
   * Credit an identity on an entry. The identity is given by id, or by name
   * and created on first reference; the index defaults to the next free one.
   */
  async addCredit(input: AddCreditInput): Promise<Association> {
    return this.commit(
      { operationType: 'add_credit', resourceType: 'association', resourceId: String(input.entryId) },
      async (repos) => {
        const { entryId, identityId, identityName, role, index } = parseInput(addCreditInputSchema, input);
        const entry = await requireEntry(repos, entryId);
        const hasTitleAliases = (await repos.titleAliases.countByEntry(entryId)) > 0;
        assertCreditsAllowed(entryFieldsOf(entry), hasTitleAliases);

        let identity: Identity;
        if (identityId !== undefined) {
          identity = await requireIdentity(repos, identityId);
        } else if (identityName !== undefined) {
          identity = (await findOrCreateIdentity(repos.identities, identityName)).identity;
        } else {
          throw new ValidationError('INVALID_INPUT', 'An identity id or name is required', {
            field: 'identityName',
          });
        }

        return storeCredit(repos, entryId, identity.id, role, index);
      },
      (credit) => `${credit.entryId}:${credit.identityId}:${credit.role}`
    );
  }

  /**
   * Remove credits from an entry, optionally only those of one identity
   * and/or one role.
   * @returns Number of credits removed
   */
  async removeCredits(entryId: Id, filter: RemoveCreditsFilter = {}): Promise<number> {
    return this.commit(
      {
        operationType: 'remove_credits',
        resourceType: 'association',
        resourceId: String(entryId),
        details: { ...filter },
      },
      async (repos) => {
        await requireEntry(repos, entryId);
        return repos.associations.delete({ entryId, ...filter });
      }
    );
  }

  // --- Identities ---

  async createIdentity(input: CreateIdentityInput): Promise<Identity> {
    return this.commit(
      { operationType: 'create_identity', resourceType: 'identity' },
      async (repos) => {
        const { id, name, aliasOfId } = parseInput(createIdentityInputSchema, input);
        if (id !== undefined && (await repos.identities.get(id))) {
          throw new ValidationError('DUPLICATE_IDENTITY', `Identity ${id} already exists`, { field: 'id' });
        }

        if (aliasOfId !== undefined && aliasOfId !== null) {
          if (id !== undefined) {
            await assertNoAliasCycle(repos.identities, id, aliasOfId, this.config.maxAliasHops);
          } else {
            await requireIdentity(repos, aliasOfId);
          }
        }

        return repos.identities.create({ id, name, aliasOfId });
      },
      (identity) => String(identity.id)
    );
  }

  /**
   * Make an identity an alias of another, or a root again with null.
   *
   * @throws CycleError if the target is the identity or one of its aliases
   */
  async setAliasOf(identityId: Id, targetId: Id | null): Promise<Identity> {
    return this.commit(
      {
        operationType: 'set_alias_of',
        resourceType: 'identity',
        resourceId: String(identityId),
        details: { targetId },
      },
      async (repos) => {
        await requireIdentity(repos, identityId);
        if (targetId !== null) {
          await assertNoAliasCycle(repos.identities, identityId, targetId, this.config.maxAliasHops);
        }

        const updated = await repos.identities.update(identityId, { aliasOfId: targetId });
        if (!updated) {
          throw new NotFoundError('identity', identityId);
        }
        return updated;
      }
    );
  }

  async renameIdentity(identityId: Id, name: string): Promise<Identity> {
    return this.commit(
      { operationType: 'rename_identity', resourceType: 'identity', resourceId: String(identityId) },
      async (repos) => {
        const parsed = parseInput(identityNameSchema, name);
        await requireIdentity(repos, identityId);

        const updated = await repos.identities.update(identityId, { name: parsed });
        if (!updated) {
          throw new NotFoundError('identity', identityId);
        }
        return updated;
      }
    );
  }

  // --- Reference tables ---

  async addLanguage(input: LanguageInput): Promise<Language> {
    return this.commit(
      { operationType: 'add_language', resourceType: 'language', resourceId: input.code },
      async (repos) => {
        const parsed = parseInput(languageInputSchema, input);
        const code = requireLanguageTag(parsed.code);

        if (await repos.reference.getLanguage(code)) {
          throw new ValidationError('DUPLICATE_LANGUAGE', `Language ${code} already exists`, { field: 'code' });
        }
        const languages = await repos.reference.listLanguages();
        if (languages.some((l) => l.description === parsed.description)) {
          throw new ValidationError(
            'DUPLICATE_LANGUAGE',
            `A language is already described as ${parsed.description}`,
            { field: 'description' }
          );
        }

        return repos.reference.addLanguage({ code, description: parsed.description });
      },
      (language) => language.code
    );
  }

  async updateLanguage(code: string, description: string): Promise<Language> {
    return this.commit(
      { operationType: 'update_language', resourceType: 'language', resourceId: code },
      async (repos) => {
        const normalized = requireLanguageTag(code);
        const parsed = parseInput(languageInputSchema.shape.description, description);

        if (!(await repos.reference.getLanguage(normalized))) {
          throw new NotFoundError('language', normalized);
        }
        const languages = await repos.reference.listLanguages();
        if (languages.some((l) => l.code !== normalized && l.description === parsed)) {
          throw new ValidationError('DUPLICATE_LANGUAGE', `A language is already described as ${parsed}`, {
            field: 'description',
          });
        }

        const updated = await repos.reference.updateLanguage(normalized, parsed);
        if (!updated) {
          throw new NotFoundError('language', normalized);
        }
        return updated;
      }
    );
  }

  /**
   * Delete a language. Refused while any entry is tagged with it.
   */
  async deleteLanguage(code: string): Promise<void> {
    return this.commit(
      { operationType: 'delete_language', resourceType: 'language', resourceId: code },
      async (repos) => {
        const normalized = requireLanguageTag(code);
        if (!(await repos.reference.getLanguage(normalized))) {
          throw new NotFoundError('language', normalized);
        }

        const inUse = await repos.entries.countByLanguage(normalized);
        if (inUse > 0) {
          throw new ValidationError('LANGUAGE_IN_USE', `Language ${normalized} is used by ${inUse} entries`, {
            field: 'code',
            details: { entries: inUse },
          });
        }

        await repos.reference.deleteLanguage(normalized);
      }
    );
  }

  async addTypeCategory(input: CategoryInput): Promise<TypeCategory> {
    return this.commit(
      { operationType: 'add_type_category', resourceType: 'type_category' },
      async (repos) => {
        const { id, description } = parseInput(categoryInputSchema, input);
        if (id !== undefined && (await repos.reference.getTypeCategory(id))) {
          throw new ValidationError('DUPLICATE_CATEGORY', `Type ${id} already exists`, { field: 'id' });
        }
        if (await repos.reference.getTypeCategoryByDescription(description)) {
          throw new ValidationError('DUPLICATE_CATEGORY', `Type ${description} already exists`, {
            field: 'description',
          });
        }
        return repos.reference.addTypeCategory({ id, description });
      },
      (category) => String(category.id)
    );
  }

  async addPublicationCategory(input: CategoryInput): Promise<PublicationCategory> {
    return this.commit(
      { operationType: 'add_publication_category', resourceType: 'publication_category' },
      async (repos) => {
        const { id, description } = parseInput(categoryInputSchema, input);
        if (id !== undefined && (await repos.reference.getPublicationCategory(id))) {
          throw new ValidationError('DUPLICATE_CATEGORY', `Publication type ${id} already exists`, {
            field: 'id',
          });
        }
        if (await repos.reference.getPublicationCategoryByDescription(description)) {
          throw new ValidationError('DUPLICATE_CATEGORY', `Publication type ${description} already exists`, {
            field: 'description',
          });
        }
        return repos.reference.addPublicationCategory({ id, description });
      },
      (category) => String(category.id)
    );
  }

  // --- Reads ---

  async getEntry(entryId: Id): Promise<Entry | null> {
    return this.repos.entries.get(entryId);
  }

  async getEntryByPath(path: string): Promise<Entry | null> {
    return this.repos.entries.getByPath(path);
  }

  /**
   * Title aliases of an entry in alphabetical order.
   */
  async titleAliases(entryId: Id): Promise<string[]> {
    const aliases = await this.repos.titleAliases.listByEntry(entryId);
    return aliases.map((a) => a.title);
  }

  /**
   * The manifest version a stored entry requires.
   */
  async inferVersion(entryId: Id): Promise<InferredVersion> {
    const entry = await requireEntry(this.repos, entryId);
    return inferVersion(entry, await loadVersionFacts(this.repos, entryId));
  }

  async resolveEntry(entryId: Id): Promise<ResolvedEntry> {
    return resolveEntry(this.repos, entryId);
  }

  /**
   * An entry with its aliases, credits and languages joined for display.
   */
  async entryInfo(entryId: Id): Promise<EntryInfo> {
    return toEntryInfo(await resolveEntry(this.repos, entryId));
  }

  /**
   * The file_id.diz text of an entry.
   *
   * @throws RenderError if the entry's fields are inconsistent
   */
  async render(entryId: Id): Promise<string> {
    return renderManifest(await resolveEntry(this.repos, entryId), this.renderOptions);
  }

  async getIdentity(identityId: Id): Promise<Identity | null> {
    return this.repos.identities.get(identityId);
  }

  async resolveRoot(identityId: Id): Promise<Identity> {
    return resolveRoot(this.repos.identities, identityId, this.config.maxAliasHops);
  }

  async aliasesOf(identityId: Id): Promise<Identity[]> {
    return aliasesOf(this.repos.identities, identityId, this.config.maxAliasHops);
  }

  async nextIndex(entryId: Id, role: AuthorRole): Promise<number> {
    return nextIndex(this.repos.associations, entryId, role);
  }

  async orderedAssociations(entryId: Id): Promise<CreditedName[]> {
    return orderedAssociations(this.repos.associations, entryId);
  }

  async namesForRole(entryId: Id, role: AuthorRole): Promise<string | null> {
    return namesForRole(this.repos.associations, entryId, role);
  }

  /**
   * Entries credited to an identity with the role of each credit, ordered
   * by title.
   */
  async titlesByIdentity(identityId: Id): Promise<CreditedTitle[]> {
    await requireIdentity(this.repos, identityId);
    return this.repos.associations.listTitlesByIdentity(identityId);
  }

  /**
   * Distinct entries credited to an identity, ordered by title.
   */
  async entriesByIdentity(identityId: Id): Promise<Entry[]> {
    const titles = await this.titlesByIdentity(identityId);
    const entries: Entry[] = [];
    const seen = new Set<Id>();
    for (const { entryId } of titles) {
      if (seen.has(entryId)) continue;
      seen.add(entryId);
      const entry = await this.repos.entries.get(entryId);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  async searchPaths(pattern: string): Promise<PathMatch[]> {
    return searchPaths(this.repos, pattern);
  }

  async searchTitles(pattern: string, options?: SearchOptions): Promise<TitleMatch[]> {
    return searchTitles(this.repos, pattern, options);
  }

  async searchIdentities(pattern: string, options?: SearchOptions): Promise<IdentityMatch[]> {
    return searchIdentities(this.repos, pattern, options);
  }

  async listLanguages(): Promise<Language[]> {
    return this.repos.reference.listLanguages();
  }

  async listTypeCategories(): Promise<TypeCategory[]> {
    return this.repos.reference.listTypeCategories();
  }

  async listPublicationCategories(): Promise<PublicationCategory[]> {
    return this.repos.reference.listPublicationCategories();
  }
}

/**
 * Create a new Catalog instance.
 */
export function createCatalog(options: CatalogOptions): Catalog {
  return new Catalog(options);
}
