// Field Validator
//
// Cross-field rules checked on every entry write before anything is stored.
// Checks run inside the write's transaction, so the facts they read (aliases,
// credits, reference rows) are the ones the write commits against.

import type { ZodType, ZodTypeDef } from 'zod';
import {
  isCrackPublication,
  isVersionAtLeast,
  isPresent,
  isSet,
  normalizeLanguageTag,
  type EntryFields,
} from '@archivist/protocol';
import type { RepositoryContext } from '@archivist/repositories';
import { inferVersion, fieldVersion, type VersionFacts } from '../versions/index.js';
import { NotFoundError, ValidationError } from '../errors.js';

/**
 * Memory sizes (in kilobytes) a manifest may state.
 */
export const VALID_MEMORY_SIZES: readonly number[] = [64, 128, 256];

/**
 * Parse input with a zod schema, turning schema failures into a
 * ValidationError that names the first offending field.
 */
export function parseInput<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  input: unknown
): Output {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
  throw new ValidationError('INVALID_INPUT', issue ? issue.message : 'Invalid input', {
    field,
    details: { issues: result.error.issues },
  });
}

/**
 * Normalize language tags and check each is a known language.
 * @returns The tags in canonical case, sorted and without repeats
 */
export async function validateLanguages(
  repos: RepositoryContext,
  tags: readonly string[]
): Promise<string[]> {
  const normalized = new Set<string>();

  for (const tag of tags) {
    const code = normalizeLanguageTag(tag);
    if (code === null) {
      throw new ValidationError('INVALID_LANGUAGE', `Invalid language tag: ${tag}`, {
        field: 'languages',
        details: { tag },
      });
    }
    normalized.add(code);
  }

  for (const code of normalized) {
    if (!(await repos.reference.getLanguage(code))) {
      throw new ValidationError('INVALID_LANGUAGE', `Unknown language: ${code}`, {
        field: 'languages',
        details: { tag: code },
      });
    }
  }

  return Array.from(normalized).sort();
}

/**
 * Validate the full field set an entry would have after a write.
 *
 * @param facts Title alias and credit facts as they will be after the write
 * @returns The fields with language tags normalized
 * @throws ValidationError naming the broken rule
 * @throws NotFoundError for an unknown type or publication id
 */
export async function validateEntryFields(
  repos: RepositoryContext,
  fields: EntryFields,
  facts: VersionFacts
): Promise<EntryFields> {
  if (isSet(fields.memoryRequired) && !VALID_MEMORY_SIZES.includes(fields.memoryRequired)) {
    throw new ValidationError(
      'INVALID_MEMORY',
      `Memory required must be one of ${VALID_MEMORY_SIZES.join(', ')}K, got ${fields.memoryRequired}`,
      { field: 'memoryRequired' }
    );
  }

  const version = inferVersion(fields, facts);
  if (version === 'INCONSISTENT') {
    throw new ValidationError(
      'INCONSISTENT_VERSION',
      'COMPANY and PROTECTED cannot be combined with fields from manifest version 3.00 onwards',
      { field: isPresent(fields.company) ? 'company' : 'protected' }
    );
  }

  const languages = await validateLanguages(repos, fields.languages);

  if (isSet(fields.typeId) && !(await repos.reference.getTypeCategory(fields.typeId))) {
    throw new NotFoundError('type_category', fields.typeId);
  }

  if (isSet(fields.publicationTypeId)) {
    const publication = await repos.reference.getPublicationCategory(fields.publicationTypeId);
    if (!publication) {
      throw new NotFoundError('publication_category', fields.publicationTypeId);
    }
    if (isPresent(fields.cheatMode) && !isCrackPublication(publication.description)) {
      throw new ValidationError(
        'CHEAT_MODE_NOT_CRACK',
        `Cheat mode can only be recorded for cracks, not for publication "${publication.description}"`,
        { field: 'cheatMode', details: { publication: publication.description } }
      );
    }
  }

  return { ...fields, languages };
}

/**
 * Refuse a credit on an entry whose own fields and aliases describe a
 * version 2.00 manifest, which has no credit lines.
 */
export function assertCreditsAllowed(fields: EntryFields, hasTitleAliases: boolean): void {
  const version = fieldVersion(fields, hasTitleAliases);
  if (!isVersionAtLeast(version, '3.00')) {
    throw new ValidationError(
      'VERSION_TOO_LOW',
      `Credits need manifest version 3.00 or later; the entry's fields give ${version}`,
      { details: { version } }
    );
  }
}
