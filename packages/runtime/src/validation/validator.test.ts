// Tests for the field validator

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { emptyEntryFields, type EntryFields } from '@archivist/protocol';
import { createInMemoryRepositoryContext } from '@archivist/repositories';
import type { InMemoryRepositoryContext } from '@archivist/repositories';
import {
  parseInput,
  validateLanguages,
  validateEntryFields,
  assertCreditsAllowed,
} from './validator.js';
import { NO_VERSION_FACTS } from '../versions/index.js';
import { NotFoundError, ValidationError } from '../errors.js';

function fields(overrides: Partial<EntryFields> = {}): EntryFields {
  return { ...emptyEntryFields(), ...overrides };
}

async function ruleOf(promise: Promise<unknown>): Promise<string | undefined> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  return error instanceof ValidationError ? error.rule : undefined;
}

describe('field validator', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(async () => {
    repos = createInMemoryRepositoryContext();
    await repos.reference.addLanguage({ code: 'en', description: 'English' });
    await repos.reference.addLanguage({ code: 'en-US', description: 'English (American)' });
    await repos.reference.addTypeCategory({ id: 1, description: 'Arcade game' });
    await repos.reference.addPublicationCategory({ id: 1, description: 'Commercial' });
    await repos.reference.addPublicationCategory({ id: 2, description: 'Crack' });
    await repos.reference.addPublicationCategory({ id: 3, description: 'Freeware' });
    await repos.reference.addPublicationCategory({ id: 4, description: 'Crack with modifications' });
  });

  describe('parseInput', () => {
    it('returns parsed data', () => {
      expect(parseInput(z.object({ n: z.number() }), { n: 1 })).toEqual({ n: 1 });
    });

    it('raises INVALID_INPUT naming the field', () => {
      try {
        parseInput(z.object({ n: z.number() }), { n: 'one' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({ rule: 'INVALID_INPUT', field: 'n' });
      }
    });
  });

  describe('validateLanguages', () => {
    it('normalizes case, sorts and drops repeats', async () => {
      expect(await validateLanguages(repos, ['EN-us', 'en', 'En'])).toEqual(['en', 'en-US']);
    });

    it('rejects a malformed tag', async () => {
      expect(await ruleOf(validateLanguages(repos, ['english']))).toBe('INVALID_LANGUAGE');
    });

    it('rejects a well-formed tag missing from the language table', async () => {
      expect(await ruleOf(validateLanguages(repos, ['fr']))).toBe('INVALID_LANGUAGE');
    });
  });

  describe('validateEntryFields', () => {
    it('accepts a plain 2.00 entry', async () => {
      const result = await validateEntryFields(
        repos,
        fields({ title: 'Chuckie Egg', company: 'A&F', languages: ['EN'] }),
        NO_VERSION_FACTS
      );
      expect(result.languages).toEqual(['en']);
    });

    it.each([64, 128, 256])('accepts memory %i', async (memoryRequired) => {
      await expect(
        validateEntryFields(repos, fields({ memoryRequired }), NO_VERSION_FACTS)
      ).resolves.toMatchObject({ memoryRequired });
    });

    it('rejects memory outside the allowed sizes', async () => {
      expect(
        await ruleOf(validateEntryFields(repos, fields({ memoryRequired: 100 }), NO_VERSION_FACTS))
      ).toBe('INVALID_MEMORY');
    });

    it('rejects legacy fields on a 3.00 entry', async () => {
      const facts = { ...NO_VERSION_FACTS, hasAssociations: true };
      expect(await ruleOf(validateEntryFields(repos, fields({ company: 'Amsoft' }), facts))).toBe(
        'INCONSISTENT_VERSION'
      );
    });

    it('rejects cheat mode on a publication that is not a crack', async () => {
      const entry = fields({ cheatMode: 'Yes', publicationTypeId: 3 });
      expect(await ruleOf(validateEntryFields(repos, entry, NO_VERSION_FACTS))).toBe(
        'CHEAT_MODE_NOT_CRACK'
      );
    });

    it('accepts cheat mode on either crack publication', async () => {
      for (const publicationTypeId of [2, 4]) {
        const entry = fields({ cheatMode: 'Yes', publicationTypeId });
        await expect(validateEntryFields(repos, entry, NO_VERSION_FACTS)).resolves.toMatchObject({
          cheatMode: 'Yes',
        });
      }
    });

    it('accepts cheat mode when no publication is set', async () => {
      const entry = fields({ cheatMode: 'Yes' });
      await expect(validateEntryFields(repos, entry, NO_VERSION_FACTS)).resolves.toMatchObject({
        cheatMode: 'Yes',
      });
    });

    it('raises NotFoundError for unknown categories', async () => {
      await expect(
        validateEntryFields(repos, fields({ typeId: 9 }), NO_VERSION_FACTS)
      ).rejects.toBeInstanceOf(NotFoundError);
      await expect(
        validateEntryFields(repos, fields({ publicationTypeId: 9 }), NO_VERSION_FACTS)
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('assertCreditsAllowed', () => {
    it('refuses a 2.00 entry', () => {
      expect(() => assertCreditsAllowed(fields({ title: 'Chuckie Egg' }), false)).toThrow(
        ValidationError
      );
    });

    it('allows an entry whose fields or aliases reach 3.00', () => {
      expect(() => assertCreditsAllowed(fields({ memoryRequired: 64 }), false)).not.toThrow();
      expect(() => assertCreditsAllowed(fields(), true)).not.toThrow();
    });
  });
});
