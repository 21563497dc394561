// Tests for write-input schemas

import { describe, it, expect } from 'vitest';
import {
  createEntryInputSchema,
  updateEntryInputSchema,
  addCreditInputSchema,
  isoDateSchema,
} from './inputs.js';

describe('createEntryInputSchema', () => {
  it('normalizes empty text to null', () => {
    const parsed = createEntryInputSchema.parse({
      path: 'games/arcade/rolanrop.zip',
      title: '  Roland on the Ropes ',
      company: '',
      protection: '   ',
    });

    expect(parsed.title).toBe('Roland on the Ropes');
    expect(parsed.company).toBeNull();
    expect(parsed.protection).toBeNull();
    expect(parsed.comments).toBeUndefined();
  });

  it('requires a path', () => {
    expect(createEntryInputSchema.safeParse({ title: 'No path' }).success).toBe(false);
  });

  it('rejects unknown fields', () => {
    const result = createEntryInputSchema.safeParse({ path: 'a.zip', colour: 'red' });
    expect(result.success).toBe(false);
  });

  it('accepts credits with roles from the canonical list', () => {
    const parsed = createEntryInputSchema.parse({
      path: 'a.zip',
      credits: [{ identityName: 'Amsoft', role: 'PUBLISHER' }],
    });
    expect(parsed.credits).toEqual([{ identityName: 'Amsoft', role: 'PUBLISHER' }]);

    const invalid = createEntryInputSchema.safeParse({
      path: 'a.zip',
      credits: [{ identityName: 'Amsoft', role: 'PRODUCER' }],
    });
    expect(invalid.success).toBe(false);
  });
});

describe('updateEntryInputSchema', () => {
  it('does not accept a path change', () => {
    expect(updateEntryInputSchema.safeParse({ path: 'b.zip' }).success).toBe(false);
  });
});

describe('addCreditInputSchema', () => {
  it('requires exactly one identity reference', () => {
    expect(
      addCreditInputSchema.safeParse({ entryId: 1, role: 'AUTHOR' }).success
    ).toBe(false);
    expect(
      addCreditInputSchema.safeParse({
        entryId: 1,
        identityId: 2,
        identityName: 'Nich',
        role: 'AUTHOR',
      }).success
    ).toBe(false);
    expect(
      addCreditInputSchema.safeParse({ entryId: 1, identityId: 2, role: 'AUTHOR' }).success
    ).toBe(true);
  });
});

describe('isoDateSchema', () => {
  it('accepts calendar dates', () => {
    expect(isoDateSchema.safeParse('2002-10-14').success).toBe(true);
  });

  it('rejects impossible dates and other formats', () => {
    expect(isoDateSchema.safeParse('2002-02-30').success).toBe(false);
    expect(isoDateSchema.safeParse('14/10/2002').success).toBe(false);
  });
});
