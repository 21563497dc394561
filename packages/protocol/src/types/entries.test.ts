// Tests for entry field helpers

import { describe, it, expect } from 'vitest';
import { emptyEntryFields, mergeEntryFields } from './entries.js';
import { isSet } from './common.js';

describe('mergeEntryFields', () => {
  const base = { ...emptyEntryFields(), title: 'A', year: 1986, memoryRequired: 128 };

  it('keeps fields whose change is missing or undefined', () => {
    const merged = mergeEntryFields(base, { title: 'B', year: undefined });

    expect(merged).toEqual({ ...base, title: 'B' });
  });

  it('clears fields whose change is null', () => {
    const merged = mergeEntryFields(base, { memoryRequired: null });

    expect(merged.memoryRequired).toBeNull();
    expect(merged.year).toBe(1986);
  });

  it('never copies an undefined value into the result', () => {
    const merged = mergeEntryFields(emptyEntryFields(), { publicationTypeId: undefined, languages: undefined });

    expect(merged.publicationTypeId).toBeNull();
    expect(merged.languages).toEqual([]);
  });
});

describe('isSet', () => {
  it('is false for null and undefined only', () => {
    expect(isSet(null)).toBe(false);
    expect(isSet(undefined)).toBe(false);
    expect(isSet(0)).toBe(true);
    expect(isSet('')).toBe(true);
  });
});
