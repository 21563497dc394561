// Tests for language tag utilities

import { describe, it, expect } from 'vitest';
import { isValidLanguageTag, normalizeLanguageTag } from './languages.js';

describe('isValidLanguageTag', () => {
  it('accepts primary subtags with and without a region', () => {
    expect(isValidLanguageTag('en')).toBe(true);
    expect(isValidLanguageTag('en-US')).toBe(true);
    expect(isValidLanguageTag('pt-BR')).toBe(true);
  });

  it('accepts tags in any letter case', () => {
    expect(isValidLanguageTag('EN')).toBe(true);
    expect(isValidLanguageTag('en-us')).toBe(true);
  });

  it('rejects malformed tags', () => {
    expect(isValidLanguageTag('')).toBe(false);
    expect(isValidLanguageTag('eng')).toBe(false);
    expect(isValidLanguageTag('en_US')).toBe(false);
    expect(isValidLanguageTag('en-USA')).toBe(false);
    expect(isValidLanguageTag('e1')).toBe(false);
  });
});

describe('normalizeLanguageTag', () => {
  it('lower-cases the language and upper-cases the region', () => {
    expect(normalizeLanguageTag('EN')).toBe('en');
    expect(normalizeLanguageTag('EN-us')).toBe('en-US');
    expect(normalizeLanguageTag(' fr ')).toBe('fr');
  });

  it('returns null for invalid tags', () => {
    expect(normalizeLanguageTag('english')).toBeNull();
    expect(normalizeLanguageTag('en-')).toBeNull();
  });
});
