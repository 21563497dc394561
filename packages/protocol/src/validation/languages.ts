// Language tag utilities
//
// A tag is a two-letter primary language subtag with an optional two-letter
// region subtag, e.g. 'en', 'fr', 'en-US', 'pt-BR'. Input is accepted in any
// case and stored with the language in lower case and the region in upper case.

const LANGUAGE_TAG_PATTERN = /^[a-z]{2}(-[a-z]{2})?$/i;

/**
 * Check if a string is a language tag in any letter case.
 */
export function isValidLanguageTag(tag: string): boolean {
  return LANGUAGE_TAG_PATTERN.test(tag);
}

/**
 * Normalize a language tag's case ('EN-us' → 'en-US').
 *
 * @returns The normalized tag, or null if the input is not a language tag
 */
export function normalizeLanguageTag(tag: string): string | null {
  const trimmed = tag.trim();
  if (!isValidLanguageTag(trimmed)) return null;

  const [language, region] = trimmed.split('-');
  return region === undefined
    ? language.toLowerCase()
    : `${language.toLowerCase()}-${region.toUpperCase()}`;
}
