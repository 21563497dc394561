// Pattern matching for the in-memory store, mirroring ILIKE:
// `_` matches one character, `%` any run, `\` escapes the next character.

import { foldDiacritics, type SearchOptions } from '@archivist/protocol';

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

/**
 * Compile a LIKE pattern into a case-insensitive, fully anchored RegExp.
 */
export function likeToRegExp(pattern: string): RegExp {
  let source = '';
  let escaped = false;

  for (const char of pattern) {
    if (escaped) {
      source += char.replace(REGEX_SPECIAL, '\\$&');
      escaped = false;
    } else if (char === '\\') {
      escaped = true;
    } else if (char === '%') {
      source += '.*';
    } else if (char === '_') {
      source += '.';
    } else {
      source += char.replace(REGEX_SPECIAL, '\\$&');
    }
  }

  // A trailing backslash matches itself
  if (escaped) source += '\\\\';

  return new RegExp(`^${source}$`, 'is');
}

/**
 * Test a value against a LIKE pattern. Null never matches.
 */
export function matchesLike(value: string | null, pattern: RegExp): boolean {
  return value !== null && pattern.test(value);
}

/**
 * Build a matcher for a search pattern. With `ignoreDiacritics` both the
 * pattern and each value are folded to ASCII before matching.
 */
export function createLikeMatcher(
  pattern: string,
  options: SearchOptions = {}
): (value: string | null) => boolean {
  const fold = options.ignoreDiacritics ? foldDiacritics : (text: string) => text;
  const re = likeToRegExp(fold(pattern));
  return (value) => value !== null && re.test(fold(value));
}
