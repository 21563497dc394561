// Common types used across the protocol

/**
 * Integer identifier assigned by the store
 */
export type Id = number;

/**
 * Calendar date in ISO 8601 form (YYYY-MM-DD)
 */
export type IsoDate = string;

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * A text value counts as present when it is non-null and non-empty.
 */
export function isPresent(value: string | null | undefined): value is string {
  return value !== null && value !== undefined && value !== '';
}

/**
 * A value counts as set when it is neither null nor undefined.
 */
export function isSet<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

/**
 * Ordering used for titles, aliases and language names: case-insensitive,
 * with the exact code-unit order as a tie-break so results stay deterministic.
 */
export function compareText(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
