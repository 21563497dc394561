import type { Id } from './common.js';

/**
 * IETF language tag and its description (e.g. 'en-US' = 'English (American)').
 */
export type Language = {
  code: string;
  description: string;
};

/**
 * Program type (e.g. 'Arcade game', 'Utility').
 */
export type TypeCategory = {
  id: Id;
  description: string;
};

/**
 * Publication type (e.g. 'Commercial', 'Crack', 'Freeware').
 */
export type PublicationCategory = {
  id: Id;
  description: string;
};

/**
 * Publication types under which a cheat mode may be recorded.
 */
export const CRACK_PUBLICATIONS: readonly string[] = ['Crack', 'Crack with modifications'];

export function isCrackPublication(description: string): boolean {
  return CRACK_PUBLICATIONS.includes(description);
}
