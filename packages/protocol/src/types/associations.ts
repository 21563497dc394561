import type { Id } from './common.js';

/**
 * Roles under which an identity can be credited, in canonical order.
 * Rendering and listing follow this order.
 */
export const AUTHOR_ROLES = [
  'PUBLISHER',
  'RE-RELEASED BY',
  'CRACKER',
  'DEVELOPER',
  'AUTHOR',
  'DESIGNER',
  'ARTIST',
  'MUSICIAN',
] as const;

export type AuthorRole = (typeof AUTHOR_ROLES)[number];

export function isAuthorRole(value: string): value is AuthorRole {
  return (AUTHOR_ROLES as readonly string[]).includes(value);
}

/**
 * Position of a role in the canonical order.
 */
export function roleRank(role: AuthorRole): number {
  return AUTHOR_ROLES.indexOf(role);
}

/**
 * A credit: one identity under one role on one entry, at a display index.
 */
export type Association = {
  entryId: Id;
  identityId: Id;
  role: AuthorRole;
  /** Zero-based position among the credits of the same role */
  index: number;
};

/**
 * An association joined with the stored display name of its identity.
 */
export type CreditedName = Association & {
  name: string;
};
