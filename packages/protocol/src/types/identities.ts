import type { Id } from './common.js';

/**
 * A credited person or organization.
 *
 * `aliasOfId` points at the identity this one is an alternate name of. The
 * alias-of links form a forest: every identity has at most one target and
 * following targets always ends at a root.
 */
export type Identity = {
  id: Id;
  name: string;
  aliasOfId: Id | null;
};
