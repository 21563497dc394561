export {
  DEFAULT_MAX_ALIAS_HOPS,
  resolveRoot,
  aliasesOf,
  assertNoAliasCycle,
  findOrCreateIdentity,
} from './graph.js';
