export {
  CREDIT_SEPARATOR,
  nextIndex,
  orderedAssociations,
  joinNamesForRole,
  namesForRole,
} from './credits.js';
