export {
  VALID_MEMORY_SIZES,
  parseInput,
  validateLanguages,
  validateEntryFields,
  assertCreditsAllowed,
} from './validator.js';
