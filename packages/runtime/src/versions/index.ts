export {
  inferVersion,
  fieldVersion,
  NO_VERSION_FACTS,
  type VersionFacts,
  type VersionedFields,
} from './inference.js';
export { loadVersionFacts } from './facts.js';
