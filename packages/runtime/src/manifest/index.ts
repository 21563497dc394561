export {
  renderManifest,
  platformFor,
  formatUploaded,
  DEFAULT_PLATFORM_PREFIXES,
  DEFAULT_RENDER_OPTIONS,
  type RenderOptions,
} from './renderer.js';
export { resolveEntry, toEntryInfo, type EntryInfo } from './resolve.js';
export {
  readManifest,
  type ManifestDocument,
  type ManifestReadResult,
  type ManifestWarning,
  type ManifestWarningCode,
} from './reader.js';
export { MANIFEST_FIELDS, MANDATORY_FIELDS, type ManifestFieldSpec } from './fields.js';
