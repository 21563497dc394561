// @archivist/protocol
// Data model, manifest versions and input schemas shared by every package.

export * from './types/index.js';
export * from './validation/languages.js';
export * from './validation/diacritics.js';
export * from './validation/inputs.js';
