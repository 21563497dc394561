// Re-export all protocol types

export * from './common.js';
export * from './entries.js';
export * from './identities.js';
export * from './associations.js';
export * from './reference.js';
export * from './manifest.js';
export * from './catalog.js';
