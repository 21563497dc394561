// Re-export all schema tables
export * from './reference.js';
export * from './entries.js';
export * from './identities.js';
