// Postgres implementation (drizzle-orm over postgres.js)

export { createDatabase, loadDatabaseConfig, type Database, type DatabaseConfig } from './db.js';
export * from './repositories/index.js';
export * as schema from './schema/index.js';
