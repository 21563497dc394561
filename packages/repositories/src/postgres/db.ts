import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { z } from 'zod';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
};

const databaseEnvSchema = z.object({
  DATABASE_URL: z.string().url(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().optional(),
});

/**
 * Read the database configuration from environment variables.
 *
 * DATABASE_URL is required; DATABASE_MAX_CONNECTIONS defaults to 10.
 */
export function loadDatabaseConfig(
  env: Record<string, string | undefined> = process.env
): DatabaseConfig {
  const parsed = databaseEnvSchema.parse(env);
  return {
    connectionString: parsed.DATABASE_URL,
    maxConnections: parsed.DATABASE_MAX_CONNECTIONS,
  };
}

/**
 * Create a database connection and Drizzle instance.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase(loadDatabaseConfig());
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
  });

  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];
