import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { z } from 'zod';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
};

/**
 * Create a database connection and Drizzle instance.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase({
 *   connectionString: process.env.DATABASE_URL
 * });
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

const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().url(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().optional(),
});

/**
 * Read a DatabaseConfig from environment variables.
 *
 * - `DATABASE_URL` (required)
 * - `DATABASE_MAX_CONNECTIONS` (optional, defaults to 10 in createDatabase)
 *
 * @throws ZodError if DATABASE_URL is missing or malformed
 */
export function databaseConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): DatabaseConfig {
  const parsed = DatabaseEnvSchema.parse(env);
  return {
    connectionString: parsed.DATABASE_URL,
    maxConnections: parsed.DATABASE_MAX_CONNECTIONS,
  };
}
