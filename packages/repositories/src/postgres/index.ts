export { createDatabase, databaseConfigFromEnv, type Database, type DatabaseConfig } from './db.js';
export * from './schema/index.js';
export * from './repositories/index.js';
