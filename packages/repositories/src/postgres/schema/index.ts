// Drizzle schema for the Postgres repositories

export { entityRecords, type EntityRecordRow, type NewEntityRecordRow } from './records.js';
