/**
 * Database Module - Main Entry Point
 * Driver port, dialects and the PostgreSQL/SQLite adapters
 */

export * from './types';
export * from './dialect';
export * from './capabilities';
export { BaseStatement, countPlaceholders } from './statement';
export {
  PgConnection,
  PgConnectionSource,
  createPool,
  toMultiRowInsert,
  toNumberedPlaceholders,
  BATCH_ROW_COUNT_UNKNOWN,
  PG_MAX_PARAMETERS,
} from './postgres';
export { SqliteConnection, SqliteConnectionSource, openSqliteDatabase } from './sqlite';
