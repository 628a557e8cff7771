/**
 * Driver port shared by the PostgreSQL and SQLite adapters
 */

import type { DriverCapabilities } from '../appender/types';
import type { SqlDialectName } from './dialect';

export type SqlValue = string | number | bigint | null;

export interface PrepareOptions {
  /** Column whose generated value should be retrievable after executeUpdate */
  generatedKeyColumn?: string;
}

/**
 * Parameterized statement with `?` placeholders, positions are 1-based.
 * Positions left unset bind as SQL NULL.
 */
export interface PreparedStatement {
  readonly sql: string;
  set(position: number, value: SqlValue): void;
  executeUpdate(): Promise<number>;
  addBatch(): void;
  executeBatch(): Promise<number[]>;
  /** First generated key of the last executeUpdate, null when none was returned */
  getGeneratedKey(): Promise<SqlValue>;
  close(): Promise<void>;
}

export interface DbConnection {
  readonly dialect: SqlDialectName;
  prepareStatement(sql: string, options?: PrepareOptions): PreparedStatement;
  queryScalar(sql: string): Promise<SqlValue | undefined>;
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface PooledConnection extends DbConnection {
  /** Passing an error tells the pool to discard the connection instead of reusing it */
  release(error?: Error): Promise<void>;
}

export interface ConnectionSource {
  readonly dialect: SqlDialectName;
  readonly capabilities: Readonly<DriverCapabilities>;
  getConnection(): Promise<PooledConnection>;
  close(): Promise<void>;
}

/**
 * Stored rows, as read back by tests and operators
 */
export interface LoggingEventRow {
  event_id: number;
  timestmp: number;
  formatted_message: string;
  logger_name: string;
  level_string: string;
  thread_name: string | null;
  reference_flag: number | null;
  caller_filename: string | null;
  caller_class: string | null;
  caller_method: string | null;
  caller_line: string | null;
}

export interface LoggingEventPropertyRow {
  event_id: number;
  mapped_key: string;
  mapped_value: string | null;
}

export interface LoggingEventExceptionRow {
  event_id: number;
  i: number;
  trace_line: string;
}
