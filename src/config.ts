/**
 * Configuration from environment
 */

import path from 'path';
import type { PoolConfig } from 'pg';
import { AppenderError } from './appender/errors';
import type { DriverCapabilities, LevelLabel, RowCountMismatchPolicy } from './appender/types';
import { isLevelLabel } from './event-logger';

export type StoreDialect = 'postgresql' | 'sqlite';

export interface AppenderConfig {
  dialect: StoreDialect;
  postgres: PoolConfig;
  sqlitePath: string;
  transactional: boolean;
  onRowCountMismatch: RowCountMismatchPolicy;
  /** Forced capability values; unset ones come from the driver */
  capabilities: Partial<DriverCapabilities>;
  level: LevelLabel;
  includeCallerData: boolean;
}

function invalid(name: string, value: string, expected: string): AppenderError {
  return new AppenderError('invalid_config', `${name}=${value} is invalid, expected ${expected}`);
}

function parseBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw invalid(name, raw, 'true or false');
  }
}

function parsePort(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const port = parseInt(raw, 10);
  if (!Number.isInteger(port) || port <= 0 || String(port) !== raw.trim()) {
    throw invalid(name, raw, 'a port number');
  }
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppenderConfig {
  const dialect = env.LOG_DB_DIALECT || 'postgresql';
  if (dialect !== 'postgresql' && dialect !== 'sqlite') {
    throw invalid('LOG_DB_DIALECT', dialect, 'postgresql or sqlite');
  }

  const onRowCountMismatch = env.LOG_DB_ON_ROW_MISMATCH || 'warn';
  if (onRowCountMismatch !== 'warn' && onRowCountMismatch !== 'abort') {
    throw invalid('LOG_DB_ON_ROW_MISMATCH', onRowCountMismatch, 'warn or abort');
  }

  const level = (env.LOG_LEVEL || 'DEBUG').toUpperCase();
  if (!isLevelLabel(level)) {
    throw invalid('LOG_LEVEL', level, 'TRACE, DEBUG, INFO, WARN or ERROR');
  }

  const capabilities: Partial<DriverCapabilities> = {};
  const generatedKeys = parseBoolean(env, 'LOG_DB_GENERATED_KEYS');
  if (generatedKeys !== undefined) capabilities.generatedKeys = generatedKeys;
  const batchUpdates = parseBoolean(env, 'LOG_DB_BATCH_UPDATES');
  if (batchUpdates !== undefined) capabilities.batchUpdates = batchUpdates;

  const sqliteName = env.NODE_ENV === 'test' ? 'logging.test.db' : 'logging.db';

  return {
    dialect,
    postgres: {
      host: env.POSTGRES_HOST || 'localhost',
      port: parsePort(env, 'POSTGRES_PORT', 5432),
      database: env.POSTGRES_DB || 'logging',
      user: env.POSTGRES_USER || 'logging',
      password: env.POSTGRES_PASSWORD || '',
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    },
    sqlitePath: env.LOG_DB_SQLITE_PATH || path.join(process.cwd(), sqliteName),
    transactional: parseBoolean(env, 'LOG_DB_TRANSACTIONAL') ?? false,
    onRowCountMismatch,
    capabilities,
    level,
    includeCallerData: parseBoolean(env, 'LOG_CALLER_DATA') ?? true,
  };
}
