/**
 * Wire a started appender from configuration
 */

import { loadConfig, type AppenderConfig } from './config';
import { createPool, PgConnectionSource } from './database/postgres';
import { openSqliteDatabase, SqliteConnectionSource } from './database/sqlite';
import type { ConnectionSource } from './database/types';
import { EventLogger, LoggerContext } from './event-logger';
import type { StatusReporter } from './logger';
import { DBAppender } from './appender/db-appender';
import type { PropertyMap } from './appender/types';

export function createConnectionSource(config: AppenderConfig): ConnectionSource {
  switch (config.dialect) {
    case 'postgresql':
      return new PgConnectionSource(createPool(config.postgres), {
        capabilities: config.capabilities,
        ownsPool: true,
      });
    case 'sqlite':
      return new SqliteConnectionSource(openSqliteDatabase(config.sqlitePath), {
        capabilities: config.capabilities,
        ownsDatabase: true,
      });
  }
}

export function createDBAppender(config: AppenderConfig, status?: StatusReporter): DBAppender {
  const appender = new DBAppender(createConnectionSource(config), {
    transactional: config.transactional,
    onRowCountMismatch: config.onRowCountMismatch,
    closeSourceOnStop: true,
    status,
  });
  appender.start();
  return appender;
}

export function createDBAppenderFromEnv(env: NodeJS.ProcessEnv = process.env): DBAppender {
  return createDBAppender(loadConfig(env));
}

export interface LoggingSetup {
  appender: DBAppender;
  context: LoggerContext;
  getLogger(name: string): EventLogger;
  /** Flush every logger handed out, then stop the appender */
  shutdown(): Promise<void>;
}

export function createLogging(
  config: AppenderConfig,
  contextName: string,
  contextProperties?: PropertyMap
): LoggingSetup {
  const appender = createDBAppender(config);
  const context = new LoggerContext(contextName, contextProperties);
  const loggers = new Map<string, EventLogger>();

  return {
    appender,
    context,
    getLogger(name: string): EventLogger {
      let eventLogger = loggers.get(name);
      if (!eventLogger) {
        eventLogger = new EventLogger(name, {
          context,
          sink: appender,
          level: config.level,
          includeCallerData: config.includeCallerData,
        });
        loggers.set(name, eventLogger);
      }
      return eventLogger;
    },
    async shutdown(): Promise<void> {
      await Promise.all(Array.from(loggers.values(), (eventLogger) => eventLogger.flush()));
      await appender.stop();
    },
  };
}

export function createLoggingFromEnv(
  contextName: string,
  contextProperties?: PropertyMap,
  env: NodeJS.ProcessEnv = process.env
): LoggingSetup {
  return createLogging(loadConfig(env), contextName, contextProperties);
}
