/**
 * Log event store
 * Persists logging events into logging_event, logging_event_property and
 * logging_event_exception.
 */

export * from './appender/types';
export * from './appender/errors';
export * from './appender/sql';
export { computeReferenceMask, PROPERTIES_EXIST, EXCEPTION_EXISTS, CALLER_DATA_EXISTS } from './appender/reference-mask';
export { mergePropertyMaps, mergeEventProperties, type MergedPropertyMap } from './appender/property-merger';
export { bindLoggingEvent, bindCallerData, writeEventRow, type EventRowOutcome } from './appender/event-row-writer';
export { resolveEventId, selectKeyStrategy, toEventId, type KeyStrategy } from './appender/key-resolver';
export {
  writeChildRows,
  insertProperties,
  insertThrowable,
  PROPERTY_ROWS,
  EXCEPTION_ROWS,
  type ChildRowSpec,
} from './appender/child-batch-writer';
export { subAppend, type SubAppendOptions } from './appender/sub-append';
export { DBAppender, type DBAppenderOptions } from './appender/db-appender';
export * from './database';
export { loadConfig, type AppenderConfig, type StoreDialect } from './config';
export {
  createConnectionSource,
  createDBAppender,
  createDBAppenderFromEnv,
  createLogging,
  createLoggingFromEnv,
  type LoggingSetup,
} from './setup';
export {
  EventLogger,
  LoggerContext,
  createLoggerContext,
  formatMessage,
  LEVELS,
  type EventLoggerOptions,
  type EventSink,
} from './event-logger';
export { runWithMdc, putMdc, getMdc, removeMdc, clearMdc, getMdcPropertyMap } from './mdc';
export { captureCallerData, parseStackFrame, parseStackTrace } from './caller-data';
export { throwableToLines } from './throwable';
export { logger, type LogOptions, type StatusReporter } from './logger';
