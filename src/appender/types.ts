/**
 * Shared appender types
 */

export type LevelLabel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type PropertyMap = Readonly<Record<string, string>>;

/**
 * One frame of the call stack at the point the event was logged
 */
export interface CallerFrame {
  fileName: string;
  className: string;
  methodName: string;
  lineNumber: number;
}

/**
 * A fully built logging event, read-only to the appender
 */
export interface LoggingEventRecord {
  /** Epoch millis */
  timestamp: number;
  formattedMessage: string;
  loggerName: string;
  level: LevelLabel;
  threadName: string;
  callerData: ReadonlyArray<CallerFrame | null>;
  /** Formatted stack trace lines, or null when no throwable was logged */
  throwable: readonly string[] | null;
  contextProperties?: PropertyMap | null;
  mdcProperties?: PropertyMap | null;
}

/**
 * Driver features, resolved once when the connection source is built
 */
export interface DriverCapabilities {
  generatedKeys: boolean;
  batchUpdates: boolean;
}

export type RowCountMismatchPolicy = 'warn' | 'abort';

export type AppendState =
  | 'Idle'
  | 'ParentWritten'
  | 'KeyResolved'
  | 'PropertiesWritten'
  | 'ExceptionsWritten'
  | 'Aborted';

export interface AppendResult {
  eventId: number;
  propertyRows: number;
  exceptionRows: number;
  state: AppendState;
}
