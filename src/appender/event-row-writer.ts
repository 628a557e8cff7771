/**
 * Parent row binding and execution
 */

import type { PreparedStatement } from '../database/types';
import { toWriteError, type IntegrityWarning } from './errors';
import { computeReferenceMask } from './reference-mask';
import { EVENT_COLUMNS } from './sql';
import type { CallerFrame, LoggingEventRecord } from './types';

export function bindLoggingEvent(statement: PreparedStatement, event: LoggingEventRecord): void {
  statement.set(EVENT_COLUMNS.timestamp, event.timestamp);
  statement.set(EVENT_COLUMNS.formattedMessage, event.formattedMessage);
  statement.set(EVENT_COLUMNS.loggerName, event.loggerName);
  statement.set(EVENT_COLUMNS.level, event.level);
  statement.set(EVENT_COLUMNS.threadName, event.threadName);
  statement.set(EVENT_COLUMNS.referenceFlag, computeReferenceMask(event));
}

/**
 * Only the first frame is stored. Without one, the caller columns stay unset.
 */
export function bindCallerData(
  statement: PreparedStatement,
  callerData: ReadonlyArray<CallerFrame | null>
): void {
  const frame = callerData[0];
  if (frame == null) return;

  statement.set(EVENT_COLUMNS.callerFilename, frame.fileName);
  statement.set(EVENT_COLUMNS.callerClass, frame.className);
  statement.set(EVENT_COLUMNS.callerMethod, frame.methodName);
  statement.set(EVENT_COLUMNS.callerLine, String(frame.lineNumber));
}

export interface EventRowOutcome {
  rowCount: number;
  /** Present when the insert did not touch exactly one row */
  warning?: IntegrityWarning;
}

/**
 * Bind all ten columns and execute the parent insert
 */
export async function writeEventRow(
  statement: PreparedStatement,
  event: LoggingEventRecord
): Promise<EventRowOutcome> {
  let rowCount: number;
  try {
    bindLoggingEvent(statement, event);
    bindCallerData(statement, event.callerData);
    rowCount = await statement.executeUpdate();
  } catch (error) {
    throw toWriteError(error, 'Failed to insert logging event', 'Idle');
  }

  if (rowCount !== 1) {
    return { rowCount, warning: { kind: 'row_count_mismatch', expected: 1, actual: rowCount } };
  }
  return { rowCount };
}
