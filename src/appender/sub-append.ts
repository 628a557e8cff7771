/**
 * Write sequence for one event:
 * parent row -> event id -> property rows -> exception rows.
 *
 * Opens no transaction of its own. Run it inside one (see DBAppender's
 * `transactional` option) when the three inserts must land together.
 */

import type { DbConnection, PreparedStatement } from '../database/types';
import { insertProperties, insertThrowable } from './child-batch-writer';
import { AppenderError, WriteError, type IntegrityWarning } from './errors';
import { writeEventRow } from './event-row-writer';
import { resolveEventId, type KeyStrategy } from './key-resolver';
import { mergeEventProperties } from './property-merger';
import type {
  AppendResult,
  AppendState,
  DriverCapabilities,
  LoggingEventRecord,
  RowCountMismatchPolicy,
} from './types';

export interface SubAppendOptions {
  capabilities: Readonly<DriverCapabilities>;
  keyStrategy: KeyStrategy;
  /**
   * `warn` reports the mismatch and still resolves the id, which may then
   * belong to some other row. `abort` fails the event instead.
   */
  onRowCountMismatch: RowCountMismatchPolicy;
  onWarning(warning: IntegrityWarning): void;
}

export async function subAppend(
  event: LoggingEventRecord,
  connection: DbConnection,
  insertStatement: PreparedStatement,
  options: SubAppendOptions
): Promise<AppendResult> {
  let state: AppendState = 'Idle';

  try {
    const outcome = await writeEventRow(insertStatement, event);
    state = 'ParentWritten';
    if (outcome.warning) {
      options.onWarning(outcome.warning);
      if (options.onRowCountMismatch === 'abort') {
        throw new WriteError(
          `Logging event insert affected ${outcome.rowCount} rows, expected 1`,
          { code: 'row_count_mismatch', state }
        );
      }
    }

    const eventId = await resolveEventId(options.keyStrategy, insertStatement, connection);
    state = 'KeyResolved';

    const propertyRows = await insertProperties(
      connection,
      options.capabilities,
      eventId,
      mergeEventProperties(event)
    );
    state = 'PropertiesWritten';

    let exceptionRows = 0;
    if (event.throwable != null) {
      exceptionRows = await insertThrowable(
        connection,
        options.capabilities,
        eventId,
        event.throwable
      );
      state = 'ExceptionsWritten';
    }

    return { eventId, propertyRows, exceptionRows, state };
  } catch (error) {
    if (error instanceof AppenderError) throw error;
    throw new WriteError(`Failed to append logging event: ${String(error)}`, {
      cause: error,
      state,
    });
  }
}
