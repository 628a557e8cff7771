/**
 * Child row writers for the property and exception tables
 */

import type { DbConnection, PreparedStatement } from '../database/types';
import { toWriteError } from './errors';
import type { MergedPropertyMap } from './property-merger';
import { INSERT_EXCEPTION_SQL, INSERT_PROPERTY_SQL } from './sql';
import type { AppendState, DriverCapabilities } from './types';

export interface ChildRowSpec<Row> {
  /** Table label used in error messages */
  table: string;
  sql: string;
  /** State the sequence is in while these rows are written */
  state: AppendState;
  bind(statement: PreparedStatement, eventId: number, row: Row, index: number): void;
}

/**
 * Insert one row per entry, all referencing the parent event. With batch
 * support the rows go out in one executeBatch call, otherwise each row is
 * executed as it is bound. An empty collection prepares nothing.
 */
export async function writeChildRows<Row>(
  connection: DbConnection,
  capabilities: Readonly<DriverCapabilities>,
  spec: ChildRowSpec<Row>,
  eventId: number,
  rows: Iterable<Row>
): Promise<number> {
  const pending = Array.from(rows);
  if (pending.length === 0) return 0;

  let statement: PreparedStatement | null = null;
  try {
    statement = connection.prepareStatement(spec.sql);
    for (const [index, row] of pending.entries()) {
      spec.bind(statement, eventId, row, index);
      if (capabilities.batchUpdates) {
        statement.addBatch();
      } else {
        await statement.executeUpdate();
      }
    }
    if (capabilities.batchUpdates) {
      await statement.executeBatch();
    }
    return pending.length;
  } catch (error) {
    throw toWriteError(error, `Failed to insert ${spec.table} rows for event ${eventId}`, spec.state);
  } finally {
    if (statement) {
      await statement.close();
    }
  }
}

export const PROPERTY_ROWS: ChildRowSpec<[string, string]> = {
  table: 'logging_event_property',
  sql: INSERT_PROPERTY_SQL,
  state: 'KeyResolved',
  bind(statement, eventId, [key, value]) {
    statement.set(1, eventId);
    statement.set(2, key);
    statement.set(3, value);
  },
};

export const EXCEPTION_ROWS: ChildRowSpec<string> = {
  table: 'logging_event_exception',
  sql: INSERT_EXCEPTION_SQL,
  state: 'PropertiesWritten',
  bind(statement, eventId, line, index) {
    statement.set(1, eventId);
    statement.set(2, index);
    statement.set(3, line);
  },
};

export function insertProperties(
  connection: DbConnection,
  capabilities: Readonly<DriverCapabilities>,
  eventId: number,
  properties: MergedPropertyMap
): Promise<number> {
  return writeChildRows(connection, capabilities, PROPERTY_ROWS, eventId, properties.entries());
}

export function insertThrowable(
  connection: DbConnection,
  capabilities: Readonly<DriverCapabilities>,
  eventId: number,
  traceLines: readonly string[]
): Promise<number> {
  return writeChildRows(connection, capabilities, EXCEPTION_ROWS, eventId, traceLines);
}
