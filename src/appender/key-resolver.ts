/**
 * Generated-key resolution for the parent row
 *
 * The primary strategy is picked once from the driver capabilities:
 * - `generated-keys` reads the key returned by the insert statement itself
 * - `select-insert-id` runs the dialect's "last inserted id" query on the
 *   same connection, which only holds while nothing else inserts on it
 */

import { getSelectInsertIdSql } from '../database/dialect';
import type { DbConnection, PreparedStatement, SqlValue } from '../database/types';
import { KeyResolutionError, describeError } from './errors';
import type { DriverCapabilities } from './types';

export type KeyStrategy = 'generated-keys' | 'select-insert-id';

export function selectKeyStrategy(capabilities: Readonly<DriverCapabilities>): KeyStrategy {
  return capabilities.generatedKeys ? 'generated-keys' : 'select-insert-id';
}

/**
 * Accepts the shapes drivers hand back for integer keys (number, bigint,
 * numeric string) and rejects anything that is not a safe positive integer.
 */
export function toEventId(value: SqlValue | undefined): number | null {
  if (value === null || value === undefined) return null;

  let id: number;
  if (typeof value === 'number') {
    id = value;
  } else if (typeof value === 'bigint') {
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) return null;
    id = Number(value);
  } else if (/^\d+$/.test(value.trim())) {
    id = Number(value.trim());
  } else {
    return null;
  }

  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

async function readKey(
  strategy: KeyStrategy,
  insertStatement: PreparedStatement,
  connection: DbConnection
): Promise<SqlValue | undefined> {
  if (strategy === 'generated-keys') {
    return insertStatement.getGeneratedKey();
  }
  return connection.queryScalar(getSelectInsertIdSql(connection.dialect));
}

/**
 * Read the id of the row the insert statement just wrote. When generated
 * keys fail or come back empty, the dialect query gets one attempt.
 */
export async function resolveEventId(
  strategy: KeyStrategy,
  insertStatement: PreparedStatement,
  connection: DbConnection
): Promise<number> {
  const attempts: KeyStrategy[] =
    strategy === 'generated-keys' ? ['generated-keys', 'select-insert-id'] : ['select-insert-id'];
  const failures: string[] = [];
  let lastError: unknown;

  for (const attempt of attempts) {
    try {
      const eventId = toEventId(await readKey(attempt, insertStatement, connection));
      if (eventId !== null) return eventId;
      failures.push(`${attempt}: no usable id`);
    } catch (error) {
      lastError = error;
      failures.push(`${attempt}: ${describeError(error)}`);
    }
  }

  throw new KeyResolutionError(`Failed to resolve generated event id (${failures.join('; ')})`, {
    cause: lastError,
    state: 'ParentWritten',
  });
}
