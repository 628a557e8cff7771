/**
 * PostgreSQL driver adapter
 * Wraps a pg PoolClient behind the statement/connection port.
 */

import { Pool, type PoolClient, type PoolConfig } from 'pg';
import type { DriverCapabilities } from '../appender/types';
import { logger } from '../logger';
import { resolveCapabilities } from './capabilities';
import { BaseStatement } from './statement';
import type {
  ConnectionSource,
  PooledConnection,
  PrepareOptions,
  PreparedStatement,
  SqlValue,
} from './types';

const PG_CAPABILITIES: DriverCapabilities = {
  generatedKeys: true,
  batchUpdates: true,
};

/**
 * Rewrite `?` placeholders into pg's numbered `$n` form
 */
export function toNumberedPlaceholders(sql: string): string {
  let position = 0;
  return sql.replace(/\?/g, () => `$${++position}`);
}

/** Bind parameters pg accepts in one query */
export const PG_MAX_PARAMETERS = 65535;

const VALUES_TUPLE = /^(.*\bVALUES\s*)(\([^()]*\))\s*$/is;

/**
 * Repeat the VALUES tuple of a single-row insert `rows` times, numbered
 * continuously. Null when the statement is not of that shape.
 */
export function toMultiRowInsert(sql: string, rows: number): string | null {
  const match = VALUES_TUPLE.exec(sql.trim());
  if (!match || match[1].includes('?')) return null;

  const [, head, tuple] = match;
  return toNumberedPlaceholders(`${head}${Array.from({ length: rows }, () => tuple).join(', ')}`);
}

export function toSqlValue(value: unknown): SqlValue | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') {
    return value;
  }
  return String(value);
}

/**
 * Per-row counts for a multi-row insert. A total other than one per row
 * cannot be attributed, so every row gets BATCH_ROW_COUNT_UNKNOWN.
 */
export const BATCH_ROW_COUNT_UNKNOWN = -2;

function spreadRowCount(total: number, rows: number): number[] {
  return new Array<number>(rows).fill(total === rows ? 1 : BATCH_ROW_COUNT_UNKNOWN);
}

class PgStatement extends BaseStatement {
  private readonly text: string;
  private lastRows: Record<string, unknown>[] = [];

  constructor(
    private readonly client: PoolClient,
    sql: string,
    private readonly generatedKeyColumn?: string
  ) {
    super(sql);
    const numbered = toNumberedPlaceholders(sql);
    this.text = generatedKeyColumn ? `${numbered} RETURNING ${generatedKeyColumn}` : numbered;
  }

  protected async run(params: SqlValue[]): Promise<number> {
    const result = await this.client.query<Record<string, unknown>>(this.text, params);
    this.lastRows = result.rows;
    return result.rowCount ?? 0;
  }

  /**
   * Send the queued rows as one multi-row INSERT per chunk of at most
   * PG_MAX_PARAMETERS parameters. Statements that are not a single VALUES
   * tuple run row by row.
   */
  protected async runBatch(rows: SqlValue[][]): Promise<number[]> {
    const chunkSize = Math.max(1, Math.floor(PG_MAX_PARAMETERS / Math.max(1, this.parameterCount)));
    const counts: number[] = [];

    for (let start = 0; start < rows.length; start += chunkSize) {
      const chunk = rows.slice(start, start + chunkSize);
      const text = toMultiRowInsert(this.sql, chunk.length);
      if (text === null) {
        for (const params of chunk) {
          counts.push(await this.run(params));
        }
        continue;
      }

      const result = await this.client.query(text, chunk.flat());
      counts.push(...spreadRowCount(result.rowCount ?? 0, chunk.length));
    }
    return counts;
  }

  async getGeneratedKey(): Promise<SqlValue> {
    this.ensureOpen();
    if (!this.generatedKeyColumn) return null;
    return toSqlValue(this.lastRows[0]?.[this.generatedKeyColumn]) ?? null;
  }
}

export class PgConnection implements PooledConnection {
  readonly dialect = 'postgresql' as const;

  constructor(private readonly client: PoolClient) {}

  prepareStatement(sql: string, options?: PrepareOptions): PreparedStatement {
    return new PgStatement(this.client, sql, options?.generatedKeyColumn);
  }

  async queryScalar(sql: string): Promise<SqlValue | undefined> {
    const result = await this.client.query<unknown[]>({ text: sql, rowMode: 'array' });
    return toSqlValue(result.rows[0]?.[0]);
  }

  async begin(): Promise<void> {
    await this.client.query('BEGIN');
  }

  async commit(): Promise<void> {
    await this.client.query('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.client.query('ROLLBACK');
  }

  async release(error?: Error): Promise<void> {
    this.client.release(error);
  }
}

export class PgConnectionSource implements ConnectionSource {
  readonly dialect = 'postgresql' as const;
  readonly capabilities: Readonly<DriverCapabilities>;
  private readonly ownsPool: boolean;

  constructor(
    private readonly pool: Pool,
    options?: { capabilities?: Partial<DriverCapabilities>; ownsPool?: boolean }
  ) {
    this.capabilities = resolveCapabilities(PG_CAPABILITIES, options?.capabilities);
    this.ownsPool = options?.ownsPool ?? false;
  }

  async getConnection(): Promise<PooledConnection> {
    const client = await this.pool.connect();
    return new PgConnection(client);
  }

  async close(): Promise<void> {
    if (this.ownsPool) {
      await this.pool.end();
    }
  }
}

/**
 * Build a pool that reports idle-client failures to the diagnostic channel
 */
export function createPool(config: PoolConfig): Pool {
  const pool = new Pool(config);

  pool.on('error', (err) => {
    logger.error('Unexpected error on idle PostgreSQL client', {
      source: 'postgres',
      context: { error: err.message },
    });
  });

  pool.on('connect', () => {
    logger.debug('New PostgreSQL client connected', { source: 'postgres' });
  });

  return pool;
}
