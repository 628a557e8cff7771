/**
 * SQLite driver adapter
 * Wraps a better-sqlite3 database behind the statement/connection port.
 */

import Database from 'better-sqlite3';
import type { DriverCapabilities } from '../appender/types';
import { resolveCapabilities } from './capabilities';
import { BaseStatement } from './statement';
import type {
  ConnectionSource,
  PooledConnection,
  PrepareOptions,
  PreparedStatement,
  SqlValue,
} from './types';

const SQLITE_CAPABILITIES: DriverCapabilities = {
  generatedKeys: true,
  batchUpdates: true,
};

function toSqliteValue(value: unknown): SqlValue | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') {
    return value;
  }
  return String(value);
}

class SqliteStatement extends BaseStatement {
  private readonly statement: Database.Statement<SqlValue[]>;
  private lastInsertRowid: number | bigint | null = null;

  constructor(
    private readonly db: Database.Database,
    sql: string,
    private readonly generatedKeyColumn?: string
  ) {
    super(sql);
    this.statement = db.prepare<SqlValue[]>(sql);
  }

  protected async run(params: SqlValue[]): Promise<number> {
    const result = this.statement.run(...params);
    this.lastInsertRowid = result.lastInsertRowid;
    return result.changes;
  }

  /**
   * Runs the queued rows in one transaction, a savepoint when the
   * connection is already inside one.
   */
  protected async runBatch(rows: SqlValue[][]): Promise<number[]> {
    const runAll = this.db.transaction((queued: SqlValue[][]) =>
      queued.map((params) => this.statement.run(...params).changes)
    );
    return runAll(rows);
  }

  async getGeneratedKey(): Promise<SqlValue> {
    this.ensureOpen();
    if (!this.generatedKeyColumn) return null;
    return this.lastInsertRowid;
  }
}

export class SqliteConnection implements PooledConnection {
  readonly dialect = 'sqlite' as const;

  constructor(private readonly db: Database.Database) {}

  prepareStatement(sql: string, options?: PrepareOptions): PreparedStatement {
    return new SqliteStatement(this.db, sql, options?.generatedKeyColumn);
  }

  async queryScalar(sql: string): Promise<SqlValue | undefined> {
    const value: unknown = this.db.prepare(sql).pluck().get();
    return toSqliteValue(value);
  }

  async begin(): Promise<void> {
    this.db.exec('BEGIN');
  }

  async commit(): Promise<void> {
    this.db.exec('COMMIT');
  }

  async rollback(): Promise<void> {
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK');
    }
  }

  /** The database handle is shared, nothing to hand back */
  async release(): Promise<void> {}
}

export class SqliteConnectionSource implements ConnectionSource {
  readonly dialect = 'sqlite' as const;
  readonly capabilities: Readonly<DriverCapabilities>;
  private readonly ownsDatabase: boolean;

  constructor(
    private readonly db: Database.Database,
    options?: { capabilities?: Partial<DriverCapabilities>; ownsDatabase?: boolean }
  ) {
    this.capabilities = resolveCapabilities(SQLITE_CAPABILITIES, options?.capabilities);
    this.ownsDatabase = options?.ownsDatabase ?? false;
  }

  async getConnection(): Promise<PooledConnection> {
    return new SqliteConnection(this.db);
  }

  async close(): Promise<void> {
    if (this.ownsDatabase && this.db.open) {
      this.db.close();
    }
  }
}

/**
 * Open a SQLite database file
 */
export function openSqliteDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  // DELETE journal mode shares state reliably when several processes log to one file
  db.pragma('journal_mode = DELETE');
  db.pragma('synchronous = FULL');
  db.pragma('foreign_keys = ON');
  return db;
}
