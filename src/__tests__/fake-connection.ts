/**
 * In-process stand-in for the driver port, recording every call
 */

import type { DriverCapabilities } from '../appender/types';
import type { SqlDialectName } from '../database/dialect';
import type {
  ConnectionSource,
  PooledConnection,
  PrepareOptions,
  PreparedStatement,
  SqlValue,
} from '../database/types';

const PARENT_INSERT = 'INSERT INTO logging_event (';

export interface FakeBehaviour {
  /** Affected rows reported by the parent insert */
  parentRowCount?: number;
  /** Overrides what getGeneratedKey returns */
  generatedKey?: SqlValue;
  /** Overrides what the "last inserted id" query returns */
  scalarResult?: SqlValue;
  failPrepare?: RegExp;
  failExecute?: RegExp;
  failScalar?: boolean;
  failRollback?: boolean;
}

export class FakeStatement implements PreparedStatement {
  params: Array<SqlValue | undefined> = [];
  readonly updates: Array<Array<SqlValue | undefined>> = [];
  readonly batches: Array<Array<Array<SqlValue | undefined>>> = [];
  closed = false;
  private queued: Array<Array<SqlValue | undefined>> = [];
  private generated: SqlValue = null;

  constructor(
    readonly sql: string,
    private readonly connection: FakeConnection,
    readonly generatedKeyColumn?: string
  ) {}

  set(position: number, value: SqlValue): void {
    this.params[position - 1] = value;
  }

  async executeUpdate(): Promise<number> {
    this.connection.log.push(`executeUpdate ${this.sql}`);
    this.failIfConfigured();
    this.updates.push([...this.params]);
    if (this.sql.startsWith(PARENT_INSERT)) {
      this.generated = this.connection.insertParent();
      return this.connection.behaviour.parentRowCount ?? 1;
    }
    return 1;
  }

  addBatch(): void {
    this.queued.push([...this.params]);
  }

  async executeBatch(): Promise<number[]> {
    this.connection.log.push(`executeBatch ${this.sql}`);
    this.failIfConfigured();
    const rows = this.queued;
    this.queued = [];
    this.batches.push(rows);
    return rows.map(() => 1);
  }

  async getGeneratedKey(): Promise<SqlValue> {
    this.connection.log.push('getGeneratedKey');
    if (!this.generatedKeyColumn) return null;
    const { behaviour } = this.connection;
    return behaviour.generatedKey !== undefined ? behaviour.generatedKey : this.generated;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private failIfConfigured(): void {
    const pattern = this.connection.behaviour.failExecute;
    if (pattern && pattern.test(this.sql)) {
      throw new Error(`simulated failure: ${this.sql}`);
    }
  }
}

export class FakeConnection implements PooledConnection {
  readonly statements: FakeStatement[] = [];
  readonly scalarQueries: string[] = [];
  readonly log: string[] = [];
  released = false;
  releaseError: Error | undefined;
  private lastId = 0;

  constructor(
    readonly dialect: SqlDialectName = 'sqlite',
    readonly behaviour: FakeBehaviour = {}
  ) {}

  insertParent(): number {
    this.lastId += 1;
    return this.lastId;
  }

  prepareStatement(sql: string, options?: PrepareOptions): PreparedStatement {
    this.log.push(`prepare ${sql}`);
    if (this.behaviour.failPrepare && this.behaviour.failPrepare.test(sql)) {
      throw new Error(`simulated prepare failure: ${sql}`);
    }
    const statement = new FakeStatement(sql, this, options?.generatedKeyColumn);
    this.statements.push(statement);
    return statement;
  }

  /** Prepared statements whose SQL targets `table` */
  statementsFor(table: string): FakeStatement[] {
    return this.statements.filter((statement) => statement.sql.startsWith(`INSERT INTO ${table} (`));
  }

  async queryScalar(sql: string): Promise<SqlValue | undefined> {
    this.scalarQueries.push(sql);
    this.log.push(`queryScalar ${sql}`);
    if (this.behaviour.failScalar) {
      throw new Error('simulated scalar failure');
    }
    return this.behaviour.scalarResult !== undefined ? this.behaviour.scalarResult : this.lastId;
  }

  async begin(): Promise<void> {
    this.log.push('BEGIN');
  }

  async commit(): Promise<void> {
    this.log.push('COMMIT');
  }

  async rollback(): Promise<void> {
    this.log.push('ROLLBACK');
    if (this.behaviour.failRollback) {
      throw new Error('simulated rollback failure');
    }
  }

  async release(error?: Error): Promise<void> {
    this.released = true;
    this.releaseError = error;
  }
}

export class FakeConnectionSource implements ConnectionSource {
  readonly connections: FakeConnection[] = [];
  closed = false;

  constructor(
    readonly capabilities: Readonly<DriverCapabilities>,
    private readonly behaviour: FakeBehaviour = {},
    readonly dialect: SqlDialectName = 'sqlite'
  ) {}

  async getConnection(): Promise<PooledConnection> {
    const connection = new FakeConnection(this.dialect, this.behaviour);
    this.connections.push(connection);
    return connection;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
