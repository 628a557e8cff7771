/**
 * Parameter bookkeeping shared by the driver adapters
 */

import type { PreparedStatement, SqlValue } from './types';

export function countPlaceholders(sql: string): number {
  return sql.match(/\?/g)?.length ?? 0;
}

export abstract class BaseStatement implements PreparedStatement {
  readonly sql: string;
  protected readonly parameterCount: number;
  private params: SqlValue[];
  private batch: SqlValue[][] = [];
  private closed = false;

  constructor(sql: string) {
    this.sql = sql;
    this.parameterCount = countPlaceholders(sql);
    this.params = new Array<SqlValue>(this.parameterCount).fill(null);
  }

  protected abstract run(params: SqlValue[]): Promise<number>;
  protected abstract runBatch(rows: SqlValue[][]): Promise<number[]>;
  abstract getGeneratedKey(): Promise<SqlValue>;

  set(position: number, value: SqlValue): void {
    this.ensureOpen();
    if (!Number.isInteger(position) || position < 1 || position > this.parameterCount) {
      throw new RangeError(
        `Parameter position ${position} out of range 1..${this.parameterCount}`
      );
    }
    this.params[position - 1] = value;
  }

  async executeUpdate(): Promise<number> {
    this.ensureOpen();
    return this.run([...this.params]);
  }

  addBatch(): void {
    this.ensureOpen();
    this.batch.push([...this.params]);
  }

  async executeBatch(): Promise<number[]> {
    this.ensureOpen();
    const rows = this.batch;
    this.batch = [];
    if (rows.length === 0) return [];
    return this.runBatch(rows);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.batch = [];
  }

  protected ensureOpen(): void {
    if (this.closed) {
      throw new Error(`Statement already closed: ${this.sql}`);
    }
  }
}
