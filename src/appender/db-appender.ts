/**
 * Database appender
 * Owns the connection source, prepares the parent insert for each event and
 * runs the write sequence. Appends are serialised: one event at a time.
 */

import { describeCapabilities } from '../database/capabilities';
import type { ConnectionSource, PooledConnection, PreparedStatement } from '../database/types';
import { logger, type StatusReporter } from '../logger';
import { AppenderError, describeError, toWriteError, type IntegrityWarning } from './errors';
import { selectKeyStrategy } from './key-resolver';
import { EVENT_ID_COLUMN, INSERT_EVENT_SQL } from './sql';
import { subAppend, type SubAppendOptions } from './sub-append';
import type {
  AppendResult,
  DriverCapabilities,
  LoggingEventRecord,
  RowCountMismatchPolicy,
} from './types';

export interface DBAppenderOptions {
  /** Wrap the three inserts of each event in BEGIN/COMMIT */
  transactional?: boolean;
  onRowCountMismatch?: RowCountMismatchPolicy;
  /** Close the connection source on stop() */
  closeSourceOnStop?: boolean;
  status?: StatusReporter;
}

const STATUS_SOURCE = 'db-appender';

export class DBAppender {
  private readonly transactional: boolean;
  private readonly onRowCountMismatch: RowCountMismatchPolicy;
  private readonly closeSourceOnStop: boolean;
  private readonly status: StatusReporter;
  private writeOptions: SubAppendOptions | null = null;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly source: ConnectionSource,
    options: DBAppenderOptions = {}
  ) {
    this.transactional = options.transactional ?? false;
    this.onRowCountMismatch = options.onRowCountMismatch ?? 'warn';
    this.closeSourceOnStop = options.closeSourceOnStop ?? false;
    this.status = options.status ?? logger;
  }

  get isStarted(): boolean {
    return this.writeOptions !== null;
  }

  get capabilities(): Readonly<DriverCapabilities> | null {
    return this.writeOptions?.capabilities ?? null;
  }

  /**
   * Read the source's capabilities once; every later append reuses them
   */
  start(): void {
    if (this.writeOptions) return;

    const capabilities = Object.freeze({ ...this.source.capabilities });
    this.writeOptions = Object.freeze({
      capabilities,
      keyStrategy: selectKeyStrategy(capabilities),
      onRowCountMismatch: this.onRowCountMismatch,
      onWarning: (warning: IntegrityWarning) => this.reportWarning(warning),
    });

    logger.debug(`Appender started on ${this.source.dialect}`, {
      source: STATUS_SOURCE,
      context: {
        capabilities: describeCapabilities(capabilities),
        transactional: this.transactional,
      },
    });
  }

  /**
   * Persist one event. Failures propagate to the caller.
   */
  append(event: LoggingEventRecord): Promise<AppendResult> {
    const writeOptions = this.writeOptions;
    if (!writeOptions) {
      return Promise.reject(
        new AppenderError('not_started', 'Appender must be started before appending')
      );
    }

    const run = this.tail.then(() => this.appendNow(event, writeOptions));
    this.tail = run.catch(() => undefined);
    return run;
  }

  /**
   * Persist one event without ever rejecting; failures go to the status
   * channel and resolve to false.
   */
  async doAppend(event: LoggingEventRecord): Promise<boolean> {
    try {
      await this.append(event);
      return true;
    } catch (error) {
      this.status.error(`Problem appending event: ${describeError(error)}`, {
        source: STATUS_SOURCE,
        context: {
          logger: event.loggerName,
          ...(error instanceof AppenderError ? { code: error.code, state: error.state } : {}),
        },
      });
      return false;
    }
  }

  /**
   * Wait for queued appends, then release the source if this appender owns it
   */
  async stop(): Promise<void> {
    this.writeOptions = null;
    await this.tail;
    if (this.closeSourceOnStop) {
      await this.source.close();
    }
  }

  private async appendNow(
    event: LoggingEventRecord,
    writeOptions: SubAppendOptions
  ): Promise<AppendResult> {
    let connection: PooledConnection;
    try {
      connection = await this.source.getConnection();
    } catch (error) {
      throw toWriteError(error, 'Failed to obtain a connection', 'Idle');
    }

    let releaseError: Error | undefined;
    try {
      if (!this.transactional) {
        return await this.writeEvent(event, connection, writeOptions);
      }

      try {
        await connection.begin();
      } catch (error) {
        throw toWriteError(error, 'Failed to begin transaction', 'Idle');
      }
      try {
        const result = await this.writeEvent(event, connection, writeOptions);
        await connection.commit();
        return result;
      } catch (error) {
        releaseError = await this.rollbackQuietly(connection);
        throw toWriteError(error, 'Failed to commit logging event');
      }
    } finally {
      await connection.release(releaseError);
    }
  }

  private async writeEvent(
    event: LoggingEventRecord,
    connection: PooledConnection,
    writeOptions: SubAppendOptions
  ): Promise<AppendResult> {
    let insertStatement: PreparedStatement;
    try {
      insertStatement = connection.prepareStatement(
        INSERT_EVENT_SQL,
        writeOptions.capabilities.generatedKeys ? { generatedKeyColumn: EVENT_ID_COLUMN } : undefined
      );
    } catch (error) {
      throw toWriteError(error, 'Failed to prepare logging event insert', 'Idle');
    }

    try {
      return await subAppend(event, connection, insertStatement, writeOptions);
    } finally {
      await insertStatement.close();
    }
  }

  /**
   * Resolves to the rollback failure, if any, so the connection can be
   * released as broken.
   */
  private async rollbackQuietly(connection: PooledConnection): Promise<Error | undefined> {
    try {
      await connection.rollback();
      return undefined;
    } catch (error) {
      this.status.error(`Rollback failed: ${describeError(error)}`, { source: STATUS_SOURCE });
      return error instanceof Error ? error : new Error(describeError(error));
    }
  }

  private reportWarning(warning: IntegrityWarning): void {
    this.status.warning('Failed to insert logging event', {
      source: STATUS_SOURCE,
      context: { ...warning },
    });
  }
}
