/**
 * Event Logger Module
 * Application-facing loggers that build logging events and hand them to an
 * appender without blocking the call site.
 */

import { isMainThread, threadId } from 'worker_threads';
import type { CallerFrame, LevelLabel, LoggingEventRecord, PropertyMap } from './appender/types';
import { captureCallerData } from './caller-data';
import { logger } from './logger';
import { getMdcPropertyMap } from './mdc';
import { throwableToLines } from './throwable';

export const LEVELS: Record<LevelLabel, number> = {
  TRACE: 0,
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

export function isLevelLabel(value: string): value is LevelLabel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Anything that accepts events fire-and-forget, such as DBAppender
 */
export interface EventSink {
  doAppend(event: LoggingEventRecord): Promise<boolean>;
}

/**
 * Context-scope properties shared by every logger created from it
 */
export class LoggerContext {
  private readonly properties = new Map<string, string>();

  constructor(
    readonly name: string,
    properties: PropertyMap = {}
  ) {
    for (const [key, value] of Object.entries(properties)) {
      this.properties.set(key, value);
    }
  }

  putProperty(key: string, value: string): void {
    this.properties.set(key, value);
  }

  getProperty(key: string): string | undefined {
    return this.properties.get(key);
  }

  getPropertyMap(): Record<string, string> {
    return Object.fromEntries(this.properties);
  }
}

export function createLoggerContext(name: string, properties?: PropertyMap): LoggerContext {
  return new LoggerContext(name, properties);
}

/**
 * Replace each `{}` with the next argument; extra placeholders stay as-is
 */
export function formatMessage(template: string, args: readonly unknown[]): string {
  let next = 0;
  return template.replace(/\{\}/g, (placeholder) =>
    next < args.length ? String(args[next++]) : placeholder
  );
}

export function currentThreadName(): string {
  return isMainThread ? 'main' : `worker-${threadId}`;
}

export interface EventLoggerOptions {
  context: LoggerContext;
  sink: EventSink;
  level?: LevelLabel;
  includeCallerData?: boolean;
  clock?: () => number;
}

export class EventLogger {
  private readonly context: LoggerContext;
  private readonly sink: EventSink;
  private readonly threshold: number;
  private readonly includeCallerData: boolean;
  private readonly clock: () => number;
  private readonly pending = new Set<Promise<void>>();

  constructor(
    readonly name: string,
    options: EventLoggerOptions
  ) {
    this.context = options.context;
    this.sink = options.sink;
    this.threshold = LEVELS[options.level ?? 'DEBUG'];
    this.includeCallerData = options.includeCallerData ?? true;
    this.clock = options.clock ?? Date.now;
  }

  isEnabled(level: LevelLabel): boolean {
    return LEVELS[level] >= this.threshold;
  }

  trace(message: string, ...args: unknown[]): void {
    this.log('TRACE', message, args, this.trace);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('DEBUG', message, args, this.debug);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('INFO', message, args, this.info);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('WARN', message, args, this.warn);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('ERROR', message, args, this.error);
  }

  /**
   * Resolves once every event logged so far has been handed off
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  private log(
    level: LevelLabel,
    message: string,
    args: unknown[],
    boundary: (...args: never[]) => unknown
  ): void {
    if (!this.isEnabled(level)) return;

    // A trailing Error is the event's throwable, not a message argument
    const last = args[args.length - 1];
    const thrown = last instanceof Error ? last : undefined;
    const messageArgs = thrown ? args.slice(0, -1) : args;

    const callerData: CallerFrame[] = this.includeCallerData ? captureCallerData(boundary) : [];

    const event: LoggingEventRecord = {
      timestamp: this.clock(),
      formattedMessage: formatMessage(message, messageArgs),
      loggerName: this.name,
      level,
      threadName: currentThreadName(),
      callerData,
      throwable: thrown ? throwableToLines(thrown) : null,
      contextProperties: this.context.getPropertyMap(),
      mdcProperties: getMdcPropertyMap(),
    };

    const handoff = this.sink
      .doAppend(event)
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.errorFromException(error, { source: 'event-logger' });
      })
      .finally(() => {
        this.pending.delete(handoff);
      });
    this.pending.add(handoff);
  }
}
