import type { LoggingEventRecord } from '../appender/types';

export function makeEvent(overrides: Partial<LoggingEventRecord> = {}): LoggingEventRecord {
  return {
    timestamp: 1700000000000,
    formattedMessage: 'hello',
    loggerName: 'app.service.Orders',
    level: 'INFO',
    threadName: 'main',
    callerData: [],
    throwable: null,
    contextProperties: null,
    mdcProperties: null,
    ...overrides,
  };
}

export const CALLER = {
  fileName: 'orders.ts',
  className: 'OrderService',
  methodName: 'place',
  lineNumber: 42,
};
