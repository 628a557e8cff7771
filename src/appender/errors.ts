/**
 * Appender error model
 */

import type { AppendState } from './types';

export type AppenderErrorCode =
  | 'write_failed'
  | 'key_unresolved'
  | 'row_count_mismatch'
  | 'not_started'
  | 'invalid_config';

export class AppenderError extends Error {
  readonly code: AppenderErrorCode;
  /** Last state the append sequence reached before failing */
  readonly state?: AppendState;

  constructor(
    code: AppenderErrorCode,
    message: string,
    options?: { cause?: unknown; state?: AppendState }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AppenderError';
    this.code = code;
    this.state = options?.state;
  }
}

/**
 * A statement against the store failed to execute
 */
export class WriteError extends AppenderError {
  constructor(
    message: string,
    options?: { cause?: unknown; state?: AppendState; code?: 'write_failed' | 'row_count_mismatch' }
  ) {
    super(options?.code ?? 'write_failed', message, options);
    this.name = 'WriteError';
  }
}

/**
 * The generated id of the parent row could not be obtained
 */
export class KeyResolutionError extends AppenderError {
  constructor(message: string, options?: { cause?: unknown; state?: AppendState }) {
    super('key_unresolved', message, options);
    this.name = 'KeyResolutionError';
  }
}

/**
 * Non-fatal finding reported through the status channel
 */
export interface IntegrityWarning {
  kind: 'row_count_mismatch';
  expected: 1;
  actual: number;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap a driver failure as a WriteError, leaving appender errors untouched
 */
export function toWriteError(error: unknown, message: string, state?: AppendState): AppenderError {
  if (error instanceof AppenderError) return error;
  return new WriteError(`${message}: ${describeError(error)}`, { cause: error, state });
}
