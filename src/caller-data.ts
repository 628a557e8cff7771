/**
 * Caller data
 * Turns V8 stack traces into caller frames for logging events.
 */

import path from 'path';
import type { CallerFrame } from './appender/types';

export const NA = '?';

const FRAME_PATTERN = /^\s*at\s+(?:(?:async\s+)?(?:new\s+)?(.*?)\s+\()?(.+?):(\d+):\d+\)?\s*$/;

/**
 * Parse one `    at Type.method (/path/file.ts:12:3)` line
 */
export function parseStackFrame(line: string): CallerFrame | null {
  const match = FRAME_PATTERN.exec(line);
  if (!match) return null;

  const [, descriptor, location, lineNumber] = match;
  const fileName = path.basename(location.replace(/^file:\/\//, ''));

  let className = NA;
  let methodName = NA;
  if (descriptor) {
    const name = descriptor.replace(/\s+\[as [^\]]+\]$/, '');
    const dot = name.lastIndexOf('.');
    if (dot > 0) {
      className = name.slice(0, dot);
      methodName = name.slice(dot + 1);
    } else {
      methodName = name;
    }
  }

  return { fileName, className, methodName, lineNumber: Number(lineNumber) };
}

export function parseStackTrace(stack: string): CallerFrame[] {
  const frames: CallerFrame[] = [];
  for (const line of stack.split('\n')) {
    const frame = parseStackFrame(line);
    if (frame) frames.push(frame);
  }
  return frames;
}

/**
 * Frames of the current call stack, starting below `boundary` (the
 * outermost logging function the application called).
 */
export function captureCallerData(boundary: (...args: never[]) => unknown): CallerFrame[] {
  const holder = new Error();
  Error.captureStackTrace(holder, boundary);
  return holder.stack ? parseStackTrace(holder.stack) : [];
}
