/**
 * Mapped diagnostic context
 * Event-scope properties that follow the async call chain, copied into
 * every event logged within it.
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { PropertyMap } from './appender/types';

const storage = new AsyncLocalStorage<Map<string, string>>();

// Used outside any runWithMdc scope
const rootContext = new Map<string, string>();

function currentContext(): Map<string, string> {
  return storage.getStore() ?? rootContext;
}

/**
 * Run `fn` with the current entries plus `properties` in scope
 */
export function runWithMdc<T>(properties: PropertyMap, fn: () => T): T {
  const scoped = new Map(currentContext());
  for (const [key, value] of Object.entries(properties)) {
    scoped.set(key, value);
  }
  return storage.run(scoped, fn);
}

export function putMdc(key: string, value: string): void {
  currentContext().set(key, value);
}

export function getMdc(key: string): string | undefined {
  return currentContext().get(key);
}

export function removeMdc(key: string): void {
  currentContext().delete(key);
}

export function clearMdc(): void {
  currentContext().clear();
}

/** Snapshot of the entries in scope */
export function getMdcPropertyMap(): Record<string, string> {
  return Object.fromEntries(currentContext());
}
