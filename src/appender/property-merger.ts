import type { LoggingEventRecord, PropertyMap } from './types';

export type MergedPropertyMap = Map<string, string>;

/**
 * Context-scope entries first, then event-scope entries on top; the event
 * wins on a shared key. Absent maps count as empty.
 */
export function mergePropertyMaps(
  contextProperties?: PropertyMap | null,
  eventProperties?: PropertyMap | null
): MergedPropertyMap {
  const merged: MergedPropertyMap = new Map();
  for (const source of [contextProperties, eventProperties]) {
    if (!source) continue;
    for (const [key, value] of Object.entries(source)) {
      merged.set(key, value);
    }
  }
  return merged;
}

export function mergeEventProperties(event: LoggingEventRecord): MergedPropertyMap {
  return mergePropertyMaps(event.contextProperties, event.mdcProperties);
}
