import type { LoggingEventRecord, PropertyMap } from './types';

// Bit values are read back by filters on reference_flag; never renumber them.
export const PROPERTIES_EXIST = 0x01;
export const EXCEPTION_EXISTS = 0x02;
export const CALLER_DATA_EXISTS = 0x04;

function hasEntries(map: PropertyMap | null | undefined): boolean {
  return map != null && Object.keys(map).length > 0;
}

export function computeReferenceMask(event: LoggingEventRecord): number {
  let mask = 0;

  if (hasEntries(event.contextProperties) || hasEntries(event.mdcProperties)) {
    mask |= PROPERTIES_EXIST;
  }
  if (event.throwable != null) {
    mask |= EXCEPTION_EXISTS;
  }
  if (event.callerData.some((frame) => frame != null)) {
    mask |= CALLER_DATA_EXISTS;
  }

  return mask;
}
