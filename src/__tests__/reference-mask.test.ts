import { describe, it, expect } from 'vitest';
import {
  computeReferenceMask,
  PROPERTIES_EXIST,
  EXCEPTION_EXISTS,
  CALLER_DATA_EXISTS,
} from '../appender/reference-mask';
import { makeEvent, CALLER } from './fixtures';

describe('computeReferenceMask', () => {
  it('should be 0 for an event without optional data', () => {
    expect(computeReferenceMask(makeEvent())).toBe(0);
  });

  it('should keep the stored bit values', () => {
    expect(PROPERTIES_EXIST).toBe(1);
    expect(EXCEPTION_EXISTS).toBe(2);
    expect(CALLER_DATA_EXISTS).toBe(4);
  });

  it('should set the properties bit for context or event properties', () => {
    expect(computeReferenceMask(makeEvent({ contextProperties: { env: 'prod' } }))).toBe(PROPERTIES_EXIST);
    expect(computeReferenceMask(makeEvent({ mdcProperties: { req: '1' } }))).toBe(PROPERTIES_EXIST);
  });

  it('should ignore empty property maps', () => {
    expect(computeReferenceMask(makeEvent({ contextProperties: {}, mdcProperties: {} }))).toBe(0);
  });

  it('should set the exception bit when a throwable is present, even with no lines', () => {
    expect(computeReferenceMask(makeEvent({ throwable: ['Error: x'] }))).toBe(EXCEPTION_EXISTS);
    expect(computeReferenceMask(makeEvent({ throwable: [] }))).toBe(EXCEPTION_EXISTS);
  });

  it('should set the caller bit only for a non-null frame', () => {
    expect(computeReferenceMask(makeEvent({ callerData: [null] }))).toBe(0);
    expect(computeReferenceMask(makeEvent({ callerData: [null, CALLER] }))).toBe(CALLER_DATA_EXISTS);
  });

  it('should combine bits', () => {
    const event = makeEvent({
      callerData: [CALLER],
      throwable: ['Error: x'],
      mdcProperties: { a: 'b' },
    });
    expect(computeReferenceMask(event)).toBe(7);
  });

  it('should depend only on which attributes are present', () => {
    const first = makeEvent({ formattedMessage: 'a', mdcProperties: { a: '1' }, throwable: ['x'] });
    const second = makeEvent({ formattedMessage: 'b', contextProperties: { z: '9' }, throwable: ['y', 'z'] });
    expect(computeReferenceMask(first)).toBe(computeReferenceMask(second));
    expect(computeReferenceMask(first)).toBe(computeReferenceMask(first));
  });
});
