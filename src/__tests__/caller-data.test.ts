import { describe, it, expect } from 'vitest';
import { captureCallerData, parseStackFrame, parseStackTrace } from '../caller-data';

describe('caller data', () => {
  describe('parseStackFrame', () => {
    it('should split a method frame into class, method, file and line', () => {
      expect(parseStackFrame('    at OrderService.place (/srv/app/src/orders.ts:42:13)')).toEqual({
        fileName: 'orders.ts',
        className: 'OrderService',
        methodName: 'place',
        lineNumber: 42,
      });
    });

    it('should handle anonymous top-level frames', () => {
      expect(parseStackFrame('    at /srv/app/src/main.ts:7:1')).toEqual({
        fileName: 'main.ts',
        className: '?',
        methodName: '?',
        lineNumber: 7,
      });
    });

    it('should handle plain functions, async and constructor frames', () => {
      expect(parseStackFrame('    at async handle (/srv/app/http.ts:10:5)')).toMatchObject({
        className: '?',
        methodName: 'handle',
      });
      expect(parseStackFrame('    at new Worker (/srv/app/worker.ts:3:9)')).toMatchObject({
        methodName: 'Worker',
        lineNumber: 3,
      });
      expect(parseStackFrame('    at Object.<anonymous> (file:///srv/app/boot.mjs:1:2)')).toEqual({
        fileName: 'boot.mjs',
        className: 'Object',
        methodName: '<anonymous>',
        lineNumber: 1,
      });
    });

    it('should drop method aliases', () => {
      expect(parseStackFrame('    at Router.handle [as handler] (/srv/app/router.ts:5:2)')).toMatchObject({
        className: 'Router',
        methodName: 'handle',
      });
    });

    it('should return null for lines that are not frames', () => {
      expect(parseStackFrame('Error: boom')).toBeNull();
      expect(parseStackFrame('    at native')).toBeNull();
    });
  });

  it('should parse every frame of a stack', () => {
    const stack = [
      'Error: boom',
      '    at a (/x/a.ts:1:1)',
      '    at b (/x/b.ts:2:2)',
    ].join('\n');
    expect(parseStackTrace(stack).map((frame) => frame.methodName)).toEqual(['a', 'b']);
  });

  it('should start capturing below the boundary function', () => {
    function logSomething() {
      return captureCallerData(logSomething);
    }

    const frames = logSomething();
    expect(frames[0].fileName).toBe('caller-data.test.ts');
    expect(frames.some((frame) => frame.methodName === 'logSomething')).toBe(false);
  });
});
