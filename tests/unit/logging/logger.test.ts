import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { createChildLogger, withLogging, type ReadoutLogger } from '../../../src/logging/logger.js';

function captureLogger(): { logger: ReadoutLogger; entries: Array<Record<string, unknown>> } {
  const entries: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'debug', base: null, timestamp: false },
    {
      write(line: string): void {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === 'object' && parsed !== null) {
          entries.push(Object.fromEntries(Object.entries(parsed)));
        }
      },
    }
  );
  return { logger, entries };
}

describe('withLogging', () => {
  it('should log start and completion around the operation', () => {
    const { logger, entries } = captureLogger();

    const result = withLogging(logger, 'classify', () => 42, { component: 'test' });

    expect(result).toBe(42);
    expect(entries.map((e) => e.msg)).toEqual(['Starting classify', expect.stringMatching(/^Completed classify in \d+ms$/)]);
    expect(entries[1]).toMatchObject({ operation: 'classify', component: 'test' });
  });

  it('should log and rethrow failures', () => {
    const { logger, entries } = captureLogger();

    expect(() =>
      withLogging(logger, 'decode', () => {
        throw new Error('bad input');
      })
    ).toThrow('bad input');
    expect(entries[1]).toMatchObject({ msg: 'Failed decode: bad input', level: 50 });
  });
});

describe('createChildLogger', () => {
  it('should attach context to every entry', () => {
    const { logger, entries } = captureLogger();

    createChildLogger(logger, { component: 'status' }).info('hello');

    expect(entries[0]).toMatchObject({ component: 'status', msg: 'hello' });
  });
});
