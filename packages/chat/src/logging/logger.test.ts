import { describe, it, expect } from 'vitest';
import { ConsoleLogger, errorFields, noopLogger } from './logger.js';

function capture(level: ConstructorParameters<typeof ConsoleLogger>[0]) {
  const lines: string[] = [];
  const logger = new ConsoleLogger(level, { component: 'test' }, (line) => lines.push(line));
  const entries = (): Array<Record<string, unknown>> => lines.map((line) => JSON.parse(line));
  return { logger, entries };
}

describe('ConsoleLogger', () => {
  it('writes one JSON object per entry with context and data', () => {
    const { logger, entries } = capture('debug');

    logger.info('executing tool', { tool: 'calculate' });

    const [entry] = entries();
    expect(entry).toMatchObject({ level: 'info', message: 'executing tool', component: 'test', tool: 'calculate' });
    expect(typeof entry?.['timestamp']).toBe('string');
  });

  it('drops entries below the configured level', () => {
    const { logger, entries } = capture('warn');

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(entries().map((entry) => entry['message'])).toEqual(['c', 'd']);
  });

  it('merges child context over the parent', () => {
    const { logger, entries } = capture('info');

    logger.child({ sessionId: 's-1', component: 'session' }).info('turn started');

    expect(entries()[0]).toMatchObject({ component: 'session', sessionId: 's-1' });
  });
});

describe('noopLogger', () => {
  it('returns itself as child', () => {
    expect(noopLogger.child({ any: 'thing' })).toBe(noopLogger);
  });
});

describe('errorFields', () => {
  it('keeps name and message of errors', () => {
    expect(errorFields(new TypeError('bad'))).toEqual({ error: 'bad', errorName: 'TypeError' });
    expect(errorFields('plain')).toEqual({ error: 'plain' });
  });
});
