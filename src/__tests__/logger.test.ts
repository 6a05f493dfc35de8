import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Logger } from '../lib/logger.js';

let errorSpy: MockInstance<typeof console.error>;

function lastEntry(): unknown {
  const [line] = errorSpy.mock.calls[errorSpy.mock.calls.length - 1];
  return JSON.parse(String(line));
}

beforeEach(() => {
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  errorSpy.mockRestore();
});

describe('Logger', () => {
  it('drops entries below the configured level', () => {
    const log = new Logger();
    log.configure({ forceJson: true });

    log.info('hidden');
    log.warn('shown');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(lastEntry()).toMatchObject({ level: 'warn', message: 'shown' });
  });

  it('writes one JSON object per entry in JSON mode', () => {
    const log = new Logger();
    log.configure({ level: 'debug', forceJson: true });

    log.debug('loaded tables', { verbs: 3 });

    expect(lastEntry()).toMatchObject({
      level: 'debug',
      message: 'loaded tables',
      context: { verbs: 3 },
    });
  });

  it('omits empty context', () => {
    const log = new Logger();
    log.configure({ forceJson: true });

    log.error('boom', {});

    expect(lastEntry()).not.toHaveProperty('context');
  });

  it('writes coloured lines in pretty mode', () => {
    const log = new Logger();
    log.configure({ forcePretty: true });

    log.warn('careful', { k: 'v' });

    const [line] = errorSpy.mock.calls[0];
    expect(String(line)).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} \x1b\[33m\[WARN \]\x1b\[0m careful \{"k":"v"\}$/);
  });

  it('prefixes child messages and merges their context', () => {
    const log = new Logger();
    log.configure({ forceJson: true });

    log.child('api', { handle: 'demo-shop' }).warn('slow response', { ms: 1200 });

    expect(lastEntry()).toMatchObject({
      message: '[api] slow response',
      context: { handle: 'demo-shop', ms: 1200 },
    });
  });

  it('reports its level', () => {
    const log = new Logger();
    expect(log.getLevel()).toBe('warn');

    log.configure({ level: 'error' });
    expect(log.getLevel()).toBe('error');
  });
});
