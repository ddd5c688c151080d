import { afterEach, describe, expect, test, vi } from 'vitest';
import { Logger, redactObject } from '../../../src/monitoring/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('redactObject', () => {
  test('redacts sensitive keys and applicant identifiers', () => {
    const out = redactObject({
      nif_nie: 'X1234567L',
      note: 'Contacto: ana@example.com',
      nested: { access_token: 'abc' },
      list: ['Y7654321Z', 'plain'],
      count: 3,
    });
    expect(out).toEqual({
      nif_nie: '[REDACTED]',
      note: 'Contacto: [REDACTED]',
      nested: { access_token: '[REDACTED]' },
      list: ['[REDACTED]', 'plain'],
      count: 3,
    });
  });

  test('errors are reduced to their message', () => {
    expect(redactObject({ error: new Error('boom') })).toEqual({ error: 'boom' });
  });
});

describe('Logger', () => {
  test('writes one JSON line with bound context', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = new Logger({ level: 'info', service: 'test' }).child({ sessionId: 'sess-1' });
    log.info('hello', { email: 'ana@example.com' });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'info',
      msg: 'hello',
      service: 'test',
      sessionId: 'sess-1',
      email: '[REDACTED]',
    });
  });

  test('drops entries below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = new Logger({ level: 'warn', service: 'test' });
    log.debug('ignored');
    log.warn('kept');
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
