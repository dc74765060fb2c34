// tests/unit/Logger.test.ts

import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/Logger';
import { InputError } from '../../src/utils/errors';

describe('Logger', () => {
  const logger = new Logger({ level: 'debug', format: 'json', silent: true });

  it('should clip long strings in metadata', () => {
    const sanitized = logger['sanitize']({ snippet: 'a'.repeat(250), feed: 'short' });

    expect(sanitized).toEqual({
      snippet: `${'a'.repeat(200)}... [50 more chars]`,
      feed: 'short',
    });
  });

  it('should keep strings at the limit untouched', () => {
    const exact = 'b'.repeat(200);
    expect(logger['sanitize']({ exact })).toEqual({ exact });
  });

  it('should flatten errors into name, message and code', () => {
    const sanitized = logger['sanitize']({
      error: new InputError('Empty RSS payload provided', 'INPUT_EMPTY'),
      plain: new Error('boom'),
    });

    expect(sanitized).toEqual({
      error: { name: 'InputError', message: 'Empty RSS payload provided', code: 'INPUT_EMPTY' },
      plain: { name: 'Error', message: 'boom', code: undefined },
    });
  });

  it('should preserve other values', () => {
    const data = { correlationId: 'test-id', itemCount: 3, nested: { a: 1 } };
    expect(logger['sanitize'](data)).toEqual(data);
  });

  it('should pass non-objects through', () => {
    expect(logger['sanitize'](null)).toBe(null);
    expect(logger['sanitize'](undefined)).toBe(undefined);
    expect(logger['sanitize']('string')).toBe('string');
  });

  it('should not throw when logging', () => {
    const pretty = new Logger({ format: 'pretty', silent: true });

    expect(() => {
      logger.debug('Debug message', { key: 'value' });
      logger.info('Info message');
      pretty.warn('Warn message', { key: 'value' });
      pretty.error('Error message', { error: new Error('boom') });
    }).not.toThrow();
  });
});
