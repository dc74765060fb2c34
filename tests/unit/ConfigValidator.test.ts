// tests/unit/ConfigValidator.test.ts

import { describe, it, expect } from 'vitest';
import { configFromEnv, validateConfig, validateConfigSafe } from '../../src/config/ConfigValidator';

describe('ConfigValidator', () => {
  const validConfig = {
    logging: { level: 'debug' as const, format: 'pretty' as const, silent: false },
    metrics: { enabled: true },
    tracing: { enabled: false },
    limits: { maxDocumentLength: 1000000 },
  };

  it('should validate correct configuration', () => {
    const validated = validateConfig(validConfig);
    expect(validated).toEqual(validConfig);
  });

  it('should accept an empty configuration', () => {
    expect(validateConfig({})).toEqual({});
  });

  it('should reject an unknown log level', () => {
    expect(() => validateConfig({ logging: { level: 'verbose' } })).toThrow();
  });

  it('should reject a non-positive document limit', () => {
    const result = validateConfigSafe({ limits: { maxDocumentLength: 0 } });

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(['limits.maxDocumentLength: maxDocumentLength must be positive']);
  });

  it('should reject a fractional document limit', () => {
    const result = validateConfigSafe({ limits: { maxDocumentLength: 1.5 } });

    expect(result.errors).toEqual([
      'limits.maxDocumentLength: maxDocumentLength must be a whole number of characters',
    ]);
  });

  it('should return data from validateConfigSafe on success', () => {
    const result = validateConfigSafe(validConfig);

    expect(result.success).toBe(true);
    expect(result.data).toEqual(validConfig);
  });

  describe('configFromEnv', () => {
    it('should read log level and format', () => {
      const config = configFromEnv({ RSS_LOG_LEVEL: 'debug', RSS_LOG_FORMAT: 'pretty' });
      expect(config.logging).toEqual({ level: 'debug', format: 'pretty' });
    });

    it('should ignore unrecognised values', () => {
      const config = configFromEnv({ RSS_LOG_LEVEL: 'loud', RSS_LOG_FORMAT: 'xml' });
      expect(config.logging?.level).toBeUndefined();
      expect(config.logging?.format).toBeUndefined();
    });

    it('should produce a valid configuration from an empty environment', () => {
      expect(() => validateConfig(configFromEnv({}))).not.toThrow();
    });
  });
});
