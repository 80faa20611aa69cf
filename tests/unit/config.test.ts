import { describe, it, expect } from 'vitest';
import { ConfigurationError, loadConfig } from '../../src/config/env.js';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.NODE_ENV).toBe('development');
    expect(config.LOG_LEVEL).toBe('info');
    expect(config.HTTP_LOGGING_ENABLED).toBe(false);
    expect(config.HTTP_LOGGING_LOG_LEVEL).toBe('debug');
    expect(config.HTTP_LOGGING_MAX_BODY_SIZE).toBe(10000);
    expect(config.HTTP_LOGGING_EXCLUDE_PATTERNS).toBeUndefined();
    expect(config.OAUTH2_AUDIENCE).toBe('https://api.example.com');
    expect(config.OAUTH2_CLOCK_TOLERANCE_SEC).toBe(30);
    expect(config.DB_PORT).toBe(3306);
  });

  it('should parse booleans, numbers and lists', () => {
    const config = loadConfig({
      HTTP_LOGGING_ENABLED: 'TRUE',
      HTTP_LOGGING_INCLUDE_REQUEST_BODY: 'false',
      HTTP_LOGGING_LOG_LEVEL: 'INFO',
      HTTP_LOGGING_MAX_BODY_SIZE: '2048',
      HTTP_LOGGING_EXCLUDE_PATTERNS: '/internal/**, /metrics ,',
      DB_PORT: '3307',
    });

    expect(config.HTTP_LOGGING_ENABLED).toBe(true);
    expect(config.HTTP_LOGGING_INCLUDE_REQUEST_BODY).toBe(false);
    expect(config.HTTP_LOGGING_LOG_LEVEL).toBe('info');
    expect(config.HTTP_LOGGING_MAX_BODY_SIZE).toBe(2048);
    expect(config.HTTP_LOGGING_EXCLUDE_PATTERNS).toEqual(['/internal/**', '/metrics']);
    expect(config.DB_PORT).toBe(3307);
  });

  it('should treat an empty issuer as unset', () => {
    expect(loadConfig({ OAUTH2_ISSUER_URI: '' }).OAUTH2_ISSUER_URI).toBeUndefined();
  });

  it('should reject invalid values with the offending keys', () => {
    try {
      loadConfig({ LOG_LEVEL: 'verbose', OAUTH2_ISSUER_URI: 'not-a-url' });
      expect.fail('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues.some((issue) => issue.startsWith('LOG_LEVEL:'))).toBe(true);
        expect(error.issues.some((issue) => issue.startsWith('OAUTH2_ISSUER_URI:'))).toBe(true);
        expect(error.message).toMatch(/^Environment validation failed: /);
      }
    }
  });
});
