import { describe, it, expect } from 'vitest';
import { redact } from '../../src/core/Logger';

describe('Logger', () => {
  describe('redact', () => {
    it('should filter passwords', () => {
      expect(redact('Login with password=test-secret')).toBe('Login with password=***REDACTED***');
      expect(redact('Database password: test-secret')).toBe('Database password=***REDACTED***');
    });

    it('should filter connection passes', () => {
      expect(redact('td.connect.pass=test-secret')).toBe('td.connect.pass=***REDACTED***');
    });

    it('should filter tokens', () => {
      expect(redact('Using token: test-token')).toBe('Using token=***REDACTED***');
    });

    it('should filter basic auth headers', () => {
      expect(redact('Authorization: Basic cm9vdDp0ZXN0')).toBe('Authorization=***REDACTED***');
    });

    it('should be case insensitive', () => {
      expect(redact('PASSWORD=xyz')).toBe('PASSWORD=***REDACTED***');
    });

    it('should not filter non-sensitive data', () => {
      const message = 'Wrote 3 points to iot';
      expect(redact(message)).toBe(message);
    });
  });

  describe('createLogger export', () => {
    it('should export default logger', async () => {
      const loggerModule = await import('../../src/core/Logger');
      expect(loggerModule.default).toBeDefined();
    });

    it('should create child logger with module name', async () => {
      const { createLogger } = await import('../../src/core/Logger');
      const childLogger = createLogger('TestModule');

      expect(typeof childLogger.info).toBe('function');
      expect(typeof childLogger.error).toBe('function');
      expect(typeof childLogger.warn).toBe('function');
      expect(typeof childLogger.debug).toBe('function');
    });
  });
});
