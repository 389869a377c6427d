import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

describe('utils/logger', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    // The module creates a singleton on import; keep pino-pretty workers out of it
    process.env.NODE_ENV = 'test';
    delete process.env.LOG_LEVEL;

    // Clear module cache to get fresh logger instance
    vi.resetModules();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe('createLogger', () => {
    it('defaults to debug outside production', async () => {
      const { createLogger } = await import('../../src/utils/logger.js');

      expect(createLogger().level).toBe('debug');
    });

    it('defaults to info in production', async () => {
      process.env.NODE_ENV = 'production';

      const { createLogger } = await import('../../src/utils/logger.js');

      expect(createLogger().level).toBe('info');
    });

    it('respects LOG_LEVEL', async () => {
      process.env.LOG_LEVEL = 'warn';

      const { createLogger } = await import('../../src/utils/logger.js');

      expect(createLogger({ pretty: false }).level).toBe('warn');
    });

    it('prioritizes options.level over the environment', async () => {
      process.env.LOG_LEVEL = 'debug';

      const { createLogger } = await import('../../src/utils/logger.js');

      expect(createLogger({ level: 'error', pretty: false }).level).toBe('error');
    });

    it('falls back to the default for an empty LOG_LEVEL', async () => {
      process.env.NODE_ENV = 'production';
      process.env.LOG_LEVEL = '';

      const { createLogger } = await import('../../src/utils/logger.js');

      expect(createLogger().level).toBe('info');
    });

    it('supports all standard log levels', async () => {
      const { createLogger } = await import('../../src/utils/logger.js');

      for (const level of ['fatal', 'error', 'warn', 'info', 'debug', 'trace']) {
        expect(createLogger({ level, pretty: false }).level).toBe(level);
      }
    });
  });

  describe('log level behavior', () => {
    it('logger at info level does not log debug messages', async () => {
      const { createLogger } = await import('../../src/utils/logger.js');
      const logger = createLogger({ level: 'info', pretty: false });

      expect(logger.isLevelEnabled('debug')).toBe(false);
      expect(logger.isLevelEnabled('info')).toBe(true);
      expect(logger.isLevelEnabled('warn')).toBe(true);
    });

    it('logger at silent level logs nothing and does not throw', async () => {
      const { createLogger } = await import('../../src/utils/logger.js');
      const logger = createLogger({ level: 'silent', pretty: false });

      expect(logger.isLevelEnabled('error')).toBe(false);
      expect(() => logger.warn({ pkgId: 'bash@4.12' }, 'test')).not.toThrow();
    });
  });

  describe('singleton logger instance', () => {
    it('respects environment settings', async () => {
      process.env.LOG_LEVEL = 'warn';

      const { logger } = await import('../../src/utils/logger.js');

      expect(logger.level).toBe('warn');
    });
  });
});
