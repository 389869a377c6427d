import pino, { type Logger } from 'pino';

/**
 * Create a logger instance with appropriate configuration
 * - Pretty output in development
 * - JSON output in production/CI
 * - Always writes to stderr; stdout carries the SBOM
 * - Redacts sensitive fields (tokens, keys)
 */
export function createLogger(options?: { level?: string; pretty?: boolean }): Logger {
  const env = process.env.NODE_ENV;
  const isDevelopment = env !== 'production';
  const level = options?.level || process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

  const base = {
    level,
    redact: {
      paths: ['token', 'password', 'authorization', 'auth', 'key', 'secret', 'apiKey'],
      censor: '[REDACTED]',
    },
  };

  // pino-pretty runs in a worker thread; keep it out of test runs
  if (options?.pretty !== false && isDevelopment && env !== 'test') {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'HH:MM:ss.l',
          destination: 2,
        },
      },
    });
  }

  return pino(base, pino.destination(2));
}

// Export singleton logger instance
export const logger = createLogger();
