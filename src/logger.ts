import pino, { type Logger } from 'pino';
import type { Config } from './config/index.js';

/**
 * Root logger. Pretty output is a development convenience and falls back to
 * JSON when NODE_ENV is production.
 */
export function createLogger(logging: Config['logging']): Logger {
  const production = process.env.NODE_ENV === 'production';
  const pretty = logging.format === 'pretty' && !production;

  const logger = pino({
    level: logging.level,
    formatters: { level: (label) => ({ level: label }) },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty && { transport: { target: 'pino-pretty' } }),
  });

  if (logging.format === 'pretty' && production) {
    logger.warn('pino-pretty disabled in production; logging JSON');
  }
  return logger;
}
