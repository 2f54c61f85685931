import { pino, type Logger } from 'pino';
import type { LoggingConfig } from '../config/config.js';

/**
 * Root logger. Components derive their own with `logger.child({ component })`.
 */
export function createLogger(config: LoggingConfig): Logger {
  return pino({
    name: 'board-relay',
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
