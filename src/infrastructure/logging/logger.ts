import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from '../../application/config-schema.js';

/** Root logger. Components derive their own with `log.child({ component })`. */
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({ name: 'hookbus', level });
}
