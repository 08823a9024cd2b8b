import pino from 'pino';
import type { Logger } from 'pino';
import { parseLogLevel, type LogLevel } from './config.js';

/**
 * Creates the SDK logger. Every line carries `name: "emailapi"`.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({ name: 'emailapi', level });
}

/** Used when the caller does not pass a logger of their own. */
export const defaultLogger: Logger = createLogger(parseLogLevel(process.env['LOG_LEVEL']));
