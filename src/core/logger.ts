import pino from 'pino';
import type { LogLevel } from './config.js';

export type Logger = pino.Logger;

/**
 * Structured logs go to stderr; stdout is reserved for reports and JSON output.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({ name: 'equity-gather', level }, pino.destination(2));
}

/** Discards everything. Default for library code and tests. */
export const silentLogger: Logger = pino({ level: 'silent' });
