/**
 * Shared test helpers
 */

import { Logger, type LogEntry, type LogLevel } from '../../framework/telemetry/logger.ts';

/**
 * Logger that keeps its entries in memory instead of printing them
 */
export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, output: (entry) => entries.push(entry) });
  return { logger, entries };
}

export function silentLogger(): Logger {
  return captureLogger('error').logger;
}
