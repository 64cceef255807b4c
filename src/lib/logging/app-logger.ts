/**
 * Application Logger
 * Process-wide sinks chosen from env
 */

import { env } from '../../config/env';
import { Logger, combineLoggers, createConsoleLogger, createFileLogger, isLogLevel } from './logger';

export function createAppLogger(): Logger {
  const level = isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info';
  const consoleLogger = createConsoleLogger({ level });

  if (!env.LOG_FILE) {
    return consoleLogger;
  }
  return combineLoggers(consoleLogger, createFileLogger(env.LOG_FILE, { level }));
}

let appLogger: Logger | null = null;

/**
 * Shared process logger, created on first use
 */
export function getAppLogger(): Logger {
  if (!appLogger) {
    appLogger = createAppLogger();
  }
  return appLogger;
}
