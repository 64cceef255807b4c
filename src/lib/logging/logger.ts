/**
 * Logger
 * Stateless leveled logging handed to each component.
 * Sinks format events themselves; callers only pass a message and fields.
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_MARKERS: Record<LogLevel, string> = {
  debug: '🔍',
  info: '✅',
  warn: '⚠️ ',
  error: '❌',
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Render fields as `key=value` pairs, skipping undefined values
 */
export function formatFields(fields?: LogFields): string {
  if (!fields) return '';

  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = String(value);
    parts.push(`${key}=${/\s/.test(text) ? JSON.stringify(text) : text}`);
  }
  return parts.join(' ');
}

export function formatLine(message: string, fields?: LogFields): string {
  const rendered = formatFields(fields);
  return rendered ? `${message} ${rendered}` : message;
}

/**
 * Build a logger from a single write function, filtered by minimum level
 */
function createLevelLogger(
  minLevel: LogLevel,
  write: (level: LogLevel, message: string, fields?: LogFields) => void
): Logger {
  const emit = (level: LogLevel) => (message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    write(level, message, fields);
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

export function createConsoleLogger(options: { level?: LogLevel } = {}): Logger {
  return createLevelLogger(options.level ?? 'info', (level, message, fields) => {
    const line = `${LEVEL_MARKERS[level]} ${formatLine(message, fields)}`;
    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  });
}

/**
 * Append timestamped lines to a log file
 */
export function createFileLogger(filePath: string, options: { level?: LogLevel } = {}): Logger {
  const stream = fs.createWriteStream(filePath, { flags: 'a' });
  stream.on('error', (error) => {
    console.error(`Log file ${filePath} unavailable: ${error.message}`);
  });

  return createLevelLogger(options.level ?? 'info', (level, message, fields) => {
    stream.write(
      `${new Date().toISOString()} - ${level.toUpperCase()} - ${formatLine(message, fields)}\n`
    );
  });
}

export function combineLoggers(...loggers: Logger[]): Logger {
  return {
    debug: (message, fields) => loggers.forEach((l) => l.debug(message, fields)),
    info: (message, fields) => loggers.forEach((l) => l.info(message, fields)),
    warn: (message, fields) => loggers.forEach((l) => l.warn(message, fields)),
    error: (message, fields) => loggers.forEach((l) => l.error(message, fields)),
  };
}
