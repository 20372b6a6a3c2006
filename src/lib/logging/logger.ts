/**
 * Crawl Logger
 * Console logging with timestamps, level filtering and an optional log file mirror
 */

import { createWriteStream, WriteStream } from 'fs';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CrawlLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  filePath?: string;
}

export interface ClosableLogger extends CrawlLogger {
  close(): Promise<void>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatLine(level: LogLevel, message: string, date: Date = new Date()): string {
  return `${formatTimestamp(date)} [${level.toUpperCase()}] ${message}`;
}

export function createLogger(options: LoggerOptions = {}): ClosableLogger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  let file: WriteStream | null = null;

  if (options.filePath) {
    file = createWriteStream(options.filePath, { flags: 'a', encoding: 'utf8' });
    file.on('error', (error) => {
      console.error(`Log file error (${options.filePath}): ${error.message}`);
      file = null;
    });
  }

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }

    const line = formatLine(level, message);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }

    file?.write(`${line}\n`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    close: () =>
      new Promise<void>((resolve) => {
        if (!file) {
          resolve();
          return;
        }
        const stream = file;
        file = null;
        stream.end(() => resolve());
      }),
  };
}

export const silentLogger: CrawlLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
