/**
 * Logging utility for pipeline tracking and debugging
 *
 * Production (NODE_ENV=production) writes one JSON object per line so the
 * output can be ingested as structured logs. Everywhere else the format is
 * human-readable: `[timestamp] [LEVEL] [scope] message {context}`.
 *
 * Components receive a Logger through their constructor; the module-level
 * `logger` is only the default.
 */

import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  scope?: string;
  videoId?: number;
  clipId?: number;
  [key: string]: unknown;
}

/**
 * Destination for formatted log lines
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  structured?: boolean;
  sink?: LogSink;
  context?: LogContext;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

export interface DailyFileSinkOptions {
  dir?: string;
  fileName?: string;
  /** Rotated files kept besides the current one */
  retain?: number;
  now?: () => Date;
}

function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Append lines to `<dir>/<fileName>`, rotating at UTC midnight.
 * The previous day's file is renamed to `<fileName>.<YYYY-MM-DD>`.
 */
export function createDailyFileSink(options: DailyFileSinkOptions = {}): LogSink {
  const dir = options.dir ?? 'logs';
  const fileName = options.fileName ?? 'app.log';
  const retain = options.retain ?? 7;
  const now = options.now ?? (() => new Date());
  const filePath = path.join(dir, fileName);
  const backupPrefix = `${fileName}.`;

  fs.mkdirSync(dir, { recursive: true });
  let currentDay = fs.existsSync(filePath) ? dayKey(fs.statSync(filePath).mtime) : dayKey(now());

  const rotate = (nextDay: string): void => {
    if (fs.existsSync(filePath)) {
      fs.renameSync(filePath, `${filePath}.${currentDay}`);
    }
    currentDay = nextDay;

    const backups = fs
      .readdirSync(dir)
      .filter((name) => name.startsWith(backupPrefix) && /^\d{4}-\d{2}-\d{2}$/.test(name.slice(backupPrefix.length)))
      .sort();
    for (const name of backups.slice(0, Math.max(0, backups.length - retain))) {
      fs.unlinkSync(path.join(dir, name));
    }
  };

  return (_level, line) => {
    const day = dayKey(now());
    if (day !== currentDay) rotate(day);
    fs.appendFileSync(filePath, `${line}\n`, 'utf-8');
  };
}

/**
 * Write every line to each sink in order
 */
export function teeSink(...sinks: LogSink[]): LogSink {
  return (level, line) => {
    for (const sink of sinks) sink(level, line);
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  return value !== undefined && isLogLevel(value) ? value : fallback;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly structured: boolean;
  private readonly sink: LogSink;
  private readonly context: LogContext;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.structured = options.structured ?? process.env.NODE_ENV === 'production';
    this.sink = options.sink ?? consoleSink;
    this.context = options.context ?? {};
  }

  private formatMessage(level: LogLevel, message: string, context: LogContext): string {
    const timestamp = new Date().toISOString();

    if (this.structured) {
      return JSON.stringify({
        timestamp,
        level,
        message,
        ...context,
      });
    }

    const { scope, ...rest } = context;
    const prefix = `[${timestamp}] [${level.toUpperCase()}]${scope ? ` [${scope}]` : ''}`;
    const contextStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
    return `${prefix} ${message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    this.sink(level, this.formatMessage(level, message, { ...this.context, ...context }));
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  // Create a child logger with context
  child(context: LogContext): Logger {
    return new Logger({
      level: this.level,
      structured: this.structured,
      sink: this.sink,
      context: { ...this.context, ...context },
    });
  }
}

// Default instance
export const logger = new Logger({ level: parseLogLevel(process.env.LOG_LEVEL) });
