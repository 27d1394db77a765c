import type { LogLevel } from '../types/index.js';

/**
 * Logger interface shared by the reader and the command line.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(context: string): ILogger;
}

/**
 * Destination for formatted log lines.
 */
export type LogSink = (line: string) => void;

/**
 * Log level priority for filtering.
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Standard output is reserved for reports, so log lines go to stderr.
 */
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Logger writing one line per entry, with structured data appended as JSON.
 */
export class Logger implements ILogger {
  private readonly level: LogLevel;
  private readonly context?: string;
  private readonly levelPriority: number;
  private readonly sink: LogSink;

  constructor(level: LogLevel = 'warn', context?: string, sink: LogSink = stderrSink) {
    this.level = level;
    this.context = context;
    this.levelPriority = LOG_LEVEL_PRIORITY[level];
    this.sink = sink;
  }

  /**
   * Creates a child logger with additional context.
   */
  child(context: string): ILogger {
    const fullContext = this.context ? `${this.context}:${context}` : context;
    return new Logger(this.level, fullContext, this.sink);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < this.levelPriority) {
      return;
    }

    const prefix = this.context ? ` [${this.context}]` : '';
    const timestamp = new Date().toISOString();
    const suffix = data ? ` ${JSON.stringify(data)}` : '';
    this.sink(`${timestamp} ${level.toUpperCase().padEnd(5)}${prefix} ${message}${suffix}`);
  }
}

/**
 * Creates a logger instance based on the log level.
 * 'silent' filters out every entry.
 */
export function createLogger(level: LogLevel = 'warn', context?: string, sink?: LogSink): ILogger {
  return new Logger(level, context, sink);
}

/**
 * Returns true when `value` names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}
