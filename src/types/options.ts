import type { ILogger } from '../utils/Logger.js';

/**
 * Logging level for diagnostic output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Output formats supported by the shape table reporter.
 * - 'text': padded columns with a row index, like a data-frame print
 * - 'markdown': GitHub pipe table
 * - 'json': array of row objects
 */
export type ReportFormat = 'text' | 'markdown' | 'json';

/**
 * Options for reading diagram documents.
 */
export interface DiagramReaderOptions {
  /**
   * Logging level for diagnostic output.
   * Ignored when `logger` is given.
   * @default 'warn'
   */
  logLevel?: LogLevel;

  /**
   * Logger to use instead of creating one from `logLevel`.
   */
  logger?: ILogger;
}

/**
 * Default reader options.
 */
export const DEFAULT_READER_OPTIONS: Required<Omit<DiagramReaderOptions, 'logger'>> = {
  logLevel: 'warn',
};

/**
 * Options for formatting a shape table.
 */
export interface ReportOptions {
  /**
   * Output format.
   * @default 'text'
   */
  format?: ReportFormat;

  /**
   * Placeholder printed for absent values in the text and markdown formats.
   * @default '-'
   */
  absentPlaceholder?: string;
}

/**
 * Default report options.
 */
export const DEFAULT_REPORT_OPTIONS: Required<ReportOptions> = {
  format: 'text',
  absentPlaceholder: '-',
};
