export { Logger, createLogger, isLogLevel } from './Logger.js';
export type { ILogger, LogSink } from './Logger.js';
