/**
 * @seedhash/utils - Shared utilities package
 *
 * Logger, configuration loading, error classes and output formatting used by
 * every other seedhash package.
 */

export { logger, Logger, LogLevel, winstonLogger, createLogger, setLogLevel } from './logger.js';
export type { LogContext } from './logger.js';

export * from './config/index.js';

export * from './errors.js';

export { formatJSON, formatTable, formatCSV, formatOutput } from './output-formatter.js';
export type { OutputFormat } from './output-formatter.js';
