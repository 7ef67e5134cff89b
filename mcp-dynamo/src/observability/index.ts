export { ConsoleLogger, NoopLogger, formatLogLine, logError } from './logging.js';
export type { Logger, LogLevel, LogContext } from './logging.js';
