/**
 * Structured logging for the simulator.
 *
 * Every line goes to stderr: when the simulator runs as an MCP server,
 * stdout carries the protocol.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Formats one log line: `[timestamp] [LEVEL] message {context}`.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  context: LogContext | undefined,
  timestamp: Date,
): string {
  const contextStr = context ? ` ${JSON.stringify(context)}` : '';
  return `[${timestamp.toISOString()}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }
    console.error(formatLogLine(level, message, context, new Date()));
  }
}

/**
 * Logger that discards everything; the default for embedded use and tests.
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {}

  warn(_message: string, _context?: LogContext): void {}

  info(_message: string, _context?: LogContext): void {}

  debug(_message: string, _context?: LogContext): void {}

  trace(_message: string, _context?: LogContext): void {}
}

/**
 * Helper function to log errors
 */
export function logError(logger: Logger, operation: string, error: unknown): void {
  if (error instanceof Error) {
    logger.error('Simulator operation failed unexpectedly', {
      operation,
      errorName: error.name,
      errorMessage: error.message,
      stack: error.stack,
    });
    return;
  }
  logger.error('Simulator operation failed unexpectedly', { operation, error: String(error) });
}
