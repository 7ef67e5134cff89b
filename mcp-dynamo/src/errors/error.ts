/**
 * Error codes surfaced in the response envelope.
 */
export const ErrorCode = {
  NotFound: 'NOT_FOUND',
  AlreadyExists: 'ALREADY_EXISTS',
  InvalidSchema: 'INVALID_SCHEMA',
  MissingKey: 'MISSING_KEY',
  InvalidExpression: 'INVALID_EXPRESSION',
  InvalidParameters: 'INVALID_PARAMETERS',
  ConditionalCheckFailed: 'CONDITIONAL_CHECK_FAILED',
  Internal: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class for all simulator errors.
 * Components throw these; the dispatcher turns them into failed responses.
 */
export class SimulatorError extends Error {
  public readonly code: ErrorCode;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(options: { code: ErrorCode; message: string; details?: Record<string, unknown> }) {
    super(options.message);
    this.name = 'SimulatorError';
    this.code = options.code;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isSimulatorError(value: unknown): value is SimulatorError {
  return value instanceof SimulatorError;
}
