import { ErrorCode, SimulatorError } from './error.js';

/**
 * Error thrown when a table does not exist
 */
export class TableNotFoundError extends SimulatorError {
  constructor(tableName: string) {
    super({
      code: ErrorCode.NotFound,
      message: `Table ${tableName} does not exist`,
      details: { tableName },
    });
    this.name = 'TableNotFoundError';
  }
}

/**
 * Error thrown when creating a table whose name is taken
 */
export class TableAlreadyExistsError extends SimulatorError {
  constructor(tableName: string) {
    super({
      code: ErrorCode.AlreadyExists,
      message: `Table ${tableName} already exists`,
      details: { tableName },
    });
    this.name = 'TableAlreadyExistsError';
  }
}

export class InvalidSchemaError extends SimulatorError {
  constructor(message: string) {
    super({ code: ErrorCode.InvalidSchema, message: `Invalid key schema: ${message}` });
    this.name = 'InvalidSchemaError';
  }
}

/**
 * Error for an item or key lacking a key-schema attribute
 */
export class MissingKeyError extends SimulatorError {
  constructor(attributeName: string, reason?: string) {
    super({
      code: ErrorCode.MissingKey,
      message: `Missing required key: ${attributeName}${reason ? ` - ${reason}` : ''}`,
      details: { attributeName },
    });
    this.name = 'MissingKeyError';
  }
}

/**
 * Error for an expression that fails to parse or evaluate
 */
export class InvalidExpressionError extends SimulatorError {
  constructor(expression: string, reason?: string) {
    super({
      code: ErrorCode.InvalidExpression,
      message: `Invalid expression: ${expression}${reason ? ` - ${reason}` : ''}`,
      details: { expression },
    });
    this.name = 'InvalidExpressionError';
  }
}

export class InvalidParametersError extends SimulatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: ErrorCode.InvalidParameters, message, details });
    this.name = 'InvalidParametersError';
  }
}

/**
 * Error thrown when a write's condition expression does not hold
 */
export class ConditionalCheckFailedError extends SimulatorError {
  constructor(tableName: string, expression: string) {
    super({
      code: ErrorCode.ConditionalCheckFailed,
      message: `The conditional request failed on table ${tableName}: ${expression}`,
      details: { tableName, expression },
    });
    this.name = 'ConditionalCheckFailedError';
  }
}
