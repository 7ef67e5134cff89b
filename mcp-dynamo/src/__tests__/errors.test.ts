/**
 * Tests for the simulator error hierarchy.
 */

import { describe, expect, it } from 'vitest';
import {
  ConditionalCheckFailedError,
  ErrorCode,
  InvalidExpressionError,
  InvalidParametersError,
  InvalidSchemaError,
  MissingKeyError,
  SimulatorError,
  TableAlreadyExistsError,
  TableNotFoundError,
  isSimulatorError,
} from '../errors/index.js';

describe('SimulatorError', () => {
  it('should carry a code, message and details', () => {
    const error = new TableNotFoundError('orders');

    expect(error).toBeInstanceOf(SimulatorError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('TableNotFoundError');
    expect(error.code).toBe(ErrorCode.NotFound);
    expect(error.details).toEqual({ tableName: 'orders' });
  });

  it('should render as [CODE] message', () => {
    expect(new TableAlreadyExistsError('orders').toString()).toBe('[ALREADY_EXISTS] Table orders already exists');
  });

  it('should serialize to JSON', () => {
    expect(new InvalidExpressionError('a = :x', 'unknown placeholder :x').toJSON()).toEqual({
      name: 'InvalidExpressionError',
      code: 'INVALID_EXPRESSION',
      message: 'Invalid expression: a = :x - unknown placeholder :x',
      details: { expression: 'a = :x' },
    });
  });

  it('should map each error kind to its code', () => {
    expect(new InvalidSchemaError('a partition key is required').code).toBe('INVALID_SCHEMA');
    expect(new MissingKeyError('order_id').code).toBe('MISSING_KEY');
    expect(new InvalidParametersError('bad').code).toBe('INVALID_PARAMETERS');
    expect(new ConditionalCheckFailedError('orders', 'attribute_exists(a)').code).toBe('CONDITIONAL_CHECK_FAILED');
  });

  it('should format messages with and without a reason', () => {
    expect(new MissingKeyError('order_id').message).toBe('Missing required key: order_id');
    expect(new MissingKeyError('order_id', 'key attributes must not be empty').message).toBe(
      'Missing required key: order_id - key attributes must not be empty',
    );
  });
});

describe('isSimulatorError', () => {
  it('should recognise simulator errors only', () => {
    expect(isSimulatorError(new MissingKeyError('id'))).toBe(true);
    expect(isSimulatorError(new Error('plain'))).toBe(false);
    expect(isSimulatorError('NOT_FOUND')).toBe(false);
  });
});
