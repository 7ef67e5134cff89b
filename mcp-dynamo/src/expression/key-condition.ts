/**
 * Key-condition expressions for queries.
 *
 * A key condition pins the partition key with `=` and may add one sort-key
 * condition (`=`, `<`, `<=`, `>`, `>=`, `BETWEEN` or `begins_with`), joined
 * by `AND`.
 * @module expression/key-condition
 */

import { InvalidExpressionError, isSimulatorError } from '../errors/index.js';
import type { Item, KeySchema, KeyValue } from '../types.js';
import type { ConditionNode } from './ast.js';
import { evaluateCondition } from './evaluator.js';
import { parseCondition } from './parser.js';
import type { ExpressionContext } from './parser.js';

export interface KeyCondition {
  source: string;
  partitionValue: KeyValue;
  sortCondition?: ConditionNode;
}

export interface KeyConditionShape {
  pinsPartitionKey: boolean;
  hasSortKeyCondition: boolean;
  partitionValue?: KeyValue;
}

function flattenConjunction(node: ConditionNode): ConditionNode[] {
  if (node.type === 'and') {
    return [...flattenConjunction(node.left), ...flattenConjunction(node.right)];
  }
  return [node];
}

function partitionValueOf(node: ConditionNode, partitionKey: string): KeyValue | null | undefined {
  if (
    node.type === 'comparison' &&
    node.operator === '=' &&
    node.left.type === 'path' &&
    node.left.name === partitionKey &&
    node.right.type === 'value'
  ) {
    const value = node.right.value;
    return typeof value === 'string' || typeof value === 'number' ? value : null;
  }
  return undefined;
}

function isSortCondition(node: ConditionNode, sortKey: string | undefined): boolean {
  if (!sortKey) {
    return false;
  }
  switch (node.type) {
    case 'comparison':
      return (
        node.operator !== '<>' &&
        node.left.type === 'path' &&
        node.left.name === sortKey &&
        node.right.type === 'value'
      );
    case 'between':
      return (
        node.operand.type === 'path' &&
        node.operand.name === sortKey &&
        node.lower.type === 'value' &&
        node.upper.type === 'value'
      );
    case 'match':
      return node.name === 'begins_with' && node.path.name === sortKey && node.argument.type === 'value';
    default:
      return false;
  }
}

/**
 * Parses and validates a query's key condition against the table's key schema.
 *
 * @throws {InvalidExpressionError} If the partition key is not pinned by equality,
 * or any other conjunct is not a supported sort-key condition
 */
export function compileKeyCondition(
  expression: string,
  context: ExpressionContext,
  keySchema: KeySchema,
): KeyCondition {
  const conjuncts = flattenConjunction(parseCondition(expression, context));
  let partitionValue: KeyValue | undefined;
  let sortCondition: ConditionNode | undefined;

  for (const conjunct of conjuncts) {
    const pinned = partitionValueOf(conjunct, keySchema.partitionKey);
    if (pinned === null) {
      throw new InvalidExpressionError(
        expression,
        `partition key ${keySchema.partitionKey} must be compared with a string or number`,
      );
    }
    if (pinned !== undefined && partitionValue === undefined) {
      partitionValue = pinned;
      continue;
    }
    if (isSortCondition(conjunct, keySchema.sortKey) && sortCondition === undefined) {
      sortCondition = conjunct;
      continue;
    }
    throw new InvalidExpressionError(
      expression,
      'key conditions allow one equality on the partition key and one condition on the sort key, joined by AND',
    );
  }

  if (partitionValue === undefined) {
    throw new InvalidExpressionError(
      expression,
      `query condition missed key schema element: ${keySchema.partitionKey}`,
    );
  }

  return { source: expression, partitionValue, sortCondition };
}

/**
 * Reports what a key condition pins down without rejecting it. An
 * expression that fails to parse pins nothing.
 */
export function inspectKeyCondition(
  expression: string,
  context: ExpressionContext,
  keySchema: KeySchema,
): KeyConditionShape {
  try {
    const condition = compileKeyCondition(expression, context, keySchema);
    return {
      pinsPartitionKey: true,
      hasSortKeyCondition: condition.sortCondition !== undefined,
      partitionValue: condition.partitionValue,
    };
  } catch (error) {
    if (!isSimulatorError(error)) {
      throw error;
    }
  }

  // Rejected, but possibly still pinned: report what the conjuncts show.
  let conjuncts: ConditionNode[];
  try {
    conjuncts = flattenConjunction(parseCondition(expression, context));
  } catch (error) {
    if (isSimulatorError(error)) {
      return { pinsPartitionKey: false, hasSortKeyCondition: false };
    }
    throw error;
  }
  const pinned = conjuncts
    .map((conjunct) => partitionValueOf(conjunct, keySchema.partitionKey))
    .find((value): value is KeyValue => value !== undefined && value !== null);
  return {
    pinsPartitionKey: pinned !== undefined,
    hasSortKeyCondition: conjuncts.some((conjunct) => isSortCondition(conjunct, keySchema.sortKey)),
    partitionValue: pinned,
  };
}

export function matchesSortCondition(condition: KeyCondition, item: Item): boolean {
  return condition.sortCondition === undefined || evaluateCondition(condition.sortCondition, item, condition.source);
}
