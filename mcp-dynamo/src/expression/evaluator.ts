/**
 * Evaluation of parsed expressions against items.
 *
 * Condition evaluation is pure. Update evaluation returns a new item and
 * applies actions left to right, so later actions see earlier ones.
 * @module expression/evaluator
 */

import { InvalidExpressionError } from '../errors/index.js';
import type { Item, ScalarValue } from '../types.js';
import type { Comparator, ConditionNode, Operand, SetTerm, SetValue, UpdateAction } from './ast.js';
import { parseCondition, parseUpdate } from './parser.js';
import type { ExpressionContext } from './parser.js';

function describeType(value: ScalarValue): string {
  return value === null ? 'null' : typeof value;
}

function readAttribute(item: Item, name: string): ScalarValue | undefined {
  return Object.prototype.hasOwnProperty.call(item, name) ? item[name] : undefined;
}

function resolveOperand(operand: Operand, item: Item): ScalarValue | undefined {
  return operand.type === 'value' ? operand.value : readAttribute(item, operand.name);
}

/**
 * Orders two values of the same orderable type.
 *
 * @throws {InvalidExpressionError} Unless both are numbers or both are strings
 */
function orderValues(left: ScalarValue, right: ScalarValue, source: string): number {
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  throw new InvalidExpressionError(
    source,
    `type mismatch: cannot order ${describeType(left)} against ${describeType(right)}`,
  );
}

function valuesEqual(left: ScalarValue, right: ScalarValue, source: string): boolean {
  if (left === null || right === null) {
    return left === right;
  }
  if (typeof left !== typeof right) {
    throw new InvalidExpressionError(
      source,
      `type mismatch: cannot compare ${describeType(left)} with ${describeType(right)}`,
    );
  }
  return left === right;
}

function compare(
  operator: Comparator,
  left: ScalarValue | undefined,
  right: ScalarValue | undefined,
  source: string,
): boolean {
  // A missing attribute satisfies no comparison.
  if (left === undefined || right === undefined) {
    return false;
  }

  switch (operator) {
    case '=':
      return valuesEqual(left, right, source);
    case '<>':
      return !valuesEqual(left, right, source);
    case '<':
      return orderValues(left, right, source) < 0;
    case '<=':
      return orderValues(left, right, source) <= 0;
    case '>':
      return orderValues(left, right, source) > 0;
    case '>=':
      return orderValues(left, right, source) >= 0;
  }
}

/**
 * Evaluates a condition tree against an item.
 *
 * @throws {InvalidExpressionError} On a type mismatch
 */
export function evaluateCondition(node: ConditionNode, item: Item, source: string): boolean {
  switch (node.type) {
    case 'and':
      return evaluateCondition(node.left, item, source) && evaluateCondition(node.right, item, source);
    case 'or':
      return evaluateCondition(node.left, item, source) || evaluateCondition(node.right, item, source);
    case 'not':
      return !evaluateCondition(node.operand, item, source);
    case 'comparison':
      return compare(
        node.operator,
        resolveOperand(node.left, item),
        resolveOperand(node.right, item),
        source,
      );
    case 'between': {
      const value = resolveOperand(node.operand, item);
      const lower = resolveOperand(node.lower, item);
      const upper = resolveOperand(node.upper, item);
      if (value === undefined || lower === undefined || upper === undefined) {
        return false;
      }
      return orderValues(value, lower, source) >= 0 && orderValues(value, upper, source) <= 0;
    }
    case 'exists': {
      const present = readAttribute(item, node.path.name) !== undefined;
      return node.negated ? !present : present;
    }
    case 'match': {
      const target = readAttribute(item, node.path.name);
      const argument = resolveOperand(node.argument, item);
      if (argument === undefined) {
        return false;
      }
      if (typeof argument !== 'string') {
        throw new InvalidExpressionError(
          source,
          `type mismatch: ${node.name} expects a string operand, got ${describeType(argument)}`,
        );
      }
      if (typeof target !== 'string') {
        return false;
      }
      return node.name === 'begins_with' ? target.startsWith(argument) : target.includes(argument);
    }
  }
}

/**
 * Attribute names a condition reads, in first-seen order.
 */
export function conditionAttributes(node: ConditionNode): string[] {
  const names: string[] = [];
  const add = (operand: Operand): void => {
    if (operand.type === 'path' && !names.includes(operand.name)) {
      names.push(operand.name);
    }
  };
  const visit = (current: ConditionNode): void => {
    switch (current.type) {
      case 'and':
      case 'or':
        visit(current.left);
        visit(current.right);
        break;
      case 'not':
        visit(current.operand);
        break;
      case 'comparison':
        add(current.left);
        add(current.right);
        break;
      case 'between':
        add(current.operand);
        add(current.lower);
        add(current.upper);
        break;
      case 'exists':
        add(current.path);
        break;
      case 'match':
        add(current.path);
        add(current.argument);
        break;
    }
  };
  visit(node);
  return names;
}

function evaluateSetTerm(term: SetTerm, item: Item, source: string): ScalarValue {
  if (term.type === 'if_not_exists') {
    const current = readAttribute(item, term.path.name);
    if (current !== undefined) {
      return current;
    }
    return evaluateSetTerm(term.fallback, item, source);
  }
  const value = resolveOperand(term, item);
  if (value === undefined) {
    const name = term.type === 'path' ? term.name : term.placeholder;
    throw new InvalidExpressionError(source, `attribute ${name} does not exist in the item`);
  }
  return value;
}

function evaluateSetValue(value: SetValue, item: Item, source: string): ScalarValue {
  if (value.type !== 'arithmetic') {
    return evaluateSetTerm(value, item, source);
  }
  const left = evaluateSetTerm(value.left, item, source);
  const right = evaluateSetTerm(value.right, item, source);
  if (typeof left !== 'number' || typeof right !== 'number') {
    throw new InvalidExpressionError(
      source,
      `type mismatch: '${value.operator}' needs numbers, got ${describeType(left)} and ${describeType(right)}`,
    );
  }
  return value.operator === '+' ? left + right : left - right;
}

/**
 * A parsed condition bound to its source text.
 */
export class CompiledCondition {
  constructor(
    readonly source: string,
    readonly root: ConditionNode,
  ) {}

  matches(item: Item): boolean {
    return evaluateCondition(this.root, item, this.source);
  }

  attributes(): string[] {
    return conditionAttributes(this.root);
  }
}

/**
 * A parsed update expression bound to its source text.
 */
export class CompiledUpdate {
  constructor(
    readonly source: string,
    readonly actions: readonly UpdateAction[],
  ) {}

  /**
   * Attributes the update writes or removes, in the order written.
   */
  targets(): string[] {
    return [...new Set(this.actions.map((action) => action.path))];
  }

  /**
   * Applies the actions to a copy of the item.
   *
   * @throws {InvalidExpressionError} On a missing operand or a type mismatch
   */
  apply(item: Item): Item {
    const next: Item = { ...item };
    for (const action of this.actions) {
      if (action.type === 'remove') {
        delete next[action.path];
        continue;
      }
      next[action.path] = evaluateSetValue(action.value, next, this.source);
    }
    return next;
  }
}

export function compileCondition(expression: string, context: ExpressionContext = {}): CompiledCondition {
  return new CompiledCondition(expression, parseCondition(expression, context));
}

export function compileUpdate(expression: string, context: ExpressionContext = {}): CompiledUpdate {
  return new CompiledUpdate(expression, parseUpdate(expression, context));
}
