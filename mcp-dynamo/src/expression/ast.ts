/**
 * Expression trees produced by the parser.
 * @module expression/ast
 */

import type { ScalarValue } from '../types.js';

export type Comparator = '=' | '<>' | '<' | '<=' | '>' | '>=';

export interface PathOperand {
  type: 'path';
  name: string;
}

/**
 * A `:placeholder`, bound to its value at parse time.
 */
export interface ValueOperand {
  type: 'value';
  placeholder: string;
  value: ScalarValue;
}

export type Operand = PathOperand | ValueOperand;

export interface ComparisonNode {
  type: 'comparison';
  operator: Comparator;
  left: Operand;
  right: Operand;
}

export interface BetweenNode {
  type: 'between';
  operand: Operand;
  lower: Operand;
  upper: Operand;
}

export interface MatchFunctionNode {
  type: 'match';
  name: 'begins_with' | 'contains';
  path: PathOperand;
  argument: Operand;
}

export interface ExistsNode {
  type: 'exists';
  path: PathOperand;
  negated: boolean;
}

export interface LogicalNode {
  type: 'and' | 'or';
  left: ConditionNode;
  right: ConditionNode;
}

export interface NotNode {
  type: 'not';
  operand: ConditionNode;
}

export type ConditionNode =
  | ComparisonNode
  | BetweenNode
  | MatchFunctionNode
  | ExistsNode
  | LogicalNode
  | NotNode;

export interface IfNotExistsTerm {
  type: 'if_not_exists';
  path: PathOperand;
  fallback: Operand;
}

export type SetTerm = Operand | IfNotExistsTerm;

export interface ArithmeticValue {
  type: 'arithmetic';
  operator: '+' | '-';
  left: SetTerm;
  right: SetTerm;
}

export type SetValue = SetTerm | ArithmeticValue;

export interface SetAction {
  type: 'set';
  path: string;
  value: SetValue;
}

export interface RemoveAction {
  type: 'remove';
  path: string;
}

export type UpdateAction = SetAction | RemoveAction;
