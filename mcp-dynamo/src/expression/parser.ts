/**
 * Recursive-descent parser for condition and update expressions.
 *
 * Condition grammar:
 *
 *   condition  := disjunct ('OR' disjunct)*
 *   disjunct   := conjunct ('AND' conjunct)*
 *   conjunct   := 'NOT' conjunct | primary
 *   primary    := '(' condition ')'
 *               | function '(' path [',' operand] ')'
 *               | operand 'BETWEEN' operand 'AND' operand
 *               | operand comparator operand
 *
 * Update grammar:
 *
 *   update     := clause+
 *   clause     := 'SET' assignment (',' assignment)* | 'REMOVE' path (',' path)*
 *   assignment := path '=' term [('+' | '-') term]
 *   term       := 'if_not_exists' '(' path ',' operand ')' | operand
 *
 * @module expression/parser
 */

import { InvalidExpressionError } from '../errors/index.js';
import type { ExpressionNames, ExpressionValues } from '../types.js';
import type {
  Comparator,
  ConditionNode,
  Operand,
  PathOperand,
  SetTerm,
  SetValue,
  UpdateAction,
} from './ast.js';
import { tokenize } from './tokenizer.js';
import type { Token, TokenType } from './tokenizer.js';

export interface ExpressionContext {
  names?: ExpressionNames;
  values?: ExpressionValues;
}

const RESERVED_WORDS = new Set(['AND', 'OR', 'NOT', 'BETWEEN', 'SET', 'REMOVE', 'ADD', 'DELETE']);

const MATCH_FUNCTIONS = new Set(['begins_with', 'contains']);
const EXISTS_FUNCTIONS = new Set(['attribute_exists', 'attribute_not_exists']);

const COMPARATORS: readonly Comparator[] = ['=', '<>', '<', '<=', '>', '>='];

function isComparator(text: string): text is Comparator {
  return COMPARATORS.some((comparator) => comparator === text);
}

function hasOwn(record: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

class Parser {
  private index = 0;
  private readonly tokens: Token[];

  constructor(
    private readonly source: string,
    private readonly context: ExpressionContext,
  ) {
    if (source.trim() === '') {
      throw new InvalidExpressionError(source, 'expression is empty');
    }
    this.tokens = tokenize(source);
  }

  parseCondition(): ConditionNode {
    const node = this.parseDisjunction();
    this.expectEnd();
    return node;
  }

  parseUpdate(): UpdateAction[] {
    const actions: UpdateAction[] = [];
    const seenClauses = new Set<string>();

    while (this.peek().type !== 'eof') {
      const token = this.next();
      const clause = token.type === 'identifier' ? token.text.toUpperCase() : '';
      if (clause !== 'SET' && clause !== 'REMOVE') {
        this.fail(
          clause === 'ADD' || clause === 'DELETE'
            ? `${clause} clauses are not supported`
            : `expected SET or REMOVE at position ${token.position}`,
        );
      }
      if (seenClauses.has(clause)) {
        this.fail(`${clause} clause appears more than once`);
      }
      seenClauses.add(clause);

      do {
        const path = this.parsePath();
        if (clause === 'SET') {
          const equals = this.next();
          if (equals.type !== 'comparator' || equals.text !== '=') {
            this.fail(`expected '=' after ${path.name} at position ${equals.position}`);
          }
          actions.push({ type: 'set', path: path.name, value: this.parseSetValue() });
        } else {
          actions.push({ type: 'remove', path: path.name });
        }
      } while (this.accept('comma'));
    }

    return actions;
  }

  private parseDisjunction(): ConditionNode {
    let left = this.parseConjunction();
    while (this.acceptKeyword('OR')) {
      left = { type: 'or', left, right: this.parseConjunction() };
    }
    return left;
  }

  private parseConjunction(): ConditionNode {
    let left = this.parseNegation();
    while (this.acceptKeyword('AND')) {
      left = { type: 'and', left, right: this.parseNegation() };
    }
    return left;
  }

  private parseNegation(): ConditionNode {
    if (this.acceptKeyword('NOT')) {
      return { type: 'not', operand: this.parseNegation() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ConditionNode {
    const token = this.peek();

    if (token.type === 'lparen') {
      this.next();
      const node = this.parseDisjunction();
      this.expect('rparen', 'unbalanced parentheses');
      return node;
    }

    if (token.type === 'identifier' && this.peek(1).type === 'lparen') {
      return this.parseFunction();
    }

    const left = this.parseOperand();

    if (this.acceptKeyword('BETWEEN')) {
      const lower = this.parseOperand();
      if (!this.acceptKeyword('AND')) {
        this.fail(`expected AND in BETWEEN at position ${this.peek().position}`);
      }
      return { type: 'between', operand: left, lower, upper: this.parseOperand() };
    }

    const operator = this.next();
    if (operator.type !== 'comparator' || !isComparator(operator.text)) {
      this.fail(`expected a comparator at position ${operator.position}`);
    }
    return { type: 'comparison', operator: operator.text, left, right: this.parseOperand() };
  }

  private parseFunction(): ConditionNode {
    const name = this.next();
    this.expect('lparen', `expected '(' after ${name.text}`);

    if (MATCH_FUNCTIONS.has(name.text)) {
      const path = this.parsePath();
      this.expect('comma', `${name.text} takes two arguments`);
      const argument = this.parseOperand();
      this.expect('rparen', 'unbalanced parentheses');
      return {
        type: 'match',
        name: name.text === 'begins_with' ? 'begins_with' : 'contains',
        path,
        argument,
      };
    }

    if (EXISTS_FUNCTIONS.has(name.text)) {
      const path = this.parsePath();
      this.expect('rparen', 'unbalanced parentheses');
      return { type: 'exists', path, negated: name.text === 'attribute_not_exists' };
    }

    return this.fail(`unsupported function '${name.text}'`);
  }

  private parseSetValue(): SetValue {
    const left = this.parseSetTerm();
    const operator = this.peek();
    if (operator.type === 'plus' || operator.type === 'minus') {
      this.next();
      return {
        type: 'arithmetic',
        operator: operator.type === 'plus' ? '+' : '-',
        left,
        right: this.parseSetTerm(),
      };
    }
    return left;
  }

  private parseSetTerm(): SetTerm {
    const token = this.peek();
    if (token.type === 'identifier' && token.text === 'if_not_exists' && this.peek(1).type === 'lparen') {
      this.next();
      this.next();
      const path = this.parsePath();
      this.expect('comma', 'if_not_exists takes two arguments');
      const fallback = this.parseOperand();
      this.expect('rparen', 'unbalanced parentheses');
      return { type: 'if_not_exists', path, fallback };
    }
    return this.parseOperand();
  }

  private parsePath(): PathOperand {
    const operand = this.parseOperand();
    if (operand.type !== 'path') {
      return this.fail(`expected an attribute name, got ${operand.placeholder}`);
    }
    return operand;
  }

  private parseOperand(): Operand {
    const token = this.next();

    switch (token.type) {
      case 'identifier':
        if (RESERVED_WORDS.has(token.text.toUpperCase())) {
          return this.fail(`unexpected keyword ${token.text} at position ${token.position}`);
        }
        return { type: 'path', name: token.text };
      case 'nameRef': {
        const names = this.context.names ?? {};
        const name = names[token.text];
        if (!hasOwn(names, token.text) || typeof name !== 'string') {
          return this.fail(`unknown attribute name reference ${token.text}`);
        }
        return { type: 'path', name };
      }
      case 'placeholder': {
        const values = this.context.values ?? {};
        if (!hasOwn(values, token.text)) {
          return this.fail(`unknown placeholder ${token.text}`);
        }
        return { type: 'value', placeholder: token.text, value: values[token.text] ?? null };
      }
      case 'eof':
        return this.fail('unexpected end of expression');
      default:
        return this.fail(`unexpected '${token.text}' at position ${token.position}`);
    }
  }

  private peek(offset = 0): Token {
    const index = Math.min(this.index + offset, this.tokens.length - 1);
    const token = this.tokens[index];
    if (!token) {
      return { type: 'eof', text: '', position: this.source.length };
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== 'eof') {
      this.index++;
    }
    return token;
  }

  private accept(type: TokenType): boolean {
    if (this.peek().type === type) {
      this.next();
      return true;
    }
    return false;
  }

  private acceptKeyword(word: string): boolean {
    const token = this.peek();
    if (token.type === 'identifier' && token.text.toUpperCase() === word) {
      this.next();
      return true;
    }
    return false;
  }

  private expect(type: TokenType, reason: string): Token {
    const token = this.next();
    if (token.type !== type) {
      this.fail(reason);
    }
    return token;
  }

  private expectEnd(): void {
    const token = this.peek();
    if (token.type === 'rparen') {
      this.fail('unbalanced parentheses');
    }
    if (token.type !== 'eof') {
      this.fail(`unexpected '${token.text}' at position ${token.position}`);
    }
  }

  private fail(reason: string): never {
    throw new InvalidExpressionError(this.source, reason);
  }
}

/**
 * Parses a condition, filter or key-condition expression.
 *
 * @throws {InvalidExpressionError} On syntax errors, unknown placeholders or name references
 */
export function parseCondition(expression: string, context: ExpressionContext = {}): ConditionNode {
  return new Parser(expression, context).parseCondition();
}

/**
 * Parses an update expression into its actions, in the order written.
 *
 * @throws {InvalidExpressionError} On syntax errors, unknown placeholders or name references
 */
export function parseUpdate(expression: string, context: ExpressionContext = {}): UpdateAction[] {
  return new Parser(expression, context).parseUpdate();
}
