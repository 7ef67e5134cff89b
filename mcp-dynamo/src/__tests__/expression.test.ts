/**
 * Tests for the expression tokenizer, parser and evaluator.
 */

import { describe, expect, it } from 'vitest';
import { InvalidExpressionError } from '../errors/index.js';
import { compileCondition, compileUpdate, conditionAttributes, parseCondition, tokenize } from '../expression/index.js';

describe('tokenize', () => {
  it('should split comparators, placeholders and name references', () => {
    const tokens = tokenize('#s <= :limit');

    expect(tokens.map((token) => token.type)).toEqual(['nameRef', 'comparator', 'placeholder', 'eof']);
    expect(tokens.map((token) => token.text)).toEqual(['#s', '<=', ':limit', '']);
  });

  it('should read <> as one comparator', () => {
    expect(tokenize('a <> b')[1]).toEqual({ type: 'comparator', text: '<>', position: 2 });
  });

  it('should reject characters that start no token', () => {
    expect(() => tokenize('a ! b')).toThrow("Invalid expression: a ! b - unexpected character '!' at position 2");
  });

  it('should reject an empty placeholder', () => {
    expect(() => tokenize('a = :')).toThrow('empty placeholder at position 4');
  });
});

describe('compileCondition', () => {
  it('should evaluate comparisons joined by AND', () => {
    const condition = compileCondition('status = :s AND qty > :q', { values: { ':s': 'open', ':q': 3 } });

    expect(condition.matches({ status: 'open', qty: 5 })).toBe(true);
    expect(condition.matches({ status: 'open', qty: 2 })).toBe(false);
    expect(condition.matches({ status: 'closed', qty: 5 })).toBe(false);
  });

  it('should honour OR, NOT and parentheses', () => {
    const condition = compileCondition('NOT (a = :x OR b = :x)', { values: { ':x': 1 } });

    expect(condition.matches({ a: 2, b: 3 })).toBe(true);
    expect(condition.matches({ a: 1, b: 3 })).toBe(false);
  });

  it('should treat keywords case-insensitively', () => {
    const condition = compileCondition('a = :x and not b = :y', { values: { ':x': 1, ':y': 2 } });

    expect(condition.matches({ a: 1, b: 3 })).toBe(true);
  });

  it('should make every comparison on a missing attribute false', () => {
    const values = { ':x': 1 };

    expect(compileCondition('missing = :x', { values }).matches({})).toBe(false);
    expect(compileCondition('missing <> :x', { values }).matches({})).toBe(false);
    expect(compileCondition('missing < :x', { values }).matches({})).toBe(false);
  });

  it('should reject comparing values of different types', () => {
    const condition = compileCondition('qty = :s', { values: { ':s': 'five' } });

    expect(() => condition.matches({ qty: 5 })).toThrow(
      'Invalid expression: qty = :s - type mismatch: cannot compare number with string',
    );
  });

  it('should reject ordering booleans', () => {
    const condition = compileCondition('flag > :f', { values: { ':f': false } });

    expect(() => condition.matches({ flag: true })).toThrow('type mismatch: cannot order boolean against boolean');
  });

  it('should compare null only for equality', () => {
    const condition = compileCondition('note = :n', { values: { ':n': null } });

    expect(condition.matches({ note: null })).toBe(true);
    expect(condition.matches({ note: 'text' })).toBe(false);
  });

  it('should evaluate BETWEEN inclusively', () => {
    const condition = compileCondition('qty BETWEEN :lo AND :hi', { values: { ':lo': 1, ':hi': 5 } });

    expect(condition.matches({ qty: 1 })).toBe(true);
    expect(condition.matches({ qty: 5 })).toBe(true);
    expect(condition.matches({ qty: 6 })).toBe(false);
  });

  it('should evaluate begins_with and contains on strings', () => {
    const values = { ':p': 'ORD#', ':t': 'blue' };

    expect(compileCondition('begins_with(sk, :p)', { values }).matches({ sk: 'ORD#17' })).toBe(true);
    expect(compileCondition('begins_with(sk, :p)', { values }).matches({ sk: 'INV#17' })).toBe(false);
    expect(compileCondition('contains(tags, :t)', { values }).matches({ tags: 'red,blue' })).toBe(true);
    expect(compileCondition('contains(tags, :t)', { values }).matches({ tags: 4 })).toBe(false);
  });

  it('should evaluate attribute_exists and attribute_not_exists', () => {
    expect(compileCondition('attribute_exists(a)').matches({ a: null })).toBe(true);
    expect(compileCondition('attribute_not_exists(a)').matches({})).toBe(true);
    expect(compileCondition('attribute_not_exists(a)').matches({ a: 1 })).toBe(false);
  });

  it('should resolve name references', () => {
    const condition = compileCondition('#s = :s', { names: { '#s': 'status' }, values: { ':s': 'open' } });

    expect(condition.matches({ status: 'open' })).toBe(true);
    expect(condition.attributes()).toEqual(['status']);
  });

  it('should tolerate unused placeholders', () => {
    const condition = compileCondition('a = :x', { values: { ':x': 1, ':unused': 2 } });

    expect(condition.matches({ a: 1 })).toBe(true);
  });

  it('should fail on an unknown placeholder', () => {
    expect(() => compileCondition('a = :missing', { values: {} })).toThrow(
      'Invalid expression: a = :missing - unknown placeholder :missing',
    );
  });

  it('should fail on an unknown name reference', () => {
    expect(() => compileCondition('#n = :x', { values: { ':x': 1 } })).toThrow('unknown attribute name reference #n');
  });

  it('should fail on unbalanced parentheses', () => {
    const context = { values: { ':x': 1 } };

    expect(() => compileCondition('(a = :x', context)).toThrow('unbalanced parentheses');
    expect(() => compileCondition('a = :x)', context)).toThrow('unbalanced parentheses');
  });

  it('should fail on an empty expression', () => {
    expect(() => compileCondition('   ')).toThrow(InvalidExpressionError);
    expect(() => compileCondition('   ')).toThrow('expression is empty');
  });

  it('should fail on an unsupported function', () => {
    expect(() => compileCondition('size(a) > :x', { values: { ':x': 1 } })).toThrow("unsupported function 'size'");
  });

  it('should fail on a missing comparator', () => {
    expect(() => compileCondition('a :x', { values: { ':x': 1 } })).toThrow('expected a comparator at position 2');
  });
});

describe('conditionAttributes', () => {
  it('should list attributes in first-seen order without duplicates', () => {
    const root = parseCondition('a = :x AND (b > :y OR a < :z)', { values: { ':x': 1, ':y': 2, ':z': 3 } });

    expect(conditionAttributes(root)).toEqual(['a', 'b']);
  });
});

describe('compileUpdate', () => {
  it('should apply SET actions left to right', () => {
    const update = compileUpdate('SET a = :x, b = a', { values: { ':x': 5 } });

    expect(update.apply({ a: 1 })).toEqual({ a: 5, b: 5 });
  });

  it('should apply arithmetic and if_not_exists', () => {
    const values = { ':zero': 0, ':one': 1 };

    expect(compileUpdate('SET n = n + :one', { values }).apply({ n: 1 })).toEqual({ n: 2 });
    expect(compileUpdate('SET n = n - :one', { values }).apply({ n: 1 })).toEqual({ n: 0 });
    expect(compileUpdate('SET n = if_not_exists(n, :zero) + :one', { values }).apply({})).toEqual({ n: 1 });
  });

  it('should combine SET and REMOVE clauses', () => {
    const update = compileUpdate('SET a = :x REMOVE b, c', { values: { ':x': 'new' } });

    expect(update.apply({ a: 'old', b: 1, c: 2, d: 3 })).toEqual({ a: 'new', d: 3 });
  });

  it('should not modify the input item', () => {
    const item = { a: 1 };
    compileUpdate('REMOVE a').apply(item);

    expect(item).toEqual({ a: 1 });
  });

  it('should list distinct targets in the order written', () => {
    const update = compileUpdate('SET a = :x, b = :x REMOVE a', { values: { ':x': 1 } });

    expect(update.targets()).toEqual(['a', 'b']);
  });

  it('should reject a repeated clause', () => {
    expect(() => compileUpdate('SET a = :x SET b = :x', { values: { ':x': 1 } })).toThrow(
      'SET clause appears more than once',
    );
  });

  it('should reject ADD clauses', () => {
    expect(() => compileUpdate('ADD a :x', { values: { ':x': 1 } })).toThrow('ADD clauses are not supported');
  });

  it('should fail when an operand attribute is missing', () => {
    const update = compileUpdate('SET n = n + :one', { values: { ':one': 1 } });

    expect(() => update.apply({})).toThrow('attribute n does not exist in the item');
  });

  it('should fail on arithmetic with non-numbers', () => {
    const update = compileUpdate('SET n = s + :one', { values: { ':one': 1 } });

    expect(() => update.apply({ s: 'text' })).toThrow("type mismatch: '+' needs numbers, got string and number");
  });
});
