/**
 * Tokenizer for condition, filter, key-condition and update expressions.
 * @module expression/tokenizer
 */

import { InvalidExpressionError } from '../errors/index.js';

export type TokenType =
  | 'identifier'
  | 'placeholder'
  | 'nameRef'
  | 'comparator'
  | 'plus'
  | 'minus'
  | 'lparen'
  | 'rparen'
  | 'comma'
  | 'eof';

export interface Token {
  type: TokenType;
  text: string;
  /** Offset of the first character in the source expression. */
  position: number;
}

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
  '+': 'plus',
  '-': 'minus',
  '(': 'lparen',
  ')': 'rparen',
  ',': 'comma',
};

/**
 * Splits an expression into tokens.
 *
 * @throws {InvalidExpressionError} On a character that starts no token
 */
export function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  const readWhile = (start: number, pattern: RegExp): number => {
    let end = start;
    while (end < expression.length && pattern.test(expression.charAt(end))) {
      end++;
    }
    return end;
  };

  while (position < expression.length) {
    const char = expression.charAt(position);

    if (/\s/.test(char)) {
      position++;
      continue;
    }

    const single = SINGLE_CHAR_TOKENS[char];
    if (single) {
      tokens.push({ type: single, text: char, position });
      position++;
      continue;
    }

    if (char === '<') {
      const next = expression.charAt(position + 1);
      const text = next === '=' || next === '>' ? `<${next}` : '<';
      tokens.push({ type: 'comparator', text, position });
      position += text.length;
      continue;
    }

    if (char === '>') {
      const text = expression.charAt(position + 1) === '=' ? '>=' : '>';
      tokens.push({ type: 'comparator', text, position });
      position += text.length;
      continue;
    }

    if (char === '=') {
      tokens.push({ type: 'comparator', text: '=', position });
      position++;
      continue;
    }

    if (char === ':' || char === '#') {
      const end = readWhile(position + 1, IDENTIFIER_PART);
      if (end === position + 1) {
        throw new InvalidExpressionError(expression, `empty ${char === ':' ? 'placeholder' : 'name reference'} at position ${position}`);
      }
      tokens.push({
        type: char === ':' ? 'placeholder' : 'nameRef',
        text: expression.slice(position, end),
        position,
      });
      position = end;
      continue;
    }

    if (IDENTIFIER_START.test(char)) {
      const end = readWhile(position, IDENTIFIER_PART);
      tokens.push({ type: 'identifier', text: expression.slice(position, end), position });
      position = end;
      continue;
    }

    throw new InvalidExpressionError(expression, `unexpected character '${char}' at position ${position}`);
  }

  tokens.push({ type: 'eof', text: '', position: expression.length });
  return tokens;
}
