/**
 * Item validation and key extraction.
 * @module store/keys
 */

import { InvalidParametersError, MissingKeyError } from '../errors/index.js';
import type { Item, Key, KeySchema, ScalarValue } from '../types.js';

export function isScalarValue(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrows untrusted input to an item.
 *
 * @throws {InvalidParametersError} If the input is not an object of scalar attributes
 */
export function parseItem(value: unknown, label = 'item'): Item {
  if (!isPlainObject(value)) {
    throw new InvalidParametersError(`${label} must be an object of attributes`);
  }
  const item: Item = {};
  for (const [name, attribute] of Object.entries(value)) {
    if (!isScalarValue(attribute)) {
      throw new InvalidParametersError(
        `${label} attribute ${name} must be a string, finite number, boolean or null`,
        { attribute: name },
      );
    }
    item[name] = attribute;
  }
  return item;
}

export function keyAttributes(schema: KeySchema): string[] {
  return schema.sortKey ? [schema.partitionKey, schema.sortKey] : [schema.partitionKey];
}

/**
 * Projects an item onto the key schema.
 *
 * @throws {MissingKeyError} If a key attribute is absent, empty, or not a string or number
 */
export function extractKey(schema: KeySchema, source: Item): Key {
  const key: Key = {};
  for (const attribute of keyAttributes(schema)) {
    const value = Object.prototype.hasOwnProperty.call(source, attribute) ? source[attribute] : undefined;
    if (value === undefined || value === null) {
      throw new MissingKeyError(attribute);
    }
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new MissingKeyError(attribute, 'key attributes must be strings or numbers');
    }
    if (value === '') {
      throw new MissingKeyError(attribute, 'key attributes must not be empty');
    }
    key[attribute] = value;
  }
  return key;
}

/**
 * Storage identity of a key. Strings and numbers never collide: "1" and 1
 * are different keys.
 */
export function keyToken(schema: KeySchema, key: Key): string {
  return JSON.stringify(keyAttributes(schema).map((attribute) => key[attribute]));
}

function typeRank(value: ScalarValue | undefined): number {
  return typeof value === 'number' ? 0 : typeof value === 'string' ? 1 : 2;
}

/**
 * Sort-key ordering: numbers numerically, strings by code unit, numbers first.
 */
export function compareKeyValues(left: ScalarValue | undefined, right: ScalarValue | undefined): number {
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  return typeRank(left) - typeRank(right);
}
