import type { Item, ScalarValue } from '../types.js';

function valueSize(value: ScalarValue): number {
  if (typeof value === 'string') {
    return Buffer.byteLength(value, 'utf8');
  }
  if (typeof value === 'number') {
    const digits = String(Math.abs(value)).replace(/[^0-9]/g, '').length;
    return Math.ceil(digits / 2) + 1;
  }
  return 1;
}

/**
 * Approximate stored size of an item in bytes, counted the way DynamoDB does:
 * attribute name bytes plus value bytes.
 */
export function itemSize(item: Item): number {
  let total = 0;
  for (const [name, value] of Object.entries(item)) {
    total += Buffer.byteLength(name, 'utf8') + valueSize(value);
  }
  return total;
}
