/**
 * Tests for the in-memory table store.
 */

import { beforeEach, describe, expect, it } from 'vitest';
import {
  ConditionalCheckFailedError,
  ErrorCode,
  InvalidExpressionError,
  InvalidSchemaError,
  MissingKeyError,
  TableAlreadyExistsError,
  TableNotFoundError,
} from '../errors/index.js';
import { TableStore, itemSize } from '../store/index.js';

const fixedClock = () => new Date('2024-01-01T00:00:00.000Z');

describe('TableStore', () => {
  let store: TableStore;

  beforeEach(() => {
    store = new TableStore({ clock: fixedClock });
  });

  describe('tables', () => {
    it('should create a table and describe it', () => {
      const info = store.createTable('orders', { partitionKey: 'order_id' }, 'ON_DEMAND');

      expect(info.summary).toEqual({
        tableName: 'orders',
        status: 'ACTIVE',
        partitionKey: 'order_id',
        billingMode: 'ON_DEMAND',
        itemCount: 0,
        sizeBytes: 0,
        createdAt: '2024-01-01T00:00:00.000Z',
      });
      expect(info.table.KeySchema).toEqual([{ AttributeName: 'order_id', KeyType: 'HASH' }]);
      expect(info.table.BillingModeSummary).toEqual({ BillingMode: 'PAY_PER_REQUEST' });
    });

    it('should describe the sort key as a RANGE key', () => {
      const info = store.createTable('events', { partitionKey: 'pk', sortKey: 'sk' }, 'PROVISIONED');

      expect(info.table.KeySchema).toEqual([
        { AttributeName: 'pk', KeyType: 'HASH' },
        { AttributeName: 'sk', KeyType: 'RANGE' },
      ]);
      expect(info.table.BillingModeSummary).toEqual({ BillingMode: 'PROVISIONED' });
    });

    it('should reject a duplicate table name', () => {
      store.createTable('orders', { partitionKey: 'order_id' }, 'ON_DEMAND');

      expect(() => store.createTable('orders', { partitionKey: 'id' }, 'ON_DEMAND')).toThrow(TableAlreadyExistsError);
    });

    it('should reject a key schema without a partition key', () => {
      expect(() => store.createTable('orders', {}, 'ON_DEMAND')).toThrow('Invalid key schema: a partition key is required');
    });

    it('should reject a sort key equal to the partition key', () => {
      expect(() => store.createTable('orders', { partitionKey: 'id', sortKey: 'id' }, 'ON_DEMAND')).toThrow(
        InvalidSchemaError,
      );
    });

    it('should delete a table and its items', () => {
      store.createTable('orders', { partitionKey: 'order_id' }, 'ON_DEMAND');
      store.putItem('orders', { order_id: 'o1' });

      expect(store.deleteTable('orders').summary.itemCount).toBe(1);
      expect(() => store.describeTable('orders')).toThrow('Table orders does not exist');
    });

    it('should switch the billing mode', () => {
      store.createTable('orders', { partitionKey: 'order_id' }, 'ON_DEMAND');

      expect(store.updateTable('orders', 'PROVISIONED').summary.billingMode).toBe('PROVISIONED');
      expect(store.snapshot('orders')?.billingMode).toBe('PROVISIONED');
    });

    it('should list table names in pages', () => {
      for (const name of ['charlie', 'alpha', 'bravo']) {
        store.createTable(name, { partitionKey: 'id' }, 'ON_DEMAND');
      }

      expect(store.listTables(2)).toEqual({ tableNames: ['alpha', 'bravo'], lastEvaluatedTableName: 'bravo' });
      expect(store.listTables(2, 'bravo')).toEqual({ tableNames: ['charlie'] });
      expect(store.listTables()).toEqual({ tableNames: ['alpha', 'bravo', 'charlie'] });
    });
  });

  describe('items', () => {
    beforeEach(() => {
      store.createTable('orders', { partitionKey: 'order_id' }, 'ON_DEMAND');
    });

    it('should replace an item with the same key', () => {
      store.putItem('orders', { order_id: 'o1', status: 'pending' });
      const outcome = store.putItem('orders', { order_id: 'o1', status: 'shipped' });

      expect(outcome.oldItem).toEqual({ order_id: 'o1', status: 'pending' });
      expect(store.scan('orders').items).toEqual([{ order_id: 'o1', status: 'shipped' }]);
    });

    it('should keep string and number keys apart', () => {
      store.putItem('orders', { order_id: '1' });
      store.putItem('orders', { order_id: 1 });

      expect(store.snapshot('orders')?.itemCount).toBe(2);
    });

    it('should require every key attribute', () => {
      expect(() => store.putItem('orders', { status: 'pending' })).toThrow('Missing required key: order_id');
      expect(() => store.putItem('orders', { order_id: true })).toThrow(MissingKeyError);
      expect(() => store.putItem('orders', { order_id: '' })).toThrow(
        'Missing required key: order_id - key attributes must not be empty',
      );
    });

    it('should fail on a missing table', () => {
      expect(() => store.putItem('missing', { order_id: 'o1' })).toThrow(TableNotFoundError);
    });

    it('should return nothing for an absent key', () => {
      expect(store.getItem('orders', { order_id: 'nope' })).toEqual({
        key: { order_id: 'nope' },
        item: undefined,
        sizeBytes: 0,
      });
    });

    it('should create an item from its key on update', () => {
      const outcome = store.updateItem(
        'orders',
        { order_id: 'o2', ignored: 'x' },
        { expression: 'SET status = :s', values: { ':s': 'new' } },
      );

      expect(outcome.item).toEqual({ order_id: 'o2', status: 'new' });
      expect(outcome.oldItem).toBeUndefined();
    });

    it('should refuse to update key attributes', () => {
      expect(() =>
        store.updateItem('orders', { order_id: 'o1' }, { expression: 'SET order_id = :v', values: { ':v': 'o9' } }),
      ).toThrow('cannot update key attribute order_id');
    });

    it('should leave the item untouched when an update fails', () => {
      store.putItem('orders', { order_id: 'o1', total: 'ten' });

      expect(() =>
        store.updateItem('orders', { order_id: 'o1' }, { expression: 'SET total = total + :n', values: { ':n': 1 } }),
      ).toThrow(InvalidExpressionError);
      expect(store.getItem('orders', { order_id: 'o1' }).item).toEqual({ order_id: 'o1', total: 'ten' });
    });

    it('should enforce condition expressions', () => {
      store.putItem('orders', { order_id: 'o1', status: 'pending' });

      expect(() =>
        store.putItem('orders', { order_id: 'o1', status: 'other' }, { expression: 'attribute_not_exists(order_id)' }),
      ).toThrow(ConditionalCheckFailedError);
      expect(store.getItem('orders', { order_id: 'o1' }).item).toEqual({ order_id: 'o1', status: 'pending' });

      const outcome = store.deleteItem(
        'orders',
        { order_id: 'o1' },
        { expression: '#s = :s', names: { '#s': 'status' }, values: { ':s': 'pending' } },
      );
      expect(outcome.oldItem).toEqual({ order_id: 'o1', status: 'pending' });
    });

    it('should delete an absent key without effect', () => {
      expect(store.deleteItem('orders', { order_id: 'nope' })).toEqual({
        key: { order_id: 'nope' },
        oldItem: undefined,
        sizeBytes: 0,
      });
    });
  });

  describe('reads', () => {
    beforeEach(() => {
      store.createTable('events', { partitionKey: 'pk', sortKey: 'sk' }, 'ON_DEMAND');
      for (const sk of [3, 1, 2]) {
        store.putItem('events', { pk: 'user', sk, flag: sk !== 2 });
      }
      store.putItem('events', { pk: 'other', sk: 1, flag: true });
    });

    it('should query one partition in sort key order', () => {
      const outcome = store.query('events', { keyCondition: 'pk = :p', values: { ':p': 'user' } });

      expect(outcome.items.map((item) => item.sk)).toEqual([1, 2, 3]);
      expect(outcome.scannedCount).toBe(3);
    });

    it('should query backwards and stop at the limit', () => {
      const outcome = store.query('events', {
        keyCondition: 'pk = :p',
        values: { ':p': 'user' },
        scanIndexForward: false,
        limit: 2,
      });

      expect(outcome.items.map((item) => item.sk)).toEqual([3, 2]);
      expect(outcome.scannedCount).toBe(2);
    });

    it('should apply sort key conditions and filters', () => {
      const outcome = store.query('events', {
        keyCondition: 'pk = :p AND sk >= :s',
        filter: 'flag = :f',
        values: { ':p': 'user', ':s': 2, ':f': true },
      });

      expect(outcome.items).toEqual([{ pk: 'user', sk: 3, flag: true }]);
      expect(outcome.scannedCount).toBe(2);
      expect(outcome.filterAttributes).toEqual(['flag']);
    });

    it('should scan every item with an optional filter', () => {
      const outcome = store.scan('events', { filter: 'flag = :f', values: { ':f': false } });

      expect(outcome.items).toEqual([{ pk: 'user', sk: 2, flag: false }]);
      expect(outcome.scannedCount).toBe(4);
    });

    it('should count the items of a partition', () => {
      expect(store.countPartition('events', 'user')).toBe(3);
      expect(store.countPartition('events', 'nobody')).toBe(0);
    });
  });

  describe('batches', () => {
    beforeEach(() => {
      store.createTable('orders', { partitionKey: 'order_id' }, 'ON_DEMAND');
    });

    it('should report each write independently', () => {
      const results = store.batchWriteItem('orders', [{ order_id: 'a' }, { status: 'x' }, 'bad']);

      expect(results.map((result) => result.ok)).toEqual([true, false, false]);
      const codes = results.flatMap((result) => (result.ok ? [] : [result.error.code]));
      expect(codes).toEqual([ErrorCode.MissingKey, ErrorCode.InvalidParameters]);
      expect(store.snapshot('orders')?.itemCount).toBe(1);
    });

    it('should report each get independently', () => {
      store.putItem('orders', { order_id: 'a', status: 'open' });
      const results = store.batchGetItem('orders', [{ order_id: 'a' }, { order_id: 'b' }, {}]);

      expect(results[0]).toEqual({
        index: 0,
        ok: true,
        value: { key: { order_id: 'a' }, item: { order_id: 'a', status: 'open' }, sizeBytes: 19 },
      });
      expect(results[1]).toEqual({ index: 1, ok: true, value: { key: { order_id: 'b' }, item: undefined, sizeBytes: 0 } });
      expect(results[2]?.ok).toBe(false);
    });

    it('should fail the whole batch for a missing table', () => {
      expect(() => store.batchWriteItem('missing', [{ order_id: 'a' }])).toThrow(TableNotFoundError);
    });
  });
});

describe('itemSize', () => {
  it('should add attribute name bytes to value bytes', () => {
    expect(itemSize({ order_id: 'o1', status: 'pending' })).toBe(23);
    expect(itemSize({ n: 123 })).toBe(4);
    expect(itemSize({ ok: true, note: null })).toBe(8);
  });
});
