import { beforeEach, describe, expect, it } from 'vitest';
import { StreamEventAdapter } from '../extensions/index.js';

describe('StreamEventAdapter', () => {
  let adapter: StreamEventAdapter;

  beforeEach(() => {
    let nextId = 0;
    adapter = new StreamEventAdapter({
      clock: () => new Date('2024-01-01T00:00:00.000Z'),
      idGenerator: () => `evt-${++nextId}`,
    });
  });

  it('should build an INSERT event with plain and marshalled images', () => {
    const [event] = adapter.capture('orders', [
      {
        eventName: 'INSERT',
        key: { order_id: 'o1' },
        newImage: { order_id: 'o1', status: 'pending' },
      },
    ]);

    expect(event).toEqual({
      eventId: 'evt-1',
      eventName: 'INSERT',
      eventSource: 'aws:dynamodb',
      eventVersion: '1.1',
      tableName: 'orders',
      sequenceNumber: 1,
      createdAt: '2024-01-01T00:00:00.000Z',
      keys: { order_id: 'o1' },
      newImage: { order_id: 'o1', status: 'pending' },
      dynamodb: {
        ApproximateCreationDateTime: 1704067200,
        Keys: { order_id: { S: 'o1' } },
        NewImage: { order_id: { S: 'o1' }, status: { S: 'pending' } },
        SequenceNumber: '1',
        SizeBytes: 23,
        StreamViewType: 'NEW_AND_OLD_IMAGES',
      },
    });
  });

  it('should marshal numbers and booleans', () => {
    const [event] = adapter.capture('orders', [
      {
        eventName: 'REMOVE',
        key: { order_id: 7 },
        oldImage: { order_id: 7, paid: true },
      },
    ]);

    expect(event?.dynamodb.OldImage).toEqual({ order_id: { N: '7' }, paid: { BOOL: true } });
    expect(event?.dynamodb.NewImage).toBeUndefined();
  });

  it('should marshal numbers beyond the safe integer range as text', () => {
    const [event] = adapter.capture('orders', [
      { eventName: 'INSERT', key: { order_id: 'o1' }, newImage: { order_id: 'o1', total: 1e20, ratio: -2.5e-7 } },
    ]);

    expect(event?.dynamodb.NewImage).toEqual({
      order_id: { S: 'o1' },
      total: { N: '100000000000000000000' },
      ratio: { N: '-2.5e-7' },
    });
    expect(event?.sequenceNumber).toBe(1);
  });

  it('should number events per table without gaps', () => {
    adapter.capture('orders', [{ eventName: 'INSERT', key: { id: 'a' }, newImage: { id: 'a' } }]);
    adapter.capture('orders', [
      { eventName: 'MODIFY', key: { id: 'a' }, newImage: { id: 'a', n: 1 }, oldImage: { id: 'a' } },
      { eventName: 'INSERT', key: { id: 'b' }, newImage: { id: 'b' } },
    ]);
    adapter.capture('users', [{ eventName: 'INSERT', key: { id: 'u' }, newImage: { id: 'u' } }]);

    expect(adapter.recent('orders').map((event) => event.sequenceNumber)).toEqual([1, 2, 3]);
    expect(adapter.recent('users').map((event) => event.sequenceNumber)).toEqual([1]);
    expect(adapter.lastSequenceNumber('orders')).toBe(3);
  });

  it('should return the most recent events oldest first', () => {
    for (const id of ['a', 'b', 'c']) {
      adapter.capture('orders', [{ eventName: 'INSERT', key: { id }, newImage: { id } }]);
    }

    expect(adapter.recent('orders', 2).map((event) => event.keys.id)).toEqual(['b', 'c']);
  });

  it('should record nothing for an empty batch', () => {
    expect(adapter.capture('orders', [])).toEqual([]);
    expect(adapter.recent('orders')).toEqual([]);
    expect(adapter.lastSequenceNumber('orders')).toBe(0);
  });
});
