/**
 * Change-stream synthesis for writes.
 *
 * Sequence numbers are per table name, start at 1 and are never reused:
 * deleting and recreating a table continues the sequence.
 * @module extensions/stream-event-adapter
 */

import { randomUUID } from 'node:crypto';
import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import { marshall } from '@aws-sdk/util-dynamodb';
import type { marshallOptions } from '@aws-sdk/util-dynamodb';
import { itemSize } from '../store/index.js';
import { systemClock } from '../types.js';
import type { Clock, Item, ItemMutation, Key, StreamEventName } from '../types.js';

/**
 * The event body in the DynamoDB Streams record shape.
 */
export interface StreamRecord {
  ApproximateCreationDateTime: number;
  Keys: Record<string, AttributeValue>;
  NewImage?: Record<string, AttributeValue>;
  OldImage?: Record<string, AttributeValue>;
  SequenceNumber: string;
  SizeBytes: number;
  StreamViewType: 'NEW_AND_OLD_IMAGES';
}

export interface StreamEvent {
  eventId: string;
  eventName: StreamEventName;
  eventSource: 'aws:dynamodb';
  eventVersion: '1.1';
  tableName: string;
  sequenceNumber: number;
  createdAt: string;
  keys: Key;
  newImage?: Item;
  oldImage?: Item;
  dynamodb: StreamRecord;
}

type EventDraft = Omit<StreamEvent, 'sequenceNumber' | 'dynamodb'> & {
  dynamodb: Omit<StreamRecord, 'SequenceNumber'>;
};

// Item numbers are any finite double; DynamoDB's N type carries them as text.
const MARSHALL_OPTIONS: marshallOptions = { allowImpreciseNumbers: true };

export interface StreamEventAdapterOptions {
  clock?: Clock;
  idGenerator?: () => string;
}

export class StreamEventAdapter {
  private readonly sequences = new Map<string, number>();
  private readonly logs = new Map<string, StreamEvent[]>();
  private readonly clock: Clock;
  private readonly idGenerator: () => string;

  constructor(options: StreamEventAdapterOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.idGenerator = options.idGenerator ?? randomUUID;
  }

  /**
   * Turns the mutations of one successful write into events and appends
   * them to the table's log. Every image is marshalled before any sequence
   * number is taken, so a batch is logged whole or not at all.
   */
  capture(tableName: string, mutations: readonly ItemMutation[]): StreamEvent[] {
    const now = this.clock();
    const drafts = mutations.map((mutation) => this.toDraft(tableName, mutation, now));
    if (drafts.length === 0) {
      return [];
    }

    let sequenceNumber = this.lastSequenceNumber(tableName);
    const events = drafts.map((draft): StreamEvent => {
      sequenceNumber++;
      return {
        ...draft,
        sequenceNumber,
        dynamodb: { ...draft.dynamodb, SequenceNumber: String(sequenceNumber) },
      };
    });
    this.sequences.set(tableName, sequenceNumber);
    const log = this.logs.get(tableName) ?? [];
    log.push(...events);
    this.logs.set(tableName, log);
    return events;
  }

  /**
   * The most recent events for a table, oldest first.
   */
  recent(tableName: string, limit?: number): StreamEvent[] {
    const log = this.logs.get(tableName) ?? [];
    return limit === undefined ? [...log] : log.slice(Math.max(0, log.length - limit));
  }

  lastSequenceNumber(tableName: string): number {
    return this.sequences.get(tableName) ?? 0;
  }

  private toDraft(tableName: string, mutation: ItemMutation, now: Date): EventDraft {
    const image = mutation.newImage ?? mutation.oldImage ?? mutation.key;
    return {
      eventId: this.idGenerator(),
      eventName: mutation.eventName,
      eventSource: 'aws:dynamodb',
      eventVersion: '1.1',
      tableName,
      createdAt: now.toISOString(),
      keys: { ...mutation.key },
      newImage: mutation.newImage ? { ...mutation.newImage } : undefined,
      oldImage: mutation.oldImage ? { ...mutation.oldImage } : undefined,
      dynamodb: {
        ApproximateCreationDateTime: Math.floor(now.getTime() / 1000),
        Keys: marshall(mutation.key, MARSHALL_OPTIONS),
        NewImage: mutation.newImage ? marshall(mutation.newImage, MARSHALL_OPTIONS) : undefined,
        OldImage: mutation.oldImage ? marshall(mutation.oldImage, MARSHALL_OPTIONS) : undefined,
        SizeBytes: itemSize(image),
        StreamViewType: 'NEW_AND_OLD_IMAGES',
      },
    };
  }
}
