/**
 * In-memory table store with DynamoDB-like key semantics.
 *
 * Every method runs to completion synchronously, so each table has a single
 * writer: an update's read-modify-write cannot interleave with another call.
 * @module store/table-store
 */

import type { KeySchemaElement, TableDescription } from '@aws-sdk/client-dynamodb';
import {
  ConditionalCheckFailedError,
  InvalidExpressionError,
  InvalidSchemaError,
  SimulatorError,
  TableAlreadyExistsError,
  TableNotFoundError,
  isSimulatorError,
} from '../errors/index.js';
import {
  compileCondition,
  compileKeyCondition,
  compileUpdate,
  matchesSortCondition,
} from '../expression/index.js';
import type { CompiledCondition } from '../expression/index.js';
import type {
  BillingMode,
  Clock,
  ExpressionNames,
  ExpressionValues,
  Item,
  Key,
  KeySchema,
  KeyValue,
  TableSnapshot,
} from '../types.js';
import { systemClock } from '../types.js';
import { compareKeyValues, extractKey, keyAttributes, keyToken, parseItem } from './keys.js';
import { itemSize } from './size.js';

interface TableState {
  name: string;
  keySchema: KeySchema;
  billingMode: BillingMode;
  createdAt: Date;
  items: Map<string, Item>;
}

export interface ExpressionInput {
  expression: string;
  names?: ExpressionNames;
  values?: ExpressionValues;
}

export interface TableSummary {
  tableName: string;
  status: 'ACTIVE';
  partitionKey: string;
  sortKey?: string;
  billingMode: BillingMode;
  itemCount: number;
  sizeBytes: number;
  createdAt: string;
}

export interface TableInfo {
  /** The table in DynamoDB's DescribeTable shape. */
  table: TableDescription;
  summary: TableSummary;
}

export interface TableList {
  tableNames: string[];
  lastEvaluatedTableName?: string;
}

export interface PutOutcome {
  key: Key;
  item: Item;
  oldItem?: Item;
  sizeBytes: number;
}

export interface UpdateOutcome {
  key: Key;
  item: Item;
  oldItem?: Item;
  sizeBytes: number;
}

export interface DeleteOutcome {
  key: Key;
  oldItem?: Item;
  sizeBytes: number;
}

export interface GetOutcome {
  key: Key;
  item?: Item;
  sizeBytes: number;
}

export interface ReadOutcome {
  items: Item[];
  /** Items examined before the filter. */
  scannedCount: number;
  scannedSizes: number[];
  /** Attributes the filter read, in first-seen order. */
  filterAttributes: string[];
}

export interface QueryInput {
  keyCondition: string;
  filter?: string;
  names?: ExpressionNames;
  values?: ExpressionValues;
  limit?: number;
  scanIndexForward?: boolean;
}

export interface ScanInput {
  filter?: string;
  names?: ExpressionNames;
  values?: ExpressionValues;
  limit?: number;
}

/**
 * Outcome of one entry in a batch; entries fail independently.
 */
export type BatchEntryResult<T> =
  | { index: number; ok: true; value: T }
  | { index: number; ok: false; error: SimulatorError };

export interface TableStoreOptions {
  clock?: Clock;
}

const TO_WIRE_BILLING_MODE = {
  ON_DEMAND: 'PAY_PER_REQUEST',
  PROVISIONED: 'PROVISIONED',
} as const;

export class TableStore {
  private readonly tables = new Map<string, TableState>();
  private readonly clock: Clock;

  constructor(options: TableStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  createTable(tableName: string, keySchema: Partial<KeySchema>, billingMode: BillingMode): TableInfo {
    if (this.tables.has(tableName)) {
      throw new TableAlreadyExistsError(tableName);
    }
    const partitionKey = keySchema.partitionKey?.trim();
    if (!partitionKey) {
      throw new InvalidSchemaError('a partition key is required');
    }
    const sortKey = keySchema.sortKey?.trim();
    if (keySchema.sortKey !== undefined && !sortKey) {
      throw new InvalidSchemaError('the sort key name must not be empty');
    }
    if (sortKey === partitionKey) {
      throw new InvalidSchemaError('the sort key must differ from the partition key');
    }

    const state: TableState = {
      name: tableName,
      keySchema: sortKey ? { partitionKey, sortKey } : { partitionKey },
      billingMode,
      createdAt: this.clock(),
      items: new Map(),
    };
    this.tables.set(tableName, state);
    return this.describe(state);
  }

  describeTable(tableName: string): TableInfo {
    return this.describe(this.require(tableName));
  }

  deleteTable(tableName: string): TableInfo {
    const state = this.require(tableName);
    const info = this.describe(state);
    this.tables.delete(tableName);
    return info;
  }

  updateTable(tableName: string, billingMode: BillingMode): TableInfo {
    const state = this.require(tableName);
    state.billingMode = billingMode;
    return this.describe(state);
  }

  /**
   * Table names in ascending order, starting after `exclusiveStartTableName`.
   */
  listTables(limit?: number, exclusiveStartTableName?: string): TableList {
    const names = [...this.tables.keys()].sort();
    const remaining =
      exclusiveStartTableName === undefined
        ? names
        : names.filter((name) => name > exclusiveStartTableName);
    if (limit === undefined || remaining.length <= limit) {
      return { tableNames: remaining };
    }
    const page = remaining.slice(0, limit);
    return { tableNames: page, lastEvaluatedTableName: page[page.length - 1] };
  }

  snapshot(tableName: string): TableSnapshot | undefined {
    const state = this.tables.get(tableName);
    if (!state) {
      return undefined;
    }
    return {
      tableName: state.name,
      keySchema: { ...state.keySchema },
      billingMode: state.billingMode,
      itemCount: state.items.size,
    };
  }

  /**
   * Number of items sharing a partition key value.
   */
  countPartition(tableName: string, partitionValue: KeyValue): number {
    const state = this.require(tableName);
    let count = 0;
    for (const item of state.items.values()) {
      if (item[state.keySchema.partitionKey] === partitionValue) {
        count++;
      }
    }
    return count;
  }

  /**
   * Inserts or replaces the item with the same key.
   */
  putItem(tableName: string, item: Item, condition?: ExpressionInput): PutOutcome {
    const state = this.require(tableName);
    const key = extractKey(state.keySchema, item);
    const token = keyToken(state.keySchema, key);
    const existing = state.items.get(token);
    this.checkCondition(state, existing, condition);

    const stored: Item = { ...item };
    state.items.set(token, stored);
    return { key, item: { ...stored }, oldItem: existing, sizeBytes: itemSize(stored) };
  }

  getItem(tableName: string, keyInput: Item): GetOutcome {
    const state = this.require(tableName);
    const key = extractKey(state.keySchema, keyInput);
    const item = state.items.get(keyToken(state.keySchema, key));
    return {
      key,
      item: item ? { ...item } : undefined,
      sizeBytes: item ? itemSize(item) : 0,
    };
  }

  /**
   * Applies an update expression, creating the item from its key when absent.
   */
  updateItem(
    tableName: string,
    keyInput: Item,
    update: ExpressionInput,
    condition?: ExpressionInput,
  ): UpdateOutcome {
    const state = this.require(tableName);
    const key = extractKey(state.keySchema, keyInput);
    const compiled = compileUpdate(update.expression, update);
    const protectedAttributes = keyAttributes(state.keySchema);
    for (const target of compiled.targets()) {
      if (protectedAttributes.includes(target)) {
        throw new InvalidExpressionError(update.expression, `cannot update key attribute ${target}`);
      }
    }

    const token = keyToken(state.keySchema, key);
    const existing = state.items.get(token);
    this.checkCondition(state, existing, condition);

    const updated = compiled.apply(existing ?? { ...key });
    state.items.set(token, updated);
    const sizeBytes = Math.max(itemSize(updated), existing ? itemSize(existing) : 0);
    return { key, item: { ...updated }, oldItem: existing, sizeBytes };
  }

  /**
   * Removes the item at the key. Deleting an absent key succeeds with no effect.
   */
  deleteItem(tableName: string, keyInput: Item, condition?: ExpressionInput): DeleteOutcome {
    const state = this.require(tableName);
    const key = extractKey(state.keySchema, keyInput);
    const token = keyToken(state.keySchema, key);
    const existing = state.items.get(token);
    this.checkCondition(state, existing, condition);

    state.items.delete(token);
    return { key, oldItem: existing, sizeBytes: existing ? itemSize(existing) : 0 };
  }

  /**
   * Reads one partition, ordered by sort key.
   */
  query(tableName: string, input: QueryInput): ReadOutcome {
    const state = this.require(tableName);
    const context = { names: input.names, values: input.values };
    const keyCondition = compileKeyCondition(input.keyCondition, context, state.keySchema);
    const filter = input.filter ? compileCondition(input.filter, context) : undefined;
    const { partitionKey, sortKey } = state.keySchema;

    const partition = [...state.items.values()].filter(
      (item) => item[partitionKey] === keyCondition.partitionValue && matchesSortCondition(keyCondition, item),
    );
    if (sortKey) {
      const direction = input.scanIndexForward === false ? -1 : 1;
      partition.sort((left, right) => direction * compareKeyValues(left[sortKey], right[sortKey]));
    }

    return this.collect(partition, filter, input.limit);
  }

  /**
   * Reads every item in insertion order.
   */
  scan(tableName: string, input: ScanInput = {}): ReadOutcome {
    const state = this.require(tableName);
    const filter = input.filter
      ? compileCondition(input.filter, { names: input.names, values: input.values })
      : undefined;
    return this.collect(state.items.values(), filter, input.limit);
  }

  /**
   * Puts each entry independently. Only a missing table fails the whole batch.
   */
  batchWriteItem(tableName: string, items: readonly unknown[]): BatchEntryResult<PutOutcome>[] {
    this.require(tableName);
    return items.map((raw, index) =>
      this.attempt(index, () => this.putItem(tableName, parseItem(raw, `items[${index}]`))),
    );
  }

  /**
   * Gets each key independently. Only a missing table fails the whole batch.
   */
  batchGetItem(tableName: string, keys: readonly unknown[]): BatchEntryResult<GetOutcome>[] {
    this.require(tableName);
    return keys.map((raw, index) =>
      this.attempt(index, () => this.getItem(tableName, parseItem(raw, `keys[${index}]`))),
    );
  }

  /**
   * Drops every table.
   */
  clear(): void {
    this.tables.clear();
  }

  private attempt<T>(index: number, run: () => T): BatchEntryResult<T> {
    try {
      return { index, ok: true, value: run() };
    } catch (error) {
      if (isSimulatorError(error)) {
        return { index, ok: false, error };
      }
      throw error;
    }
  }

  private collect(
    candidates: Iterable<Item>,
    filter: CompiledCondition | undefined,
    limit: number | undefined,
  ): ReadOutcome {
    const items: Item[] = [];
    const scannedSizes: number[] = [];
    for (const item of candidates) {
      if (limit !== undefined && items.length >= limit) {
        break;
      }
      scannedSizes.push(itemSize(item));
      if (!filter || filter.matches(item)) {
        items.push({ ...item });
      }
    }
    return {
      items,
      scannedCount: scannedSizes.length,
      scannedSizes,
      filterAttributes: filter ? filter.attributes() : [],
    };
  }

  private checkCondition(state: TableState, existing: Item | undefined, condition?: ExpressionInput): void {
    if (!condition) {
      return;
    }
    const compiled = compileCondition(condition.expression, condition);
    if (!compiled.matches(existing ?? {})) {
      throw new ConditionalCheckFailedError(state.name, condition.expression);
    }
  }

  private require(tableName: string): TableState {
    const state = this.tables.get(tableName);
    if (!state) {
      throw new TableNotFoundError(tableName);
    }
    return state;
  }

  private describe(state: TableState): TableInfo {
    let sizeBytes = 0;
    for (const item of state.items.values()) {
      sizeBytes += itemSize(item);
    }

    const keySchema: KeySchemaElement[] = [{ AttributeName: state.keySchema.partitionKey, KeyType: 'HASH' }];
    if (state.keySchema.sortKey) {
      keySchema.push({ AttributeName: state.keySchema.sortKey, KeyType: 'RANGE' });
    }

    return {
      table: {
        TableName: state.name,
        TableStatus: 'ACTIVE',
        KeySchema: keySchema,
        ItemCount: state.items.size,
        TableSizeBytes: sizeBytes,
        CreationDateTime: state.createdAt,
        BillingModeSummary: { BillingMode: TO_WIRE_BILLING_MODE[state.billingMode] },
      },
      summary: {
        tableName: state.name,
        status: 'ACTIVE',
        partitionKey: state.keySchema.partitionKey,
        sortKey: state.keySchema.sortKey,
        billingMode: state.billingMode,
        itemCount: state.items.size,
        sizeBytes,
        createdAt: state.createdAt.toISOString(),
      },
    };
  }
}
