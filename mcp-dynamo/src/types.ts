/**
 * Shared data model for the table simulator.
 * @module types
 */

import type { ErrorCode } from './errors/index.js';

/**
 * The closed set of values an item attribute may hold.
 */
export type ScalarValue = string | number | boolean | null;

/**
 * An item: attribute name to scalar value.
 */
export type Item = Record<string, ScalarValue>;

/**
 * Key attribute values are restricted to strings and numbers.
 */
export type KeyValue = string | number;

/**
 * Projection of an item onto its table's key schema.
 */
export type Key = Record<string, KeyValue>;

export type BillingMode = 'ON_DEMAND' | 'PROVISIONED';

export interface KeySchema {
  partitionKey: string;
  sortKey?: string;
}

/**
 * `:placeholder` bindings used by condition, filter and update expressions.
 */
export type ExpressionValues = Record<string, ScalarValue>;

/**
 * `#alias` bindings used by condition, filter and update expressions.
 */
export type ExpressionNames = Record<string, string>;

/**
 * Every operation the dispatcher accepts through `invoke`.
 */
export const TOOL_NAMES = [
  'create_table',
  'describe_table',
  'delete_table',
  'list_tables',
  'update_table',
  'put_item',
  'get_item',
  'update_item',
  'delete_item',
  'query',
  'scan',
  'batch_write_item',
  'batch_get_item',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

export const READ_OPERATIONS: ReadonlySet<ToolName> = new Set<ToolName>([
  'get_item',
  'batch_get_item',
  'query',
  'scan',
]);

export const WRITE_OPERATIONS: ReadonlySet<ToolName> = new Set<ToolName>([
  'put_item',
  'update_item',
  'delete_item',
  'batch_write_item',
]);

export const BATCH_OPERATIONS: ReadonlySet<ToolName> = new Set<ToolName>([
  'batch_write_item',
  'batch_get_item',
]);

/**
 * How an operation located its items.
 * - key: addressed by primary key (get, put, query, ...)
 * - scan: examined the whole table
 * - none: table-level operation
 */
export type AccessPattern = 'key' | 'scan' | 'none';

export type StreamEventName = 'INSERT' | 'MODIFY' | 'REMOVE';

/**
 * A single item-level change produced by a write.
 */
export interface ItemMutation {
  eventName: StreamEventName;
  key: Key;
  newImage?: Item;
  oldImage?: Item;
}

/**
 * Schema and size of a table at the moment an operation finished.
 */
export interface TableSnapshot {
  tableName: string;
  keySchema: KeySchema;
  billingMode: BillingMode;
  itemCount: number;
}

/**
 * What a query's key condition pinned down.
 */
export interface KeyConditionSummary {
  pinsPartitionKey: boolean;
  hasSortKeyCondition: boolean;
  /** Items sharing the pinned partition key; 0 when nothing was pinned. */
  partitionItemCount: number;
}

/**
 * Mutable description of an operation, filled in while it runs.
 */
export interface OperationDraft {
  tableName: string;
  kind: ToolName;
  access: AccessPattern;
  /** Items returned or written. */
  itemCount: number;
  /** Items examined, which exceeds itemCount for filtered reads. */
  scannedCount: number;
  /** Items or keys in the request; 1 for single-item operations. */
  requestedCount: number;
  /** Size in bytes of every item examined or written. */
  itemSizes: number[];
  filtered: boolean;
  filterAttributes: string[];
  keyCondition?: KeyConditionSummary;
  table?: TableSnapshot;
  mutations: ItemMutation[];
}

/**
 * Produced once per invocation that reached the store, then handed to the
 * accountant, the analyzers and the stream adapter.
 */
export interface OperationRecord extends Readonly<OperationDraft> {
  readonly timestamp: Date;
  readonly success: boolean;
  readonly errorCode?: ErrorCode;
}

export interface Capacity {
  rcu: number;
  wcu: number;
}

export type AdvisorySeverity = 'info' | 'warning';

export type AdvisorySource = 'partition-key-optimizer' | 'index-advisor' | 'capacity-planner';

export interface Advisory {
  source: AdvisorySource;
  severity: AdvisorySeverity;
  message: string;
}

/**
 * Uniform envelope returned by every invocation.
 */
export interface Response<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  errorCode?: ErrorCode;
  cost: number;
  capacity: Capacity;
  advisories: Advisory[];
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
