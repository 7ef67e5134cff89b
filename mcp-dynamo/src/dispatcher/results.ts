/**
 * Payloads carried in `Response.data`, per tool.
 * @module dispatcher/results
 */

import type { ErrorCode } from '../errors/index.js';
import type { ReadEfficiency, StreamEvent } from '../extensions/index.js';
import type { TableInfo, TableList } from '../store/index.js';
import type { Item, Key } from '../types.js';

export interface StreamEventsField {
  /** Present when the caller asked for `returnStreamEvent`. */
  streamEvents?: StreamEvent[];
}

export interface PutItemResult extends StreamEventsField {
  item: Item;
  /** True when an item with the same key was overwritten. */
  replaced: boolean;
}

export interface GetItemResult {
  item: Item | null;
  found: boolean;
}

export interface UpdateItemResult extends StreamEventsField {
  item: Item;
  /** True when no item existed and the update created one. */
  created: boolean;
}

export interface DeleteItemResult extends StreamEventsField {
  deleted: boolean;
  /** The item as it was before deletion. */
  item: Item | null;
}

export interface ReadResult {
  items: Item[];
  count: number;
  scannedCount: number;
  efficiency: ReadEfficiency;
}

export interface BatchEntryFailure {
  error: string;
  errorCode: ErrorCode;
}

export type BatchWriteEntry =
  | { index: number; success: true; key: Key; replaced: boolean }
  | ({ index: number; success: false } & BatchEntryFailure);

export interface BatchWriteResult extends StreamEventsField {
  results: BatchWriteEntry[];
  processed: number;
  failed: number;
}

export type BatchGetEntry =
  | { index: number; success: true; key: Key; found: boolean; item: Item | null }
  | ({ index: number; success: false } & BatchEntryFailure);

export interface BatchGetResult {
  results: BatchGetEntry[];
  /** Every item found, in request order. */
  items: Item[];
}

export interface ToolResults {
  create_table: TableInfo;
  describe_table: TableInfo;
  delete_table: TableInfo;
  list_tables: TableList;
  update_table: TableInfo;
  put_item: PutItemResult;
  get_item: GetItemResult;
  update_item: UpdateItemResult;
  delete_item: DeleteItemResult;
  query: ReadResult;
  scan: ReadResult;
  batch_write_item: BatchWriteResult;
  batch_get_item: BatchGetResult;
}
