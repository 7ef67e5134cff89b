export { TableStore } from './table-store.js';
export type {
  BatchEntryResult,
  DeleteOutcome,
  ExpressionInput,
  GetOutcome,
  PutOutcome,
  QueryInput,
  ReadOutcome,
  ScanInput,
  TableInfo,
  TableList,
  TableStoreOptions,
  TableSummary,
  UpdateOutcome,
} from './table-store.js';
export { compareKeyValues, extractKey, isScalarValue, keyAttributes, keyToken, parseItem } from './keys.js';
export { itemSize } from './size.js';
