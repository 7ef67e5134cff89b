export { ToolDispatcher } from './dispatcher.js';
export type { LedgerReport, TableAdvisories, ToolDispatcherOptions } from './dispatcher.js';
export { createToolSchemas, formatIssues, tableNameSchema } from './schemas.js';
export type { ToolInput, ToolParameters, ToolSchemas } from './schemas.js';
export type {
  BatchEntryFailure,
  BatchGetEntry,
  BatchGetResult,
  BatchWriteEntry,
  BatchWriteResult,
  DeleteItemResult,
  GetItemResult,
  PutItemResult,
  ReadResult,
  StreamEventsField,
  ToolResults,
  UpdateItemResult,
} from './results.js';
