/**
 * Tool dispatch and the response envelope.
 *
 * `invoke` validates a call, runs it against the store, charges it, runs the
 * analyzers and returns one envelope. It never throws: failures come back
 * with `success: false`.
 * @module dispatcher/dispatcher
 */

import type { SimulatorConfig } from '../config/index.js';
import { ErrorCode, isSimulatorError } from '../errors/index.js';
import { inspectKeyCondition } from '../expression/index.js';
import type {
  Analyzer,
  CapacityAccountant,
  CapacityReport,
  IndexSuggestion,
  LedgerSummary,
  ScanRatioThresholds,
  StreamEvent,
  StreamEventAdapter,
} from '../extensions/index.js';
import { readEfficiency } from '../extensions/index.js';
import { NoopLogger, logError } from '../observability/index.js';
import type { Logger } from '../observability/index.js';
import type { ExpressionInput, ReadOutcome, TableStore } from '../store/index.js';
import { isToolName, systemClock } from '../types.js';
import type {
  Advisory,
  Capacity,
  Clock,
  ExpressionNames,
  ExpressionValues,
  Item,
  OperationDraft,
  OperationRecord,
  Response,
  ToolName,
} from '../types.js';
import type {
  BatchGetEntry,
  BatchWriteEntry,
  StreamEventsField,
  ToolResults,
} from './results.js';
import { createToolSchemas, formatIssues } from './schemas.js';
import type { ToolInput, ToolParameters, ToolSchemas } from './schemas.js';

export interface ToolDispatcherOptions {
  store: TableStore;
  accountant: CapacityAccountant;
  streams: StreamEventAdapter;
  /** Run in order after every call that reached the store. */
  analyzers: readonly Analyzer[];
  config: SimulatorConfig;
  /** Source of index suggestions for {@link ToolDispatcher.getAdvisories}. */
  indexSuggestions?: { suggestionFor(tableName: string): IndexSuggestion | undefined };
  logger?: Logger;
  clock?: Clock;
}

export interface LedgerReport extends LedgerSummary {
  capacity: CapacityReport[];
}

export interface TableAdvisories {
  tableName: string;
  advisories: Advisory[];
  indexSuggestion?: IndexSuggestion;
  capacity?: CapacityReport;
}

type Handler<K extends ToolName> = (params: ToolParameters[K], draft: OperationDraft) => ToolResults[K];

type HandlerMap = { [K in ToolName]: Handler<K> };

type Outcome<T> = { ok: true; data: T } | { ok: false; code: ErrorCode; message: string };

interface ConditionalParams {
  conditionExpression?: string;
  expressionAttributeNames?: ExpressionNames;
  expressionAttributeValues?: ExpressionValues;
}

const NO_CAPACITY = { rcu: 0, wcu: 0 };

function conditionOf(params: ConditionalParams): ExpressionInput | undefined {
  if (params.conditionExpression === undefined) {
    return undefined;
  }
  return {
    expression: params.conditionExpression,
    names: params.expressionAttributeNames,
    values: params.expressionAttributeValues,
  };
}

function unexpectedMessage(toolName: string, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `Unexpected error while executing ${toolName}: ${message}`;
}

function tableNameOf(params: object): string {
  return 'tableName' in params && typeof params.tableName === 'string' ? params.tableName : '';
}

export class ToolDispatcher {
  private readonly store: TableStore;
  private readonly accountant: CapacityAccountant;
  private readonly streams: StreamEventAdapter;
  private readonly analyzers: readonly Analyzer[];
  private readonly indexSuggestions?: ToolDispatcherOptions['indexSuggestions'];
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly schemas: ToolSchemas;
  private readonly scanRatios: ScanRatioThresholds;
  private readonly handlers: HandlerMap;

  constructor(options: ToolDispatcherOptions) {
    this.store = options.store;
    this.accountant = options.accountant;
    this.streams = options.streams;
    this.analyzers = options.analyzers;
    this.indexSuggestions = options.indexSuggestions;
    this.logger = options.logger ?? new NoopLogger();
    this.clock = options.clock ?? systemClock;
    this.schemas = createToolSchemas(options.config.batch);
    this.scanRatios = options.config.partitionKeyOptimizer;
    this.handlers = {
      create_table: (p, d) => this.tableOperation(d, () =>
        this.store.createTable(p.tableName, p.keySchema, p.billingMode),
      ),
      describe_table: (p, d) => this.tableOperation(d, () => this.store.describeTable(p.tableName)),
      delete_table: (p, d) => this.tableOperation(d, () => {
        const deleted = this.store.deleteTable(p.tableName);
        this.forgetTable(p.tableName);
        return deleted;
      }),
      list_tables: (p, d) => this.tableOperation(d, () =>
        this.store.listTables(p.limit, p.exclusiveStartTableName),
      ),
      update_table: (p, d) => this.tableOperation(d, () =>
        this.store.updateTable(p.tableName, p.billingMode),
      ),
      put_item: (p, d) => this.putItem(p, d),
      get_item: (p, d) => this.getItem(p, d),
      update_item: (p, d) => this.updateItem(p, d),
      delete_item: (p, d) => this.deleteItem(p, d),
      query: (p, d) => this.query(p, d),
      scan: (p, d) => this.scan(p, d),
      batch_write_item: (p, d) => this.batchWriteItem(p, d),
      batch_get_item: (p, d) => this.batchGetItem(p, d),
    };
  }

  /**
   * Runs one tool call and returns its envelope.
   */
  invoke<K extends ToolName>(toolName: K, parameters: ToolInput[K]): Response<ToolResults[K]>;
  invoke(toolName: string, parameters?: unknown): Response;
  invoke(toolName: string, parameters?: unknown): Response {
    try {
      if (!isToolName(toolName)) {
        this.logger.warn('Rejected unknown tool', { tool: toolName });
        return this.rejected(`Unknown tool: ${toolName}`);
      }
      return this.dispatch(toolName, parameters);
    } catch (error) {
      logError(this.logger, toolName, error);
      return this.internalError(unexpectedMessage(toolName, error), 0, { ...NO_CAPACITY });
    }
  }

  /**
   * Ledger totals plus per-table capacity usage.
   */
  getLedgerSummary(): LedgerReport {
    return { ...this.accountant.ledgerSummary(), capacity: this.accountant.reports() };
  }

  /**
   * Clears the cost ledger. Capacity samples and analyzer state are kept.
   */
  resetLedger(): void {
    this.accountant.resetLedger();
    this.logger.info('Cost ledger reset');
  }

  /**
   * Advisories currently standing for a table. Unknown tables have none.
   */
  getAdvisories(tableName: string): TableAdvisories {
    const table = this.store.snapshot(tableName);
    if (!table) {
      return { tableName, advisories: [] };
    }
    return {
      tableName,
      advisories: this.analyzers.flatMap((analyzer) => analyzer.standing?.(table) ?? []),
      indexSuggestion: this.indexSuggestions?.suggestionFor(tableName),
      capacity: this.accountant.report(tableName),
    };
  }

  /**
   * The most recent stream events of a table, oldest first.
   */
  getStreamEvents(tableName: string, limit?: number): StreamEvent[] {
    return this.streams.recent(tableName, limit);
  }

  private dispatch<K extends ToolName>(kind: K, parameters: unknown): Response<ToolResults[K]> {
    const schema = this.schemas[kind];
    const parsed = schema.safeParse(parameters);
    if (!parsed.success) {
      this.accountant.recordRejected(kind);
      const reason = formatIssues(parsed.error);
      this.logger.warn('Rejected tool parameters', { tool: kind, reason });
      return this.rejected(`Invalid parameters for ${kind}: ${reason}`);
    }

    const params = parsed.data;
    const draft: OperationDraft = {
      tableName: tableNameOf(params),
      kind,
      access: 'none',
      itemCount: 0,
      scannedCount: 0,
      requestedCount: 1,
      itemSizes: [],
      filtered: false,
      filterAttributes: [],
      mutations: [],
    };
    this.logger.debug('Invoking tool', { tool: kind, tableName: draft.tableName });

    const handler = this.handlers[kind];
    let outcome: Outcome<ToolResults[K]>;
    try {
      outcome = { ok: true, data: handler(params, draft) };
    } catch (error) {
      outcome = this.failure(kind, error);
    }

    draft.table = this.store.snapshot(draft.tableName);
    const record: OperationRecord = {
      ...draft,
      timestamp: this.clock(),
      success: outcome.ok,
      errorCode: outcome.ok ? undefined : outcome.code,
    };
    const { cost, capacity } = this.accountant.charge(record);

    let advisories: Advisory[];
    try {
      advisories = this.analyzers.flatMap((analyzer) => analyzer.observe(record));
    } catch (error) {
      // Already charged: the envelope reports what the ledger recorded.
      logError(this.logger, kind, error);
      return this.internalError(unexpectedMessage(kind, error), cost, capacity);
    }

    if (!outcome.ok) {
      this.logger.warn('Tool invocation failed', {
        tool: kind,
        tableName: record.tableName,
        code: outcome.code,
        message: outcome.message,
      });
      return {
        success: false,
        error: outcome.message,
        errorCode: outcome.code,
        cost,
        capacity,
        advisories,
      };
    }

    return { success: true, data: outcome.data, cost, capacity, advisories };
  }

  /**
   * Simulator errors keep their code; anything else is logged and becomes INTERNAL_ERROR.
   */
  private failure(kind: ToolName, error: unknown): { ok: false; code: ErrorCode; message: string } {
    if (isSimulatorError(error)) {
      return { ok: false, code: error.code, message: error.message };
    }
    logError(this.logger, kind, error);
    return { ok: false, code: ErrorCode.Internal, message: unexpectedMessage(kind, error) };
  }

  private internalError(message: string, cost: number, capacity: Capacity): Response<never> {
    return {
      success: false,
      error: message,
      errorCode: ErrorCode.Internal,
      cost,
      capacity,
      advisories: [],
    };
  }

  private rejected(message: string): Response<never> {
    return {
      success: false,
      error: message,
      errorCode: ErrorCode.InvalidParameters,
      cost: 0,
      capacity: { ...NO_CAPACITY },
      advisories: [],
    };
  }

  private forgetTable(tableName: string): void {
    this.accountant.forget(tableName);
    for (const analyzer of this.analyzers) {
      analyzer.forget?.(tableName);
    }
  }

  private tableOperation<T>(draft: OperationDraft, run: () => T): T {
    draft.access = 'none';
    return run();
  }

  private putItem(params: ToolParameters['put_item'], draft: OperationDraft): ToolResults['put_item'] {
    draft.access = 'key';
    const outcome = this.store.putItem(params.tableName, params.item, conditionOf(params));
    draft.itemCount = 1;
    draft.itemSizes.push(outcome.sizeBytes);
    draft.mutations.push(
      outcome.oldItem
        ? { eventName: 'MODIFY', key: outcome.key, newImage: outcome.item, oldImage: outcome.oldItem }
        : { eventName: 'INSERT', key: outcome.key, newImage: outcome.item },
    );
    return {
      item: outcome.item,
      replaced: outcome.oldItem !== undefined,
      ...this.publish(draft, params.returnStreamEvent),
    };
  }

  private getItem(params: ToolParameters['get_item'], draft: OperationDraft): ToolResults['get_item'] {
    draft.access = 'key';
    const outcome = this.store.getItem(params.tableName, params.key);
    if (outcome.item) {
      draft.itemCount = 1;
      draft.scannedCount = 1;
      draft.itemSizes.push(outcome.sizeBytes);
    }
    return { item: outcome.item ?? null, found: outcome.item !== undefined };
  }

  private updateItem(params: ToolParameters['update_item'], draft: OperationDraft): ToolResults['update_item'] {
    draft.access = 'key';
    const outcome = this.store.updateItem(
      params.tableName,
      params.key,
      {
        expression: params.updateExpression,
        names: params.expressionAttributeNames,
        values: params.expressionAttributeValues,
      },
      conditionOf(params),
    );
    draft.itemCount = 1;
    draft.itemSizes.push(outcome.sizeBytes);
    draft.mutations.push(
      outcome.oldItem
        ? { eventName: 'MODIFY', key: outcome.key, newImage: outcome.item, oldImage: outcome.oldItem }
        : { eventName: 'INSERT', key: outcome.key, newImage: outcome.item },
    );
    return {
      item: outcome.item,
      created: outcome.oldItem === undefined,
      ...this.publish(draft, params.returnStreamEvent),
    };
  }

  private deleteItem(params: ToolParameters['delete_item'], draft: OperationDraft): ToolResults['delete_item'] {
    draft.access = 'key';
    const outcome = this.store.deleteItem(params.tableName, params.key, conditionOf(params));
    // Deleting an absent key changes nothing and emits no event.
    if (outcome.oldItem) {
      draft.itemCount = 1;
      draft.itemSizes.push(outcome.sizeBytes);
      draft.mutations.push({ eventName: 'REMOVE', key: outcome.key, oldImage: outcome.oldItem });
    }
    return {
      deleted: outcome.oldItem !== undefined,
      item: outcome.oldItem ?? null,
      ...this.publish(draft, params.returnStreamEvent),
    };
  }

  private query(params: ToolParameters['query'], draft: OperationDraft): ToolResults['query'] {
    draft.access = 'key';
    draft.filtered = params.filterExpression !== undefined;
    const context = { names: params.expressionAttributeNames, values: params.expressionAttributeValues };

    const table = this.store.snapshot(params.tableName);
    if (table) {
      const shape = inspectKeyCondition(params.keyConditionExpression, context, table.keySchema);
      draft.keyCondition = {
        pinsPartitionKey: shape.pinsPartitionKey,
        hasSortKeyCondition: shape.hasSortKeyCondition,
        partitionItemCount:
          shape.partitionValue === undefined ? 0 : this.store.countPartition(params.tableName, shape.partitionValue),
      };
    }

    const outcome = this.store.query(params.tableName, {
      keyCondition: params.keyConditionExpression,
      filter: params.filterExpression,
      ...context,
      limit: params.limit,
      scanIndexForward: params.scanIndexForward,
    });
    return this.readResult(draft, outcome);
  }

  private scan(params: ToolParameters['scan'], draft: OperationDraft): ToolResults['scan'] {
    draft.access = 'scan';
    draft.filtered = params.filterExpression !== undefined;
    const outcome = this.store.scan(params.tableName, {
      filter: params.filterExpression,
      names: params.expressionAttributeNames,
      values: params.expressionAttributeValues,
      limit: params.limit,
    });
    return this.readResult(draft, outcome);
  }

  private batchWriteItem(
    params: ToolParameters['batch_write_item'],
    draft: OperationDraft,
  ): ToolResults['batch_write_item'] {
    draft.access = 'key';
    draft.requestedCount = params.items.length;
    const results = this.store.batchWriteItem(params.tableName, params.items).map((entry): BatchWriteEntry => {
      if (!entry.ok) {
        return { index: entry.index, success: false, error: entry.error.message, errorCode: entry.error.code };
      }
      const outcome = entry.value;
      draft.itemCount++;
      draft.itemSizes.push(outcome.sizeBytes);
      draft.mutations.push(
        outcome.oldItem
          ? { eventName: 'MODIFY', key: outcome.key, newImage: outcome.item, oldImage: outcome.oldItem }
          : { eventName: 'INSERT', key: outcome.key, newImage: outcome.item },
      );
      return { index: entry.index, success: true, key: outcome.key, replaced: outcome.oldItem !== undefined };
    });

    return {
      results,
      processed: draft.itemCount,
      failed: results.length - draft.itemCount,
      ...this.publish(draft, params.returnStreamEvent),
    };
  }

  private batchGetItem(
    params: ToolParameters['batch_get_item'],
    draft: OperationDraft,
  ): ToolResults['batch_get_item'] {
    draft.access = 'key';
    draft.requestedCount = params.keys.length;
    const items: Item[] = [];
    const results = this.store.batchGetItem(params.tableName, params.keys).map((entry): BatchGetEntry => {
      if (!entry.ok) {
        return { index: entry.index, success: false, error: entry.error.message, errorCode: entry.error.code };
      }
      const { key, item, sizeBytes } = entry.value;
      if (item) {
        draft.itemCount++;
        draft.itemSizes.push(sizeBytes);
        items.push(item);
      }
      return { index: entry.index, success: true, key, found: item !== undefined, item: item ?? null };
    });
    draft.scannedCount = draft.itemCount;
    return { results, items };
  }

  private readResult(draft: OperationDraft, outcome: ReadOutcome): ToolResults['scan'] {
    draft.itemCount = outcome.items.length;
    draft.scannedCount = outcome.scannedCount;
    draft.itemSizes.push(...outcome.scannedSizes);
    draft.filterAttributes = outcome.filterAttributes;
    return {
      items: outcome.items,
      count: outcome.items.length,
      scannedCount: outcome.scannedCount,
      efficiency: readEfficiency(outcome.scannedCount, outcome.items.length, this.scanRatios),
    };
  }

  /**
   * Emits the draft's mutations as stream events.
   */
  private publish(draft: OperationDraft, includeEvents: boolean | undefined): StreamEventsField {
    const events = this.streams.capture(draft.tableName, draft.mutations);
    return includeEvents ? { streamEvents: events } : {};
  }
}
