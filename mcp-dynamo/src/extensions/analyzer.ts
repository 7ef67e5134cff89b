import type { Advisory, AdvisorySource, OperationRecord, TableSnapshot } from '../types.js';

/**
 * An analysis step run after every operation that reached the store.
 * Analyzers annotate responses; they never reject an operation.
 */
export interface Analyzer {
  readonly source: AdvisorySource;
  observe(record: OperationRecord): Advisory[];
  /** Advisories still in force for a table, outside any operation. */
  standing?(table: TableSnapshot): Advisory[];
  /** Drops whatever the analyzer keeps for a deleted table. */
  forget?(tableName: string): void;
}
