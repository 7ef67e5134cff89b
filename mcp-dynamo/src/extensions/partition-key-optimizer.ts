/**
 * Judges reads against the table's key schema.
 * @module extensions/partition-key-optimizer
 */

import type { PartitionKeyOptimizerConfig } from '../config/index.js';
import { keyAttributes } from '../store/index.js';
import type { Advisory, AdvisorySeverity, OperationRecord } from '../types.js';
import type { Analyzer } from './analyzer.js';

export type ReadEfficiencyStatus = 'efficient' | 'warning' | 'critical';

export interface ReadEfficiency {
  /** Items examined per item returned. */
  scanRatio: number;
  status: ReadEfficiencyStatus;
}

export type ScanRatioThresholds = Pick<PartitionKeyOptimizerConfig, 'warningScanRatio' | 'criticalScanRatio'>;

/**
 * Rates a read by how many items it examined for each one it returned.
 * A read returning nothing is rated as if it returned one item.
 */
export function readEfficiency(
  scannedCount: number,
  returnedCount: number,
  thresholds: ScanRatioThresholds,
): ReadEfficiency {
  const scanRatio = scannedCount / Math.max(returnedCount, 1);
  let status: ReadEfficiencyStatus = 'critical';
  if (scanRatio < thresholds.warningScanRatio) {
    status = 'efficient';
  } else if (scanRatio < thresholds.criticalScanRatio) {
    status = 'warning';
  }
  return { scanRatio, status };
}

export class PartitionKeyOptimizer implements Analyzer {
  readonly source = 'partition-key-optimizer' as const;

  constructor(private readonly config: PartitionKeyOptimizerConfig) {}

  observe(record: OperationRecord): Advisory[] {
    switch (record.kind) {
      case 'scan':
        return [this.judgeScan(record)];
      case 'query':
        return this.judgeQuery(record);
      default:
        return [];
    }
  }

  /**
   * Every scan is flagged; one whose filter narrowed it to a few items only at info level.
   */
  private judgeScan(record: OperationRecord): Advisory {
    const partitionKey = record.table?.keySchema.partitionKey;
    const target = partitionKey ? `partition key ${partitionKey}` : 'the partition key';
    const narrowed =
      record.success && record.filtered && record.itemCount <= this.config.smallScanThreshold;

    if (narrowed) {
      return this.advisory(
        'info',
        `Scan on ${record.tableName} read ${record.scannedCount} items to return ${record.itemCount}; ` +
          `a query with an equality condition on ${target} reads only the matching partition`,
      );
    }
    return this.advisory(
      'warning',
      `Scan on ${record.tableName} reads the entire table; ` +
        `use query with an equality condition on ${target} instead of scan`,
    );
  }

  private judgeQuery(record: OperationRecord): Advisory[] {
    const table = record.table;
    if (!table) {
      return [];
    }
    const { partitionKey, sortKey } = table.keySchema;
    const keyCondition = record.keyCondition;

    if (!keyCondition?.pinsPartitionKey) {
      return [
        this.advisory(
          'warning',
          `Query on ${record.tableName} does not pin partition key ${partitionKey}; ` +
            `use query with an equality condition on partition key ${partitionKey}`,
        ),
      ];
    }

    const advisories: Advisory[] = [];
    if (
      sortKey &&
      !keyCondition.hasSortKeyCondition &&
      keyCondition.partitionItemCount > this.config.crowdedPartitionThreshold
    ) {
      advisories.push(
        this.advisory(
          'info',
          `Query on ${record.tableName} reads all ${keyCondition.partitionItemCount} items in the partition; ` +
            `add a condition on sort key ${sortKey} to narrow it`,
        ),
      );
    }

    const filterAdvisory = this.judgeQueryFilter(record);
    if (filterAdvisory) {
      advisories.push(filterAdvisory);
    }
    return advisories;
  }

  /**
   * A filter that discards most of the partition points at a missing index.
   */
  private judgeQueryFilter(record: OperationRecord): Advisory | undefined {
    if (!record.success || !record.filtered || !record.table) {
      return undefined;
    }
    const { scanRatio, status } = readEfficiency(record.scannedCount, record.itemCount, this.config);
    if (status !== 'critical') {
      return undefined;
    }

    const keys = keyAttributes(record.table.keySchema);
    const candidates = record.filterAttributes.filter((attribute) => !keys.includes(attribute));
    const usage =
      `Query on ${record.tableName} examined ${record.scannedCount} items to return ${record.itemCount} ` +
      `(scan ratio ${scanRatio.toFixed(1)})`;
    if (candidates.length === 0) {
      return this.advisory('warning', `${usage}; narrow the key condition instead of filtering on key attributes`);
    }
    const indexes = candidates.map((attribute) => `${attribute} (${attribute}-index)`).join(', ');
    return this.advisory(
      'warning',
      `${usage}; consider a global secondary index on ${indexes} to serve this filter with a key condition`,
    );
  }

  private advisory(severity: AdvisorySeverity, message: string): Advisory {
    return { source: this.source, severity, message };
  }
}
