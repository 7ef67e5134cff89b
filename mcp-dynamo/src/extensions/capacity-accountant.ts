/**
 * Capacity accounting and billing-mode planning.
 *
 * Every operation that reached the store is charged from the cost table:
 * per request for single-item operations, per requested entry for batches.
 * Consumed units are the item count times each item's size class, with a
 * one-unit minimum per data request.
 * @module extensions/capacity-accountant
 */

import type { CapacityPlannerConfig, CapacityUnitConfig, CostTable } from '../config/index.js';
import {
  BATCH_OPERATIONS,
  READ_OPERATIONS,
  WRITE_OPERATIONS,
} from '../types.js';
import type { Advisory, BillingMode, Capacity, OperationRecord, TableSnapshot, ToolName } from '../types.js';
import type { Analyzer } from './analyzer.js';
import { CostLedger } from './ledger.js';
import type { LedgerSummary } from './ledger.js';

export interface Charge {
  cost: number;
  capacity: Capacity;
}

export interface CapacityReport {
  tableName: string;
  operations: number;
  consumed: Capacity;
  averagePerOperation: Capacity;
  recommendedBillingMode: BillingMode;
  /** Units to provision, present when provisioned mode is recommended. */
  suggestedProvisioned?: Capacity;
}

export interface CapacityAccountantConfig {
  costs: CostTable;
  capacityUnits: CapacityUnitConfig;
  capacityPlanner: CapacityPlannerConfig;
}

interface CapacitySample {
  rcu: number;
  wcu: number;
  operations: number;
}

const NO_CAPACITY: Capacity = { rcu: 0, wcu: 0 };

function formatUnits(value: number): string {
  return value.toFixed(2);
}

export class CapacityAccountant implements Analyzer {
  readonly source = 'capacity-planner' as const;
  private readonly ledger = new CostLedger();
  private readonly samples = new Map<string, CapacitySample>();

  constructor(private readonly config: CapacityAccountantConfig) {}

  /**
   * Charges an operation that reached the store. Only tables that exist
   * after the operation collect capacity samples.
   */
  charge(record: OperationRecord): Charge {
    const capacity = this.capacityFor(record);
    const rate = this.config.costs[record.kind];
    const cost = BATCH_OPERATIONS.has(record.kind) ? rate * record.requestedCount : rate;
    this.ledger.record(record.kind, cost);

    if (record.table && (capacity.rcu > 0 || capacity.wcu > 0)) {
      const sample = this.samples.get(record.tableName) ?? { rcu: 0, wcu: 0, operations: 0 };
      sample.rcu += capacity.rcu;
      sample.wcu += capacity.wcu;
      sample.operations++;
      this.samples.set(record.tableName, sample);
    }

    return { cost, capacity };
  }

  /**
   * Records a call rejected before reaching the store; such calls cost nothing.
   */
  recordRejected(kind: ToolName): void {
    this.ledger.record(kind, 0);
  }

  observe(record: OperationRecord): Advisory[] {
    if (!record.table) {
      return [];
    }
    const advisory = this.advisoryFor(record.tableName, record.table.billingMode);
    return advisory ? [advisory] : [];
  }

  standing(table: TableSnapshot): Advisory[] {
    const advisory = this.advisoryFor(table.tableName, table.billingMode);
    return advisory ? [advisory] : [];
  }

  /**
   * Billing-mode advisory for a table in its current mode, if one applies.
   */
  advisoryFor(tableName: string, billingMode: BillingMode): Advisory | undefined {
    const report = this.report(tableName);
    if (
      !report ||
      report.operations < this.config.capacityPlanner.minSamples ||
      report.recommendedBillingMode === billingMode
    ) {
      return undefined;
    }
    return this.toAdvisory(report, billingMode);
  }

  report(tableName: string): CapacityReport | undefined {
    const sample = this.samples.get(tableName);
    if (!sample) {
      return undefined;
    }
    const { unitsPerOperationThreshold, headroom } = this.config.capacityPlanner;
    const averagePerOperation: Capacity = {
      rcu: sample.rcu / sample.operations,
      wcu: sample.wcu / sample.operations,
    };
    const provisioned =
      averagePerOperation.rcu > unitsPerOperationThreshold ||
      averagePerOperation.wcu > unitsPerOperationThreshold;

    return {
      tableName,
      operations: sample.operations,
      consumed: { rcu: sample.rcu, wcu: sample.wcu },
      averagePerOperation,
      recommendedBillingMode: provisioned ? 'PROVISIONED' : 'ON_DEMAND',
      suggestedProvisioned: provisioned
        ? {
            rcu: Math.max(1, Math.ceil(averagePerOperation.rcu * headroom)),
            wcu: Math.max(1, Math.ceil(averagePerOperation.wcu * headroom)),
          }
        : undefined,
    };
  }

  reports(): CapacityReport[] {
    return [...this.samples.keys()].flatMap((tableName) => this.report(tableName) ?? []);
  }

  forget(tableName: string): void {
    this.samples.delete(tableName);
  }

  ledgerSummary(): LedgerSummary {
    return this.ledger.summary();
  }

  costsFor(kind: ToolName): number[] {
    return this.ledger.costsFor(kind);
  }

  resetLedger(): void {
    this.ledger.reset();
  }

  private capacityFor(record: OperationRecord): Capacity {
    const reads = READ_OPERATIONS.has(record.kind);
    if (!reads && !WRITE_OPERATIONS.has(record.kind)) {
      return NO_CAPACITY;
    }
    const unitBytes = reads ? this.config.capacityUnits.readUnitBytes : this.config.capacityUnits.writeUnitBytes;
    const units = Math.max(
      1,
      record.itemSizes.reduce((sum, size) => sum + Math.max(1, Math.ceil(size / unitBytes)), 0),
    );
    return reads ? { rcu: units, wcu: 0 } : { rcu: 0, wcu: units };
  }

  private toAdvisory(report: CapacityReport, billingMode: BillingMode): Advisory {
    const usage =
      `Table ${report.tableName} averages ${formatUnits(report.averagePerOperation.rcu)} RCU and ` +
      `${formatUnits(report.averagePerOperation.wcu)} WCU per operation`;
    const message = report.suggestedProvisioned
      ? `${usage}; PROVISIONED billing with ${report.suggestedProvisioned.rcu} RCU / ` +
        `${report.suggestedProvisioned.wcu} WCU fits this load better than ${billingMode}`
      : `${usage}; ON_DEMAND billing suits this load better than ${billingMode}`;
    return { source: this.source, severity: 'info', message };
  }
}
