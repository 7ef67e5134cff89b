/**
 * Process-wide cost ledger.
 * @module extensions/ledger
 */

import type { ToolName } from '../types.js';

export interface KindTotals {
  operations: number;
  cost: number;
}

export interface LedgerSummary {
  totalOperations: number;
  totalCost: number;
  byKind: Partial<Record<ToolName, KindTotals>>;
}

/**
 * Appended to once per invocation, charged or not. Totals only move forward
 * until {@link CostLedger.reset} is called.
 */
export class CostLedger {
  private totalOperations = 0;
  private totalCost = 0;
  private readonly costsByKind = new Map<ToolName, number[]>();

  record(kind: ToolName, cost: number): void {
    this.totalOperations++;
    this.totalCost += cost;
    const costs = this.costsByKind.get(kind);
    if (costs) {
      costs.push(cost);
    } else {
      this.costsByKind.set(kind, [cost]);
    }
  }

  /**
   * Every cost recorded for one operation kind, oldest first.
   */
  costsFor(kind: ToolName): number[] {
    return [...(this.costsByKind.get(kind) ?? [])];
  }

  summary(): LedgerSummary {
    const byKind: Partial<Record<ToolName, KindTotals>> = {};
    for (const [kind, costs] of this.costsByKind) {
      byKind[kind] = {
        operations: costs.length,
        cost: costs.reduce((sum, cost) => sum + cost, 0),
      };
    }
    return { totalOperations: this.totalOperations, totalCost: this.totalCost, byKind };
  }

  reset(): void {
    this.totalOperations = 0;
    this.totalCost = 0;
    this.costsByKind.clear();
  }
}
