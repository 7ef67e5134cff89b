/**
 * Configuration types for the simulator.
 * @module config/config
 */

import type { ToolName } from '../types.js';

/**
 * Monetary cost per request for single-item and table operations, and per
 * item for batch operations.
 */
export type CostTable = Record<ToolName, number>;

export interface CapacityUnitConfig {
  /** Bytes covered by one read capacity unit. */
  readUnitBytes: number;
  /** Bytes covered by one write capacity unit. */
  writeUnitBytes: number;
}

export interface PartitionKeyOptimizerConfig {
  /** A filtered scan returning at most this many items is only flagged at info level. */
  smallScanThreshold: number;
  /** Partitions holding more items than this warrant a sort-key condition. */
  crowdedPartitionThreshold: number;
  /** Items examined per item returned at which a read stops counting as efficient. */
  warningScanRatio: number;
  /** Ratio at which a read is critical; filtered queries at or past it get an index advisory. */
  criticalScanRatio: number;
}

export interface IndexAdvisorConfig {
  /** Read operations kept per table. */
  windowSize: number;
  /** Scan share of the window above which an index is suggested. */
  scanRatioThreshold: number;
  /** Scans required in the window before suggesting anything. */
  minScans: number;
  /** Attributes named per suggestion. */
  maxCandidates: number;
}

export interface CapacityPlannerConfig {
  /** Average RCU or WCU per operation above which provisioned mode is recommended. */
  unitsPerOperationThreshold: number;
  /** Operations observed on a table before recommending a billing mode. */
  minSamples: number;
  /** Multiplier applied to average usage when suggesting provisioned units. */
  headroom: number;
}

export interface BatchLimitsConfig {
  maxWriteItems: number;
  maxGetKeys: number;
}

export interface SimulatorConfig {
  costs: CostTable;
  capacityUnits: CapacityUnitConfig;
  partitionKeyOptimizer: PartitionKeyOptimizerConfig;
  indexAdvisor: IndexAdvisorConfig;
  capacityPlanner: CapacityPlannerConfig;
  batch: BatchLimitsConfig;
}

/**
 * Partial overrides, merged section by section over the defaults.
 */
export type SimulatorConfigOverrides = {
  [K in keyof SimulatorConfig]?: Partial<SimulatorConfig[K]>;
};
