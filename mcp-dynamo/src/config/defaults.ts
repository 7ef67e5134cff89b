/**
 * Default configuration values.
 *
 * The cost table and thresholds are illustrative; every value can be
 * overridden through {@link resolveConfig} or the environment.
 * @module config/defaults
 */

import type {
  BatchLimitsConfig,
  CapacityPlannerConfig,
  CapacityUnitConfig,
  CostTable,
  IndexAdvisorConfig,
  PartitionKeyOptimizerConfig,
  SimulatorConfig,
} from './config.js';

const READ_REQUEST_COST = 0.00025;
const WRITE_REQUEST_COST = 0.00125;

export const DEFAULT_COSTS: Readonly<CostTable> = {
  create_table: 0,
  describe_table: 0,
  delete_table: 0,
  list_tables: 0,
  update_table: 0,
  put_item: WRITE_REQUEST_COST,
  update_item: WRITE_REQUEST_COST,
  delete_item: WRITE_REQUEST_COST,
  batch_write_item: WRITE_REQUEST_COST,
  get_item: READ_REQUEST_COST,
  query: READ_REQUEST_COST,
  scan: READ_REQUEST_COST,
  batch_get_item: READ_REQUEST_COST,
};

export const DEFAULT_CAPACITY_UNITS: Readonly<CapacityUnitConfig> = {
  readUnitBytes: 4096,
  writeUnitBytes: 1024,
};

export const DEFAULT_PARTITION_KEY_OPTIMIZER: Readonly<PartitionKeyOptimizerConfig> = {
  smallScanThreshold: 10,
  crowdedPartitionThreshold: 25,
  warningScanRatio: 2,
  criticalScanRatio: 10,
};

export const DEFAULT_INDEX_ADVISOR: Readonly<IndexAdvisorConfig> = {
  windowSize: 50,
  scanRatioThreshold: 0.5,
  minScans: 5,
  maxCandidates: 3,
};

export const DEFAULT_CAPACITY_PLANNER: Readonly<CapacityPlannerConfig> = {
  unitsPerOperationThreshold: 5,
  minSamples: 10,
  headroom: 1.2,
};

/**
 * DynamoDB's own per-request limits.
 */
export const DEFAULT_BATCH_LIMITS: Readonly<BatchLimitsConfig> = {
  maxWriteItems: 25,
  maxGetKeys: 100,
};

/**
 * Creates a fresh copy of the default configuration.
 */
export function createDefaultConfig(): SimulatorConfig {
  return {
    costs: { ...DEFAULT_COSTS },
    capacityUnits: { ...DEFAULT_CAPACITY_UNITS },
    partitionKeyOptimizer: { ...DEFAULT_PARTITION_KEY_OPTIMIZER },
    indexAdvisor: { ...DEFAULT_INDEX_ADVISOR },
    capacityPlanner: { ...DEFAULT_CAPACITY_PLANNER },
    batch: { ...DEFAULT_BATCH_LIMITS },
  };
}
