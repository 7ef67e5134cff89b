export type {
  CostTable,
  CapacityUnitConfig,
  PartitionKeyOptimizerConfig,
  IndexAdvisorConfig,
  CapacityPlannerConfig,
  BatchLimitsConfig,
  SimulatorConfig,
  SimulatorConfigOverrides,
} from './config.js';
export {
  DEFAULT_COSTS,
  DEFAULT_CAPACITY_UNITS,
  DEFAULT_PARTITION_KEY_OPTIMIZER,
  DEFAULT_INDEX_ADVISOR,
  DEFAULT_CAPACITY_PLANNER,
  DEFAULT_BATCH_LIMITS,
  createDefaultConfig,
} from './defaults.js';
export { resolveConfig } from './validation.js';
export { loadConfigFromEnv } from './environment.js';
export type { EnvironmentSettings } from './environment.js';
