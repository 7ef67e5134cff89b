/**
 * Environment variable loading for simulator configuration.
 * @module config/environment
 */

import { InvalidParametersError } from '../errors/index.js';
import type { LogLevel } from '../observability/logging.js';
import type {
  CapacityPlannerConfig,
  IndexAdvisorConfig,
  PartitionKeyOptimizerConfig,
  SimulatorConfigOverrides,
} from './config.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export interface EnvironmentSettings {
  logLevel: LogLevel;
  overrides: SimulatorConfigOverrides;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidParametersError(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

function assignIfSet<T extends object, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Loads simulator settings from environment variables.
 *
 * Supported environment variables:
 * - DYNAMO_SIM_LOG_LEVEL: error | warn | info | debug | trace (default info)
 * - DYNAMO_SIM_INDEX_WINDOW: read operations kept per table by the index advisor
 * - DYNAMO_SIM_SCAN_RATIO_THRESHOLD: scan share above which an index is suggested
 * - DYNAMO_SIM_MIN_SCANS: scans required before suggesting an index
 * - DYNAMO_SIM_SMALL_SCAN_THRESHOLD: result size under which a filtered scan is only noted
 * - DYNAMO_SIM_CROWDED_PARTITION_THRESHOLD: partition size that warrants a sort-key condition
 * - DYNAMO_SIM_CRITICAL_SCAN_RATIO: items examined per item returned that marks a read critical
 * - DYNAMO_SIM_CAPACITY_THRESHOLD: average units per operation that favour provisioned mode
 *
 * The returned overrides still go through {@link resolveConfig} for range checks.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvironmentSettings {
  const level = env.DYNAMO_SIM_LOG_LEVEL?.toLowerCase() ?? 'info';
  if (!isLogLevel(level)) {
    throw new InvalidParametersError(`DYNAMO_SIM_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }

  const indexAdvisor: Partial<IndexAdvisorConfig> = {};
  assignIfSet(indexAdvisor, 'windowSize', readNumber(env, 'DYNAMO_SIM_INDEX_WINDOW'));
  assignIfSet(indexAdvisor, 'scanRatioThreshold', readNumber(env, 'DYNAMO_SIM_SCAN_RATIO_THRESHOLD'));
  assignIfSet(indexAdvisor, 'minScans', readNumber(env, 'DYNAMO_SIM_MIN_SCANS'));

  const partitionKeyOptimizer: Partial<PartitionKeyOptimizerConfig> = {};
  assignIfSet(partitionKeyOptimizer, 'smallScanThreshold', readNumber(env, 'DYNAMO_SIM_SMALL_SCAN_THRESHOLD'));
  assignIfSet(
    partitionKeyOptimizer,
    'crowdedPartitionThreshold',
    readNumber(env, 'DYNAMO_SIM_CROWDED_PARTITION_THRESHOLD'),
  );
  assignIfSet(partitionKeyOptimizer, 'criticalScanRatio', readNumber(env, 'DYNAMO_SIM_CRITICAL_SCAN_RATIO'));

  const capacityPlanner: Partial<CapacityPlannerConfig> = {};
  assignIfSet(capacityPlanner, 'unitsPerOperationThreshold', readNumber(env, 'DYNAMO_SIM_CAPACITY_THRESHOLD'));

  return {
    logLevel: level,
    overrides: { indexAdvisor, partitionKeyOptimizer, capacityPlanner },
  };
}
