/**
 * Configuration merging and validation.
 * @module config/validation
 */

import { z } from 'zod';
import { InvalidParametersError } from '../errors/index.js';
import type { SimulatorConfig, SimulatorConfigOverrides } from './config.js';
import { createDefaultConfig } from './defaults.js';

const cost = z.number().finite().nonnegative();
const positiveInt = z.number().int().positive();

const configSchema = z.object({
  costs: z.object({
    create_table: cost,
    describe_table: cost,
    delete_table: cost,
    list_tables: cost,
    update_table: cost,
    put_item: cost,
    update_item: cost,
    delete_item: cost,
    batch_write_item: cost,
    get_item: cost,
    query: cost,
    scan: cost,
    batch_get_item: cost,
  }),
  capacityUnits: z.object({
    readUnitBytes: positiveInt,
    writeUnitBytes: positiveInt,
  }),
  partitionKeyOptimizer: z
    .object({
      smallScanThreshold: z.number().int().nonnegative(),
      crowdedPartitionThreshold: z.number().int().nonnegative(),
      warningScanRatio: z.number().positive(),
      criticalScanRatio: z.number().positive(),
    })
    .refine((section) => section.criticalScanRatio >= section.warningScanRatio, {
      message: 'must not be below warningScanRatio',
      path: ['criticalScanRatio'],
    }),
  indexAdvisor: z.object({
    windowSize: positiveInt,
    scanRatioThreshold: z.number().gt(0).lte(1),
    minScans: positiveInt,
    maxCandidates: positiveInt,
  }),
  capacityPlanner: z.object({
    unitsPerOperationThreshold: z.number().positive(),
    minSamples: positiveInt,
    headroom: z.number().gte(1),
  }),
  batch: z.object({
    maxWriteItems: positiveInt,
    maxGetKeys: positiveInt,
  }),
});

/**
 * Merges overrides over the defaults and validates the result.
 *
 * @throws {InvalidParametersError} If any merged value is out of range
 */
export function resolveConfig(overrides: SimulatorConfigOverrides = {}): SimulatorConfig {
  const defaults = createDefaultConfig();
  const config: SimulatorConfig = {
    costs: { ...defaults.costs, ...overrides.costs },
    capacityUnits: { ...defaults.capacityUnits, ...overrides.capacityUnits },
    partitionKeyOptimizer: { ...defaults.partitionKeyOptimizer, ...overrides.partitionKeyOptimizer },
    indexAdvisor: { ...defaults.indexAdvisor, ...overrides.indexAdvisor },
    capacityPlanner: { ...defaults.capacityPlanner, ...overrides.capacityPlanner },
    batch: { ...defaults.batch, ...overrides.batch },
  };

  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidParametersError(`Invalid simulator configuration: ${issues.join('; ')}`, {
      issues,
    });
  }

  return config;
}
