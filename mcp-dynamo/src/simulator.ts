/**
 * Wires a fresh simulation: store, accountant, analyzers and stream adapter
 * behind one dispatcher.
 * @module simulator
 */

import { resolveConfig } from './config/index.js';
import type { SimulatorConfig, SimulatorConfigOverrides } from './config/index.js';
import { ToolDispatcher } from './dispatcher/index.js';
import {
  CapacityAccountant,
  IndexAdvisor,
  PartitionKeyOptimizer,
  StreamEventAdapter,
} from './extensions/index.js';
import type { Analyzer } from './extensions/index.js';
import { NoopLogger } from './observability/index.js';
import type { Logger } from './observability/index.js';
import { TableStore } from './store/index.js';
import { systemClock } from './types.js';
import type { Clock } from './types.js';

/**
 * Turns individual analyzers off. All are enabled by default.
 */
export interface AnalyzerToggles {
  partitionKeyOptimizer?: boolean;
  indexAdvisor?: boolean;
  capacityPlanner?: boolean;
}

export interface SimulatorOptions {
  config?: SimulatorConfigOverrides;
  logger?: Logger;
  clock?: Clock;
  /** Stream event ids; random UUIDs by default. */
  idGenerator?: () => string;
  analyzers?: AnalyzerToggles;
}

export interface Simulator {
  dispatcher: ToolDispatcher;
  store: TableStore;
  config: SimulatorConfig;
}

/**
 * Builds an independent simulation. Nothing is shared between two simulators.
 *
 * @throws {InvalidParametersError} If the configuration overrides are invalid
 */
export function createSimulator(options: SimulatorOptions = {}): Simulator {
  const config = resolveConfig(options.config);
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? new NoopLogger();
  const toggles = options.analyzers ?? {};

  const store = new TableStore({ clock });
  const accountant = new CapacityAccountant(config);
  const indexAdvisor = new IndexAdvisor(config.indexAdvisor);
  const streams = new StreamEventAdapter({ clock, idGenerator: options.idGenerator });

  const analyzers: Analyzer[] = [];
  if (toggles.partitionKeyOptimizer !== false) {
    analyzers.push(new PartitionKeyOptimizer(config.partitionKeyOptimizer));
  }
  if (toggles.indexAdvisor !== false) {
    analyzers.push(indexAdvisor);
  }
  if (toggles.capacityPlanner !== false) {
    analyzers.push(accountant);
  }

  const dispatcher = new ToolDispatcher({
    store,
    accountant,
    streams,
    analyzers,
    config,
    indexSuggestions: toggles.indexAdvisor !== false ? indexAdvisor : undefined,
    logger,
    clock,
  });
  return { dispatcher, store, config };
}
