/**
 * In-memory DynamoDB-style table simulator with cost accounting and access
 * pattern advisories.
 *
 * @example
 * ```typescript
 * import { createSimulator } from 'dynamo-sim-mcp';
 *
 * const { dispatcher } = createSimulator();
 * dispatcher.invoke('create_table', { tableName: 'orders', keySchema: { partitionKey: 'order_id' } });
 * const response = dispatcher.invoke('put_item', {
 *   tableName: 'orders',
 *   item: { order_id: 'o1', status: 'pending' },
 * });
 * console.log(response.cost, response.capacity);
 * ```
 */

export { createSimulator } from './simulator.js';
export type { AnalyzerToggles, Simulator, SimulatorOptions } from './simulator.js';

export * from './types.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './observability/index.js';
export * from './expression/index.js';
export * from './store/index.js';
export * from './extensions/index.js';
export * from './dispatcher/index.js';
export * from './server/index.js';
