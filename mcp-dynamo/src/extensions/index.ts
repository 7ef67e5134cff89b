export type { Analyzer } from './analyzer.js';
export { CostLedger } from './ledger.js';
export type { KindTotals, LedgerSummary } from './ledger.js';
export { CapacityAccountant } from './capacity-accountant.js';
export type { CapacityAccountantConfig, CapacityReport, Charge } from './capacity-accountant.js';
export { PartitionKeyOptimizer, readEfficiency } from './partition-key-optimizer.js';
export type { ReadEfficiency, ReadEfficiencyStatus, ScanRatioThresholds } from './partition-key-optimizer.js';
export { IndexAdvisor } from './index-advisor.js';
export type { IndexCandidate, IndexSuggestion } from './index-advisor.js';
export { StreamEventAdapter } from './stream-event-adapter.js';
export type { StreamEvent, StreamEventAdapterOptions, StreamRecord } from './stream-event-adapter.js';
