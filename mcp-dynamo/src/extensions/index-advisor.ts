/**
 * Suggests global secondary indexes for scan-heavy tables.
 *
 * Keeps a rolling window of recent reads per table. When scans make up more
 * than the threshold share of the window, the non-key attributes those scans
 * filter on most often become index candidates. The suggestion is recomputed
 * on every read and dropped once the ratio falls back.
 * @module extensions/index-advisor
 */

import type { IndexAdvisorConfig } from '../config/index.js';
import { keyAttributes } from '../store/index.js';
import { READ_OPERATIONS } from '../types.js';
import type { Advisory, KeySchema, OperationRecord, TableSnapshot, ToolName } from '../types.js';
import type { Analyzer } from './analyzer.js';

export interface IndexCandidate {
  attribute: string;
  /** Scans in the window filtering on the attribute. */
  occurrences: number;
  indexName: string;
}

export interface IndexSuggestion {
  tableName: string;
  scanRatio: number;
  scans: number;
  reads: number;
  candidates: IndexCandidate[];
}

interface WindowEntry {
  kind: ToolName;
  filterAttributes: readonly string[];
}

export class IndexAdvisor implements Analyzer {
  readonly source = 'index-advisor' as const;
  private readonly windows = new Map<string, WindowEntry[]>();
  private readonly suggestions = new Map<string, IndexSuggestion>();

  constructor(private readonly config: IndexAdvisorConfig) {}

  observe(record: OperationRecord): Advisory[] {
    if (!record.success || !record.table || !READ_OPERATIONS.has(record.kind)) {
      return [];
    }

    const window = this.windows.get(record.tableName) ?? [];
    window.push({
      kind: record.kind,
      filterAttributes: record.kind === 'scan' ? record.filterAttributes : [],
    });
    while (window.length > this.config.windowSize) {
      window.shift();
    }
    this.windows.set(record.tableName, window);

    const suggestion = this.evaluate(record.tableName, window, record.table.keySchema);
    if (!suggestion) {
      this.suggestions.delete(record.tableName);
      return [];
    }
    this.suggestions.set(record.tableName, suggestion);
    return [this.toAdvisory(suggestion)];
  }

  standing(table: TableSnapshot): Advisory[] {
    const advisory = this.advisoryFor(table.tableName);
    return advisory ? [advisory] : [];
  }

  forget(tableName: string): void {
    this.windows.delete(tableName);
    this.suggestions.delete(tableName);
  }

  suggestionFor(tableName: string): IndexSuggestion | undefined {
    return this.suggestions.get(tableName);
  }

  advisoryFor(tableName: string): Advisory | undefined {
    const suggestion = this.suggestions.get(tableName);
    return suggestion ? this.toAdvisory(suggestion) : undefined;
  }

  private evaluate(
    tableName: string,
    window: readonly WindowEntry[],
    keySchema: KeySchema,
  ): IndexSuggestion | undefined {
    const scans = window.filter((entry) => entry.kind === 'scan');
    const scanRatio = scans.length / window.length;
    if (scanRatio <= this.config.scanRatioThreshold || scans.length < this.config.minScans) {
      return undefined;
    }

    const excluded = keyAttributes(keySchema);
    const occurrences = new Map<string, number>();
    for (const scan of scans) {
      for (const attribute of scan.filterAttributes) {
        if (!excluded.includes(attribute)) {
          occurrences.set(attribute, (occurrences.get(attribute) ?? 0) + 1);
        }
      }
    }

    // Stable sort: equal counts keep first-seen order.
    const candidates = [...occurrences]
      .map(([attribute, count]) => ({ attribute, occurrences: count, indexName: `${attribute}-index` }))
      .sort((left, right) => right.occurrences - left.occurrences)
      .slice(0, this.config.maxCandidates);
    if (candidates.length === 0) {
      return undefined;
    }

    return { tableName, scanRatio, scans: scans.length, reads: window.length, candidates };
  }

  private toAdvisory(suggestion: IndexSuggestion): Advisory {
    const indexes = suggestion.candidates
      .map((candidate) => `${candidate.attribute} (${candidate.indexName})`)
      .join(', ');
    return {
      source: this.source,
      severity: 'warning',
      message:
        `${suggestion.scans} of the last ${suggestion.reads} reads on ${suggestion.tableName} were scans; ` +
        `consider a global secondary index on ${indexes} to serve them with queries`,
    };
  }
}
