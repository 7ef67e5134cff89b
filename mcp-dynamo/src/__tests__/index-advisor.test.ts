import { beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_INDEX_ADVISOR } from '../config/index.js';
import { IndexAdvisor } from '../extensions/index.js';
import type { OperationRecord, TableSnapshot } from '../types.js';

const table: TableSnapshot = {
  tableName: 'products',
  keySchema: { partitionKey: 'product_id' },
  billingMode: 'ON_DEMAND',
  itemCount: 100,
};

function scan(filterAttributes: string[], overrides: Partial<OperationRecord> = {}): OperationRecord {
  return {
    tableName: 'products',
    kind: 'scan',
    access: 'scan',
    itemCount: 1,
    scannedCount: 100,
    requestedCount: 1,
    itemSizes: [],
    filtered: filterAttributes.length > 0,
    filterAttributes,
    mutations: [],
    table,
    timestamp: new Date('2024-01-01T00:00:00.000Z'),
    success: true,
    ...overrides,
  };
}

function query(): OperationRecord {
  return scan([], { kind: 'query', access: 'key', filtered: false });
}

describe('IndexAdvisor', () => {
  let advisor: IndexAdvisor;

  beforeEach(() => {
    advisor = new IndexAdvisor(DEFAULT_INDEX_ADVISOR);
  });

  it('should name the filtered attribute after repeated scans', () => {
    let advisories = advisor.observe(scan(['category']));
    for (let i = 1; i < 10; i++) {
      advisories = advisor.observe(scan(['category']));
    }

    expect(advisories).toEqual([
      {
        source: 'index-advisor',
        severity: 'warning',
        message:
          '10 of the last 10 reads on products were scans; ' +
          'consider a global secondary index on category (category-index) to serve them with queries',
      },
    ]);
    expect(advisor.suggestionFor('products')).toEqual({
      tableName: 'products',
      scanRatio: 1,
      scans: 10,
      reads: 10,
      candidates: [{ attribute: 'category', occurrences: 10, indexName: 'category-index' }],
    });
  });

  it('should wait for the minimum number of scans', () => {
    for (let i = 0; i < 4; i++) {
      expect(advisor.observe(scan(['category']))).toEqual([]);
    }
    expect(advisor.observe(scan(['category']))).toHaveLength(1);
  });

  it('should never suggest key attributes', () => {
    for (let i = 0; i < 5; i++) {
      advisor.observe(scan(['product_id', 'category']));
    }

    expect(advisor.suggestionFor('products')?.candidates.map((candidate) => candidate.attribute)).toEqual([
      'category',
    ]);
  });

  it('should order candidates by count and break ties by first appearance', () => {
    advisor.observe(scan(['brand', 'color']));
    advisor.observe(scan(['color', 'brand']));
    advisor.observe(scan(['size']));
    advisor.observe(scan(['size']));
    advisor.observe(scan(['size', 'weight']));

    expect(advisor.suggestionFor('products')?.candidates.map((candidate) => candidate.attribute)).toEqual([
      'size',
      'brand',
      'color',
    ]);
  });

  it('should drop the suggestion once queries dominate', () => {
    for (let i = 0; i < 5; i++) {
      advisor.observe(scan(['category']));
    }
    for (let i = 0; i < 4; i++) {
      advisor.observe(query());
    }
    expect(advisor.suggestionFor('products')?.scanRatio).toBeCloseTo(5 / 9, 10);

    expect(advisor.observe(query())).toEqual([]);
    expect(advisor.suggestionFor('products')).toBeUndefined();
  });

  it('should not suggest anything for unfiltered scans', () => {
    for (let i = 0; i < 6; i++) {
      expect(advisor.observe(scan([]))).toEqual([]);
    }
  });

  it('should ignore failed reads and writes', () => {
    for (let i = 0; i < 6; i++) {
      advisor.observe(scan(['category'], { success: false }));
      advisor.observe(scan([], { kind: 'put_item', access: 'key' }));
    }

    expect(advisor.suggestionFor('products')).toBeUndefined();
  });

  it('should keep only the most recent reads', () => {
    const small = new IndexAdvisor({ ...DEFAULT_INDEX_ADVISOR, windowSize: 5 });
    for (let i = 0; i < 5; i++) {
      small.observe(scan(['category']));
    }
    for (let i = 0; i < 3; i++) {
      small.observe(query());
    }

    expect(small.suggestionFor('products')).toBeUndefined();
  });

  it('should start over for a forgotten table', () => {
    for (let i = 0; i < 5; i++) {
      advisor.observe(scan(['category']));
    }
    advisor.forget('products');

    expect(advisor.suggestionFor('products')).toBeUndefined();
    expect(advisor.standing(table)).toEqual([]);
    for (let i = 0; i < 4; i++) {
      expect(advisor.observe(scan(['category']))).toEqual([]);
    }
  });

  it('should report the standing advisory for a table', () => {
    for (let i = 0; i < 5; i++) {
      advisor.observe(scan(['category']));
    }

    expect(advisor.standing(table)).toEqual([
      {
        source: 'index-advisor',
        severity: 'warning',
        message:
          '5 of the last 5 reads on products were scans; ' +
          'consider a global secondary index on category (category-index) to serve them with queries',
      },
    ]);
  });
});
