import { describe, it, expect } from 'vitest';
import { parseQueryLog, buildConfigFromQueryLog } from './query-log-importer.js';

const NDJSON_LOG = [
  '{"queryText":"SELECT * FROM orders","outcome":"COMPLETED","context":"Sales","username":"alice","queryId":"1"}',
  '{"queryText":"SELECT * FROM orders","outcome":"FAILED","context":"Sales","username":"bob","queryId":"2"}',
  '',
  '{"queryText":"  SELECT * FROM orders  ","outcome":"COMPLETED","context":"Sales","queryId":"3"}',
  '{"queryText":"SELECT 1","queryId":"4"}',
].join('\n');

describe('parseQueryLog', () => {
  it('should parse newline-delimited JSON, skipping blank lines', () => {
    const rows = parseQueryLog(NDJSON_LOG)._unsafeUnwrap();

    expect(rows).toHaveLength(4);
    expect(rows[0]).toEqual({
      queryText: 'SELECT * FROM orders',
      outcome: 'COMPLETED',
      context: 'Sales',
      username: 'alice',
      queryId: '1',
    });
  });

  it('should parse a JSON array', () => {
    const rows = parseQueryLog('[{"queryText":"SELECT 1"},{"queryText":"SELECT 2"}]')._unsafeUnwrap();
    expect(rows.map((r) => r.queryText)).toEqual(['SELECT 1', 'SELECT 2']);
  });

  it('should return no rows for empty content', () => {
    expect(parseQueryLog('  \n')._unsafeUnwrap()).toEqual([]);
  });

  it('should report the line of invalid JSON', () => {
    const result = parseQueryLog('{"queryText":"SELECT 1"}\n{oops');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toMatch(/^Invalid JSON on line 2 of query log: /);
    }
  });

  it('should report an invalid JSON array', () => {
    const result = parseQueryLog('[{"queryText":');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toMatch(/^Invalid JSON in query log: /);
    }
  });

  it('should reject rows with the wrong field types', () => {
    const result = parseQueryLog('{"queryText":42}');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toMatch(/^Query log validation failed: 0\.queryText: /);
    }
  });
});

describe('buildConfigFromQueryLog', () => {
  it('should count completed runs of the same query and context', () => {
    const rows = parseQueryLog(NDJSON_LOG)._unsafeUnwrap();

    const config = buildConfigFromQueryLog(rows);

    expect(config).toEqual({
      queries: [
        { frequency: 2, query: 'SELECT * FROM orders', sqlContext: ['Sales'] },
        { frequency: 1, query: 'SELECT 1' },
      ],
      queryGroups: [],
    });
  });

  it('should keep failed runs when asked to', () => {
    const rows = parseQueryLog(NDJSON_LOG)._unsafeUnwrap();

    const config = buildConfigFromQueryLog(rows, { includeFailed: true });

    expect(config.queries[0]?.frequency).toBe(3);
  });

  it('should keep distinct contexts apart in order of first appearance', () => {
    const config = buildConfigFromQueryLog([
      { queryText: 'SELECT 1', context: 'B' },
      { queryText: 'SELECT 1', context: 'A' },
      { queryText: 'SELECT 1', context: 'B' },
    ]);

    expect(config.queries).toEqual([
      { frequency: 2, query: 'SELECT 1', sqlContext: ['B'] },
      { frequency: 1, query: 'SELECT 1', sqlContext: ['A'] },
    ]);
  });

  it('should skip rows without query text', () => {
    const config = buildConfigFromQueryLog([{ queryText: '   ' }, { outcome: 'COMPLETED' }]);
    expect(config.queries).toEqual([]);
  });
});
