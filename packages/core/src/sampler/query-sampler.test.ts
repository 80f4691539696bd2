import { describe, it, expect } from 'vitest';
import { buildDistribution } from '../distribution/distribution-builder.js';
import { SeededRng, type RandomSource } from '../random/seed-rng.js';
import type { StressConfig } from '../types/config.js';
import type { DistributionIndex } from '../types/distribution.js';
import {
  QuerySampler,
  SequentialQuerySampler,
  createQueryGenerator,
  findMatcher,
} from './query-sampler.js';

function fixed(value: number): RandomSource {
  return { next: () => value };
}

function build(config: StressConfig): DistributionIndex {
  return buildDistribution(config)._unsafeUnwrap();
}

const ONE_TO_THREE: StressConfig = {
  queries: [
    { frequency: 1, query: 'A' },
    { frequency: 3, query: 'B' },
  ],
};

describe('findMatcher', () => {
  it('should find exactly one matcher for every valid pick', () => {
    const index = build({
      queries: [
        { frequency: 2, query: 'A' },
        { frequency: 0, query: 'B' },
        { frequency: 5, query: 'C' },
        { frequency: 1, query: 'D' },
      ],
    });

    for (let pick = 0; pick < index.totalFrequency; pick++) {
      const owners = index.matchers.filter((m) => pick >= m.range.min && pick < m.range.max);
      expect(owners).toHaveLength(1);
      expect(findMatcher(index, pick)).toBe(owners[0]);
    }
  });

  it('should return undefined outside the ranges', () => {
    const index = build(ONE_TO_THREE);
    expect(findMatcher(index, -1)).toBeUndefined();
    expect(findMatcher(index, 4)).toBeUndefined();
  });
});

describe('QuerySampler', () => {
  it('should map picks onto the configured ranges', () => {
    const sampler = new QuerySampler(build(ONE_TO_THREE));

    expect(sampler.sampleAt(0)._unsafeUnwrap().queries).toEqual(['A']);
    expect(sampler.sampleAt(2)._unsafeUnwrap().queries).toEqual(['B']);
    expect(sampler.sampleAt(3)._unsafeUnwrap().queries).toEqual(['B']);
  });

  it('should draw the pick from the random source', () => {
    const index = build(ONE_TO_THREE);

    expect(new QuerySampler(index, fixed(0.1)).sample()._unsafeUnwrap()).toEqual(['A']);
    expect(new QuerySampler(index, fixed(0.5)).sample()._unsafeUnwrap()).toEqual(['B']);
  });

  it('should report the pick and every range when nothing matches', () => {
    const sampler = new QuerySampler(build(ONE_TO_THREE));

    const result = sampler.sampleAt(4);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.pick).toBe(4);
      expect(result.error.ranges).toEqual([{ min: 0, max: 1 }, { min: 1, max: 4 }]);
      expect(result.error.message).toBe(
        'No query range matched pick 4 out of: {start: 0, end: 1}, {start: 1, end: 4}',
      );
    }
  });

  it('should reproduce the same sequence for the same seed', () => {
    const index = build({
      queries: [
        { frequency: 2, query: 'select :id', parameters: { id: [1, 2, 3, 4] } },
        { frequency: 5, query: 'B' },
        { frequency: 1, query: 'C' },
      ],
    });
    const first = new QuerySampler(index, new SeededRng(42));
    const second = new QuerySampler(index, new SeededRng(42));

    const run1 = Array.from({ length: 50 }, () => first.sample()._unsafeUnwrap());
    const run2 = Array.from({ length: 50 }, () => second.sample()._unsafeUnwrap());

    expect(run1).toEqual(run2);
  });

  it('should select entries in proportion to their frequency', () => {
    const sampler = new QuerySampler(build(ONE_TO_THREE), new SeededRng(1));
    let bCount = 0;
    for (let i = 0; i < 4000; i++) {
      if (sampler.sample()._unsafeUnwrap()[0] === 'B') bCount++;
    }
    expect(bCount).toBeGreaterThan(2700);
    expect(bCount).toBeLessThan(3300);
  });

  it('should never select a zero-frequency entry', () => {
    const sampler = new QuerySampler(build({
      queries: [
        { frequency: 0, query: 'Z' },
        { frequency: 2, query: 'A' },
      ],
    }), new SeededRng(5));

    for (let i = 0; i < 200; i++) {
      expect(sampler.sample()._unsafeUnwrap()).toEqual(['A']);
    }
  });

  it('should render every query of a group in order', () => {
    const index = build({
      queryGroups: [{
        name: 'queryGroup1',
        queries: [
          "SELECT * FROM TEST1 WHERE my_date > ':my_date'",
          "SELECT * FROM TEST2 WHERE my_date < ':my_date'",
          "SELECT * FROM TEST3 WHERE a > :my and my_date > ':my_date'",
        ],
      }],
      queries: [{
        frequency: 1,
        queryGroup: 'queryGroup1',
        parameters: { my: [1], my_date: ['2014-01-10'] },
        sqlContext: ['Samples'],
      }],
    });

    const batch = new QuerySampler(index, new SeededRng(3)).sampleBatch()._unsafeUnwrap();

    expect(batch).toEqual({
      entryIndex: 0,
      source: { kind: 'group', name: 'queryGroup1' },
      queries: [
        "SELECT * FROM TEST1 WHERE my_date > '2014-01-10'",
        "SELECT * FROM TEST2 WHERE my_date < '2014-01-10'",
        "SELECT * FROM TEST3 WHERE a > 1 and my_date > '2014-01-10'",
      ],
      sqlContext: ['Samples'],
    });
  });

  it('should draw repeated tokens independently', () => {
    const sampler = new QuerySampler(
      build({ queries: [{ frequency: 1, query: ':a + :a', parameters: { a: [1, 2] } }] }),
      new SeededRng(11),
    );
    const outputs = new Set<string>();
    for (let i = 0; i < 200; i++) {
      outputs.add(sampler.sample()._unsafeUnwrap()[0] ?? '');
    }
    expect(outputs.has('1 + 2')).toBe(true);
    expect(outputs.has('2 + 1')).toBe(true);
  });
});

describe('SequentialQuerySampler', () => {
  it('should walk entries in order, repeating each by frequency', () => {
    const sampler = new SequentialQuerySampler(build({
      queries: [
        { frequency: 1, query: 'A' },
        { frequency: 2, query: 'B' },
      ],
    }));

    const picked = Array.from({ length: 6 }, () => sampler.sample()._unsafeUnwrap()[0]);

    expect(picked).toEqual(['A', 'B', 'B', 'A', 'B', 'B']);
  });

  it('should skip zero-frequency entries', () => {
    const sampler = new SequentialQuerySampler(build({
      queries: [
        { frequency: 0, query: 'Z' },
        { frequency: 1, query: 'A' },
        { frequency: 1, query: 'B' },
      ],
    }));

    const picked = Array.from({ length: 3 }, () => sampler.sample()._unsafeUnwrap()[0]);

    expect(picked).toEqual(['A', 'B', 'A']);
  });

  it('should still render parameters at random', () => {
    const sampler = new SequentialQuerySampler(
      build({ queries: [{ frequency: 1, query: 'id = :id', parameters: { id: [1, 2, 3] } }] }),
      fixed(0.5),
    );

    expect(sampler.sample()._unsafeUnwrap()).toEqual(['id = 2']);
  });
});

describe('createQueryGenerator', () => {
  it('should default to the weighted random sampler', () => {
    expect(createQueryGenerator(build(ONE_TO_THREE))).toBeInstanceOf(QuerySampler);
  });

  it('should return a sequential sampler on request', () => {
    const generator = createQueryGenerator(build(ONE_TO_THREE), { order: 'sequential' });
    expect(generator).toBeInstanceOf(SequentialQuerySampler);
  });

  it('should pass the random source through', () => {
    const generator = createQueryGenerator(build(ONE_TO_THREE), { random: fixed(0) });
    expect(generator.sample()._unsafeUnwrap()).toEqual(['A']);
  });
});
