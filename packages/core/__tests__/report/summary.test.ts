/**
 * Run report tests
 */

import { describe, it, expect } from 'vitest';
import {
  bucketByStep,
  countSuccesses,
  stepBucketOf,
  summarizeRun,
  topByReturn,
  totalHours,
} from '../../src/report/summary.js';
import type { LogRecord } from '../../src/types.js';

function record(overrides: Partial<LogRecord>): LogRecord {
  return {
    step: 0,
    episode: '1',
    decision: 'A1-B2',
    eps: 0.1,
    learningRate: 0.001,
    ret: 0,
    lastCrash: 0,
    stepTime: 1,
    sf: 1,
    found: false,
    reward: 0,
    ...overrides,
  };
}

describe('totalHours', () => {
  it('should sum step times and convert to hours', () => {
    const records = [record({ stepTime: 1800 }), record({ stepTime: 3600 }), record({ stepTime: 1800 })];
    expect(totalHours(records)).toBe(2);
  });

  it('should be zero for no records', () => {
    expect(totalHours([])).toBe(0);
  });
});

describe('countSuccesses', () => {
  it('should count rewards at or above the threshold', () => {
    const records = [record({ reward: 99.5 }), record({ reward: 100 }), record({ reward: 250 })];
    expect(countSuccesses(records)).toBe(2);
    expect(countSuccesses(records, 200)).toBe(1);
  });
});

describe('stepBucketOf', () => {
  it('should floor steps to the bucket width', () => {
    expect(stepBucketOf(0)).toBe(0);
    expect(stepBucketOf(9_999)).toBe(0);
    expect(stepBucketOf(10_000)).toBe(10_000);
    expect(stepBucketOf(25_001)).toBe(20_000);
    expect(stepBucketOf(25, 10)).toBe(20);
  });
});

describe('bucketByStep', () => {
  it('should aggregate mean time, successes and distinct episodes per bucket', () => {
    const records = [
      record({ step: 15_000, episode: '3', stepTime: 2, reward: 100 }),
      record({ step: 100, episode: '1', stepTime: 1, reward: 10 }),
      record({ step: 200, episode: '1', stepTime: 3, reward: 150 }),
      record({ step: 9_999, episode: '2', stepTime: 2, reward: 0 }),
    ];

    expect(bucketByStep(records)).toEqual([
      { bucket: 0, records: 3, meanStepTime: 2, successes: 1, episodes: 2 },
      { bucket: 10_000, records: 1, meanStepTime: 2, successes: 1, episodes: 1 },
    ]);
  });

  it('should return no buckets for no records', () => {
    expect(bucketByStep([])).toEqual([]);
  });

  it('should reject a non-positive width', () => {
    expect(() => bucketByStep([], 0)).toThrow(RangeError);
  });
});

describe('topByReturn', () => {
  it('should order by return descending and keep table order on ties', () => {
    const a = record({ episode: '1', ret: 5 });
    const b = record({ episode: '2', ret: 9 });
    const c = record({ episode: '3', ret: 5 });
    const d = record({ episode: '4', ret: -1 });

    expect(topByReturn([a, b, c, d])).toEqual([b, a, c, d]);
    expect(topByReturn([a, b, c, d], 2).map((r) => r.episode)).toEqual(['2', '1']);
  });
});

describe('summarizeRun', () => {
  it('should combine the report figures', () => {
    const records = [
      record({ step: 10, episode: '1', stepTime: 1800, ret: 1, reward: 120 }),
      record({ step: 20, episode: '1', stepTime: 1800, ret: 4, reward: 20 }),
      record({ step: 30, episode: '2', stepTime: 3600, ret: 2, reward: 100 }),
    ];
    const best = [records[1], records[2]].filter((r): r is LogRecord => r !== undefined);

    const summary = summarizeRun('run1', { records, best }, { topCount: 1 });

    expect(summary).toEqual({
      runName: 'run1',
      records: 3,
      episodes: 2,
      totalHours: 2,
      bestSuccesses: 1,
      bucketWidth: 10_000,
      successThreshold: 100,
      buckets: [{ bucket: 0, records: 3, meanStepTime: 2400, successes: 2, episodes: 2 }],
      top: [records[1]],
    });
  });
});
