/**
 * Best-per-group reducer tests
 */

import { describe, it, expect } from 'vitest';
import {
  BEST_RETURN_PER_EPISODE,
  BestPerGroupReducer,
  compareIntegerKeys,
  createBestReturnReducer,
  type GroupRanking,
} from '../../src/reduce/index.js';
import type { LogRecord } from '../../src/types.js';

function record(episode: string, ret: number, step = 0): LogRecord {
  return {
    step,
    episode,
    decision: 'A1-B2',
    eps: 0.1,
    learningRate: 0.001,
    ret,
    lastCrash: 0,
    stepTime: 0.05,
    sf: 1,
    found: false,
    reward: 0,
  };
}

describe('BestPerGroupReducer', () => {
  it('should keep the first record reaching the maximum return', () => {
    const reducer = createBestReturnReducer();
    const first = record('3', 5.0, 1);
    const firstMax = record('3', 8.2, 2);
    const laterTie = record('3', 8.2, 3);

    reducer.update(first);
    reducer.update(firstMax);
    reducer.update(laterTie);

    const best = reducer.finalize();
    expect(best).toHaveLength(1);
    expect(best[0]).toBe(firstMax);
  });

  it('should not replace a record with a lower return', () => {
    const reducer = createBestReturnReducer();
    const high = record('1', 10, 1);
    reducer.update(high);
    reducer.update(record('1', 9.99, 2));
    expect(reducer.finalize()).toEqual([high]);
  });

  it('should hold the maximum return per episode', () => {
    const reducer = createBestReturnReducer();
    const returns: Array<[string, number]> = [
      ['2', 1],
      ['1', -4],
      ['2', 7],
      ['1', -2],
      ['2', 3],
      ['1', -3],
    ];
    for (const [episode, ret] of returns) {
      reducer.update(record(episode, ret));
    }

    expect(reducer.finalize().map((r) => [r.episode, r.ret])).toEqual([
      ['1', -2],
      ['2', 7],
    ]);
  });

  it('should order episodes by integer value, not text', () => {
    const reducer = createBestReturnReducer();
    for (const episode of ['10', '9', '100', '2', '1']) {
      reducer.update(record(episode, 0));
    }
    expect(reducer.finalize().map((r) => r.episode)).toEqual(['1', '2', '9', '10', '100']);
  });

  it('should report one entry per distinct key', () => {
    const reducer = createBestReturnReducer();
    reducer.update(record('1', 1));
    reducer.update(record('1', 2));
    reducer.update(record('2', 1));
    expect(reducer.size).toBe(2);
  });

  it('should finalize to an empty list without updates', () => {
    expect(createBestReturnReducer().finalize()).toEqual([]);
  });

  it('should honour a ranking that prefers later records on ties', () => {
    const ranking: GroupRanking<LogRecord> = {
      ...BEST_RETURN_PER_EPISODE,
      preferOnTie: () => true,
    };
    const reducer = new BestPerGroupReducer(ranking);
    const later = record('4', 3, 2);
    reducer.update(record('4', 3, 1));
    reducer.update(later);
    expect(reducer.finalize()[0]).toBe(later);
  });

  it('should group by a custom key', () => {
    const ranking: GroupRanking<LogRecord> = {
      keyOf: (r) => r.decision,
      rankOf: (r) => r.reward,
      preferOnTie: () => false,
      compareKeys: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
    };
    const reducer = new BestPerGroupReducer(ranking);
    reducer.update({ ...record('1', 0), decision: 'B1-B1', reward: 5 });
    reducer.update({ ...record('2', 0), decision: 'A1-A1', reward: 1 });
    reducer.update({ ...record('3', 0), decision: 'B1-B1', reward: 9 });

    expect(reducer.finalize().map((r) => [r.decision, r.episode])).toEqual([
      ['A1-A1', '2'],
      ['B1-B1', '3'],
    ]);
  });

  describe('merge', () => {
    it('should apply the same max and tie rule as update', () => {
      const left = createBestReturnReducer();
      const right = createBestReturnReducer();
      const leftTie = record('1', 5, 1);
      const rightHigher = record('2', 9, 2);

      left.update(leftTie);
      left.update(record('2', 4, 3));
      right.update(record('1', 5, 4));
      right.update(rightHigher);
      right.update(record('3', 1, 5));

      left.merge(right);

      const best = left.finalize();
      expect(best.map((r) => r.episode)).toEqual(['1', '2', '3']);
      expect(best[0]).toBe(leftTie);
      expect(best[1]).toBe(rightHigher);
    });
  });
});

describe('compareIntegerKeys', () => {
  it('should compare by numeric value', () => {
    expect(compareIntegerKeys('2', '10')).toBeLessThan(0);
    expect(compareIntegerKeys('10', '2')).toBeGreaterThan(0);
    expect(compareIntegerKeys('5', '5')).toBe(0);
  });

  it('should ignore leading zeros for the value', () => {
    expect(compareIntegerKeys('007', '10')).toBeLessThan(0);
    expect(compareIntegerKeys('0', '000')).toBeLessThan(0);
  });

  it('should handle values beyond the safe integer range', () => {
    expect(compareIntegerKeys('9007199254740993', '9007199254740992')).toBeGreaterThan(0);
  });
});
