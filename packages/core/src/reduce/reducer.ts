/**
 * Best-per-group reduction
 *
 * Keeps, for each group key, the single record with the highest rank seen so
 * far. Memory grows with the number of distinct keys, not with the number of
 * records.
 */

import type { LogRecord } from '../types.js';

/**
 * How records are grouped and ranked
 */
export interface GroupRanking<T> {
  keyOf(record: T): string;
  rankOf(record: T): number;
  /**
   * Called when challenger and incumbent have the same rank.
   * Return true to replace the incumbent.
   */
  preferOnTie(incumbent: T, challenger: T): boolean;
  /** Order of keys in the finalized output */
  compareKeys(a: string, b: string): number;
}

/**
 * Compare two non-negative integer strings by value, without a size limit.
 * Equal values written differently (`07`, `7`) fall back to string order.
 */
export function compareIntegerKeys(a: string, b: string): number {
  const left = a.replace(/^0+(?=\d)/, '');
  const right = b.replace(/^0+(?=\d)/, '');
  if (left.length !== right.length) {
    return left.length - right.length;
  }
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Highest return per episode; the first record to reach the maximum is kept.
 */
export const BEST_RETURN_PER_EPISODE: GroupRanking<LogRecord> = {
  keyOf: (record) => record.episode,
  rankOf: (record) => record.ret,
  preferOnTie: () => false,
  compareKeys: compareIntegerKeys,
};

interface Entry<T> {
  rank: number;
  record: T;
}

export class BestPerGroupReducer<T = LogRecord> {
  private readonly entries = new Map<string, Entry<T>>();

  constructor(private readonly ranking: GroupRanking<T>) {}

  /** Number of distinct keys seen */
  get size(): number {
    return this.entries.size;
  }

  update(record: T): void {
    const key = this.ranking.keyOf(record);
    this.offer(key, { rank: this.ranking.rankOf(record), record });
  }

  /**
   * Fold another reducer's state into this one. Entries already held here
   * count as earlier than the other reducer's.
   */
  merge(other: BestPerGroupReducer<T>): void {
    for (const [key, entry] of other.entries) {
      this.offer(key, entry);
    }
  }

  /**
   * Best record per key, ordered by the ranking's key order
   */
  finalize(): T[] {
    return [...this.entries.entries()]
      .sort(([a], [b]) => this.ranking.compareKeys(a, b))
      .map(([, entry]) => entry.record);
  }

  private offer(key: string, candidate: Entry<T>): void {
    const current = this.entries.get(key);
    if (
      current === undefined ||
      candidate.rank > current.rank ||
      (candidate.rank === current.rank && this.ranking.preferOnTie(current.record, candidate.record))
    ) {
      this.entries.set(key, candidate);
    }
  }
}

export function createBestReturnReducer(): BestPerGroupReducer<LogRecord> {
  return new BestPerGroupReducer(BEST_RETURN_PER_EPISODE);
}
