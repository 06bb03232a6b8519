/**
 * Run report
 *
 * Aggregates used to chart a run: total training time, successful episodes,
 * per-step-bucket timing and yield, and the highest-return records.
 */

import type { LogRecord } from '../types.js';
import type { RunTables } from '../output/tables.js';

export const DEFAULT_BUCKET_WIDTH = 10_000;
export const DEFAULT_SUCCESS_THRESHOLD = 100;
export const DEFAULT_TOP_COUNT = 100;

export interface StepBucket {
  /** Lower bound of the bucket: floor(step / width) * width */
  bucket: number;
  records: number;
  meanStepTime: number;
  /** Records with reward at or above the success threshold */
  successes: number;
  /** Distinct episodes with at least one record in the bucket */
  episodes: number;
}

export interface SummaryOptions {
  bucketWidth?: number;
  successThreshold?: number;
  topCount?: number;
}

export interface RunSummary {
  runName: string;
  records: number;
  episodes: number;
  totalHours: number;
  /** Successes counted on the best-per-episode table */
  bestSuccesses: number;
  bucketWidth: number;
  successThreshold: number;
  buckets: StepBucket[];
  top: LogRecord[];
}

export function totalHours(records: readonly LogRecord[]): number {
  let seconds = 0;
  for (const record of records) {
    seconds += record.stepTime;
  }
  return seconds / 3600;
}

export function countSuccesses(
  records: readonly LogRecord[],
  threshold: number = DEFAULT_SUCCESS_THRESHOLD
): number {
  return records.filter((record) => record.reward >= threshold).length;
}

export function stepBucketOf(step: number, width: number = DEFAULT_BUCKET_WIDTH): number {
  return Math.floor(step / width) * width;
}

/**
 * Group records into fixed-width step buckets, ascending by bucket
 */
export function bucketByStep(
  records: readonly LogRecord[],
  width: number = DEFAULT_BUCKET_WIDTH,
  threshold: number = DEFAULT_SUCCESS_THRESHOLD
): StepBucket[] {
  if (!Number.isFinite(width) || width <= 0) {
    throw new RangeError(`Bucket width must be a positive number, got ${width}`);
  }

  const groups = new Map<number, { count: number; time: number; successes: number; episodes: Set<string> }>();
  for (const record of records) {
    const bucket = stepBucketOf(record.step, width);
    let group = groups.get(bucket);
    if (!group) {
      group = { count: 0, time: 0, successes: 0, episodes: new Set() };
      groups.set(bucket, group);
    }
    group.count += 1;
    group.time += record.stepTime;
    if (record.reward >= threshold) {
      group.successes += 1;
    }
    group.episodes.add(record.episode);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([bucket, group]) => ({
      bucket,
      records: group.count,
      meanStepTime: group.time / group.count,
      successes: group.successes,
      episodes: group.episodes.size,
    }));
}

/**
 * Highest `ret` first; records with equal returns keep their table order
 */
export function topByReturn(records: readonly LogRecord[], count: number = DEFAULT_TOP_COUNT): LogRecord[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => b.record.ret - a.record.ret || a.index - b.index)
    .slice(0, Math.max(0, count))
    .map(({ record }) => record);
}

export function summarizeRun(
  runName: string,
  tables: Pick<RunTables, 'records' | 'best'>,
  options: SummaryOptions = {}
): RunSummary {
  const bucketWidth = options.bucketWidth ?? DEFAULT_BUCKET_WIDTH;
  const successThreshold = options.successThreshold ?? DEFAULT_SUCCESS_THRESHOLD;

  return {
    runName,
    records: tables.records.length,
    episodes: tables.best.length,
    totalHours: totalHours(tables.records),
    bestSuccesses: countSuccesses(tables.best, successThreshold),
    bucketWidth,
    successThreshold,
    buckets: bucketByStep(tables.records, bucketWidth, successThreshold),
    top: topByReturn(tables.best, options.topCount ?? DEFAULT_TOP_COUNT),
  };
}
