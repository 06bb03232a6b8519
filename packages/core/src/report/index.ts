export {
  DEFAULT_BUCKET_WIDTH,
  DEFAULT_SUCCESS_THRESHOLD,
  DEFAULT_TOP_COUNT,
  totalHours,
  countSuccesses,
  stepBucketOf,
  bucketByStep,
  topByReturn,
  summarizeRun,
  type StepBucket,
  type SummaryOptions,
  type RunSummary,
} from './summary.js';
