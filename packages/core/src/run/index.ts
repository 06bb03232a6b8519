export {
  processRun,
  processRuns,
  type ProcessRunOptions,
  type ProcessRunsOptions,
  type ParseSettings,
  type RunLogger,
  type RunResult,
} from './orchestrator.js';

export {
  DEFAULT_LOG_EXTENSIONS,
  DEFAULT_CONFIG_EXTENSIONS,
  assertDirectory,
  listFilesWithExtensions,
  listRunDirectories,
} from './discovery.js';
