/**
 * CLI Commands
 *
 * This module exports all CLI commands.
 */

export {
  setupGlobalOptions,
  runCommand,
  reportError,
  type CommandContext,
  type GlobalOptions,
} from "./context.js";

export {
  createParseCommand,
  executeParse,
  resolveParseOptions,
  normalizeExtension,
  type ParseOptions,
} from "./parse.js";

export {
  createRunsCommand,
  executeRuns,
  listRuns,
  type RunEntry,
  type RunsOptions,
} from "./runs.js";

export {
  createReportCommand,
  executeReport,
  buildReport,
  resolveReportOptions,
  type ReportOptions,
} from "./report.js";

export {
  createConfigCommand,
  CONFIG_KEYS,
  type ConfigKey,
} from "./config.js";
