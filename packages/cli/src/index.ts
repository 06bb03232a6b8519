/**
 * trainlog CLI
 *
 * @packageDocumentation
 */

export { createProgram, applyExitOverride, run, CLI_NAME, CLI_VERSION } from "./cli.js";
export * from "./commands/index.js";
export * from "./utils/index.js";
export { formatCliError, formatColumns, formatParseSummary, formatRunSummary } from "./formatter.js";
export { CliError, isCliError, toCliError, usageError, configError, type StructuredError } from "./errors.js";
export { ExitCode, type OutputFormat } from "./types.js";
