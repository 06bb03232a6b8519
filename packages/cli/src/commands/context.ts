/**
 * Shared command context: global options, logger setup and loaded config
 */
import type { Command } from "commander";
import { configureLogger, getLoggerOptions } from "../utils/logger.js";
import { loadConfig, type TrainlogConfig } from "../utils/config.js";
import { toCliError, usageError } from "../errors.js";
import { formatCliError } from "../formatter.js";
import type { ExitCode } from "../types.js";

/**
 * Global CLI options
 */
export interface GlobalOptions {
  /** Enable verbose output */
  verbose?: boolean;
  /** Minimize output */
  quiet?: boolean;
  /** Configuration file path */
  config?: string;
  /** Disable color output (set false by --no-color) */
  color?: boolean;
  /** Output in JSON format */
  json?: boolean;
}

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  globalOptions: GlobalOptions;
  config: TrainlogConfig;
}

/**
 * Configure the logger from global options and load configuration
 */
export async function setupGlobalOptions(command: Command): Promise<CommandContext> {
  const opts = command.optsWithGlobals<GlobalOptions>();

  // Logger first so config errors are reported in the requested format
  configureLogger({
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    noColor: opts.color === false,
    json: opts.json === true,
  });

  const config = await loadConfig({ configPath: opts.config });

  configureLogger({
    level: config.logLevel,
    noColor: opts.color === false || config.color === false,
  });

  return { globalOptions: opts, config };
}

/**
 * Print an error to stderr and return its exit code
 */
export function reportError(err: unknown): ExitCode {
  const cliError = toCliError(err);
  const json = getLoggerOptions().json === true;
  process.stderr.write(formatCliError(cliError, json) + "\n");
  return cliError.exitCode;
}

/**
 * Run a command handler with global options applied; sets process.exitCode
 */
export async function runCommand(
  command: Command,
  handler: (context: CommandContext) => Promise<ExitCode>
): Promise<void> {
  try {
    const context = await setupGlobalOptions(command);
    process.exitCode = await handler(context);
  } catch (err) {
    process.exitCode = reportError(err);
  }
}

export function optionString(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" ? value : undefined;
}

export function optionStringList(options: Record<string, unknown>, key: string): string[] | undefined {
  const value = options[key];
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === "string");
}

/**
 * Parse a number option; undefined when not given
 */
export function optionNumber(
  options: Record<string, unknown>,
  key: string,
  flag: string
): number | undefined {
  const raw = optionString(options, key);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw usageError(`Invalid argument for ${flag}: '${raw}' is not a number`);
  }
  return value;
}

/**
 * Parse a positive number option; undefined when not given
 */
export function optionPositiveNumber(
  options: Record<string, unknown>,
  key: string,
  flag: string
): number | undefined {
  const raw = optionString(options, key);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value) || value <= 0) {
    throw usageError(`Invalid argument for ${flag}: '${raw}' is not a positive number`);
  }
  return value;
}
