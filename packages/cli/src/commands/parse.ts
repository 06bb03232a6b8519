/**
 * trainlog parse command
 *
 * Converts the log files of each run directory under the data directory into
 * trainlog.csv, best_results.csv and (when ini files are present) config.csv
 * under the output directory.
 */

import { Command, Option } from "commander";
import {
  DEFAULT_CONFIG_EXTENSIONS,
  DEFAULT_GRAMMAR_NAME,
  DEFAULT_LOG_EXTENSIONS,
  getLineGrammar,
  processRuns,
  type RunResult,
} from "@trainlog/core";
import { createSpinner, debug, error as logError, json as outputJson, success, warn } from "../utils/logger.js";
import { formatParseSummary } from "../formatter.js";
import { ExitCode } from "../types.js";
import { optionString, optionStringList, runCommand, type CommandContext } from "./context.js";

/**
 * Parse command options after merging flags with configuration
 */
export interface ParseOptions {
  dataDir: string;
  outputDir: string;
  grammar: string;
  logExtensions: string[];
  configExtensions: string[];
  /** Harvest ini files into config.csv */
  harvestConfig: boolean;
  json: boolean;
}

/**
 * Add the leading dot to bare extensions ("log" -> ".log")
 */
export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

export function resolveParseOptions(
  options: Record<string, unknown>,
  context: CommandContext
): ParseOptions {
  const { config, globalOptions } = context;
  const ext = optionStringList(options, "ext");

  return {
    dataDir: optionString(options, "dataDir") ?? config.dataDir ?? "data",
    outputDir: optionString(options, "outputDir") ?? config.outputDir ?? "output",
    grammar: optionString(options, "grammar") ?? config.grammar ?? DEFAULT_GRAMMAR_NAME,
    logExtensions: (ext && ext.length > 0 ? ext : config.logExtensions ?? DEFAULT_LOG_EXTENSIONS).map(normalizeExtension),
    configExtensions: (config.configExtensions ?? DEFAULT_CONFIG_EXTENSIONS).map(normalizeExtension),
    harvestConfig: options.ini !== false,
    json: globalOptions.json === true,
  };
}

function resultToJson(result: RunResult): Record<string, unknown> {
  if (result.status === "failed") {
    return {
      runName: result.runName,
      status: result.status,
      outputDir: result.outputDir,
      error: result.error.message,
    };
  }

  const { config, ...report } = result.report;
  return {
    status: result.status,
    outputDir: result.outputDir,
    ...report,
    config: config.status === "failed" ? { ...config, error: config.error.message } : config,
  };
}

/**
 * Execute the parse command
 *
 * @returns SUCCESS when every run and its config pass succeeded, ERROR otherwise
 */
export async function executeParse(runs: readonly string[], options: ParseOptions): Promise<ExitCode> {
  const grammar = getLineGrammar(options.grammar);
  const spinner = createSpinner();

  const results = await processRuns({
    dataDir: options.dataDir,
    outputDir: options.outputDir,
    runs,
    grammar,
    logExtensions: options.logExtensions,
    configExtensions: options.configExtensions,
    harvestConfig: options.harvestConfig,
    logger: { debug },
    onRunStart: (runName) => {
      spinner.start(`Parsing run '${runName}'...`);
    },
    onRunComplete: (result) => {
      if (result.status === "failed") {
        spinner.fail(`Run '${result.runName}' failed`);
      } else {
        spinner.stop();
      }
      // JSON mode reports every run once at the end
      if (options.json) {
        return;
      }
      if (result.status === "failed") {
        logError(result.error.message);
        return;
      }
      success(formatParseSummary(result.report));
      const { config } = result.report;
      if (config.status === "failed") {
        logError(`Config files of run '${result.runName}' could not be parsed: ${config.error.message}`);
      }
    },
  });

  if (results.length === 0 && !options.json) {
    warn(`No run directories found in ${options.dataDir}`);
  }

  if (options.json) {
    outputJson({ runs: results.map(resultToJson) });
  }

  const failed = results.some(
    (result) => result.status === "failed" || result.report.config.status === "failed"
  );
  return failed ? ExitCode.ERROR : ExitCode.SUCCESS;
}

/**
 * Create the parse command
 *
 * @returns Commander command for 'trainlog parse'
 */
export function createParseCommand(): Command {
  const command = new Command("parse")
    .description("Parse run log files into CSV tables")
    .addHelpText(
      "after",
      `
Examples:
  $ trainlog parse                        Parse every run under the data directory
  $ trainlog parse run1 run2              Parse selected runs
  $ trainlog parse --ext txt log          Read .txt and .log files
  $ trainlog parse --no-ini               Skip ini harvesting`
    )
    .argument("[runs...]", "Run directory names (default: all)")
    .addOption(new Option("--data-dir <path>", "Directory holding one directory per run"))
    .addOption(new Option("--output-dir <path>", "Directory receiving the CSV tables"))
    .addOption(new Option("--grammar <name>", "Log line grammar"))
    .addOption(new Option("--ext <ext...>", "Log file extensions"))
    .addOption(new Option("--no-ini", "Do not harvest ini files into config.csv"))
    .action(async (runs: string[], options: Record<string, unknown>, cmd: Command) => {
      await runCommand(cmd, (context) => executeParse(runs, resolveParseOptions(options, context)));
    });

  return command;
}

export default createParseCommand;
