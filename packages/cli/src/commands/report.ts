/**
 * trainlog report command
 *
 * Summarizes one parsed run: training time, successes, per-step-bucket
 * timing and the highest-return episodes.
 */

import path from "node:path";
import { Command, Option } from "commander";
import { DEFAULT_TOP_COUNT, readRunTables, summarizeRun, type RunSummary } from "@trainlog/core";
import { info, json as outputJson, style } from "../utils/logger.js";
import { formatRunSummary } from "../formatter.js";
import { ExitCode } from "../types.js";
import { optionNumber, optionPositiveNumber, optionString, runCommand, type CommandContext } from "./context.js";
import { usageError } from "../errors.js";

export interface ReportOptions {
  outputDir: string;
  top: number;
  bucketWidth?: number;
  successThreshold?: number;
  json: boolean;
}

export function resolveReportOptions(
  options: Record<string, unknown>,
  context: CommandContext
): ReportOptions {
  const { config, globalOptions } = context;
  const top = optionPositiveNumber(options, "top", "--top") ?? DEFAULT_TOP_COUNT;
  if (!Number.isInteger(top)) {
    throw usageError(`Invalid argument for --top: '${top}' is not an integer`);
  }

  return {
    outputDir: optionString(options, "outputDir") ?? config.outputDir ?? "output",
    top,
    bucketWidth: optionPositiveNumber(options, "bucketWidth", "--bucket-width") ?? config.bucketWidth,
    successThreshold: optionNumber(options, "threshold", "--threshold") ?? config.successThreshold,
    json: globalOptions.json === true,
  };
}

export async function buildReport(runName: string, options: ReportOptions): Promise<RunSummary> {
  const tables = await readRunTables(path.join(options.outputDir, runName));
  return summarizeRun(runName, tables, {
    bucketWidth: options.bucketWidth,
    successThreshold: options.successThreshold,
    topCount: options.top,
  });
}

export async function executeReport(runName: string, options: ReportOptions): Promise<ExitCode> {
  const summary = await buildReport(runName, options);

  if (options.json) {
    outputJson(summary);
  } else {
    info(formatRunSummary(summary, style()));
  }
  return ExitCode.SUCCESS;
}

/**
 * Create the report command
 *
 * @returns Commander command for 'trainlog report'
 */
export function createReportCommand(): Command {
  const command = new Command("report")
    .description("Summarize a parsed run")
    .addHelpText(
      "after",
      `
Examples:
  $ trainlog report run1                     Summary with the top 100 episodes
  $ trainlog report run1 --top 10            Top 10 episodes by return
  $ trainlog report run1 --threshold 50      Count rewards >= 50 as successes
  $ trainlog --json report run1              Summary as JSON`
    )
    .argument("<run>", "Run name")
    .addOption(new Option("--output-dir <path>", "Directory holding the CSV tables"))
    .addOption(new Option("--top <count>", "Number of episodes listed by return"))
    .addOption(new Option("--bucket-width <steps>", "Step bucket width"))
    .addOption(new Option("--threshold <reward>", "Reward counted as a success"))
    .action(async (runName: string, options: Record<string, unknown>, cmd: Command) => {
      await runCommand(cmd, (context) => executeReport(runName, resolveReportOptions(options, context)));
    });

  return command;
}

export default createReportCommand;
