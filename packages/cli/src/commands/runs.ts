/**
 * trainlog runs command
 *
 * Lists the parsed runs found in the output directory.
 */

import path from "node:path";
import { Command, Option } from "commander";
import {
  BEST_FILE_NAME,
  CONFIG_FILE_NAME,
  RECORDS_FILE_NAME,
  listFilesWithExtensions,
  listRunDirectories,
} from "@trainlog/core";
import { info, json as outputJson, style } from "../utils/logger.js";
import { formatColumns } from "../formatter.js";
import { ExitCode } from "../types.js";
import { optionString, runCommand } from "./context.js";

export interface RunsOptions {
  outputDir: string;
  json: boolean;
}

export interface RunEntry {
  runName: string;
  /** Both the full-record and best tables are present */
  complete: boolean;
  hasConfig: boolean;
}

const TABLE_FILES = [RECORDS_FILE_NAME, BEST_FILE_NAME, CONFIG_FILE_NAME];

export async function listRuns(outputDir: string): Promise<RunEntry[]> {
  const runNames = await listRunDirectories(outputDir);
  const entries: RunEntry[] = [];
  for (const runName of runNames) {
    const files = await listFilesWithExtensions(path.join(outputDir, runName), [".csv"]);
    const tables = files.filter((file) => TABLE_FILES.includes(file));
    entries.push({
      runName,
      complete: tables.includes(RECORDS_FILE_NAME) && tables.includes(BEST_FILE_NAME),
      hasConfig: tables.includes(CONFIG_FILE_NAME),
    });
  }
  return entries;
}

export async function executeRuns(options: RunsOptions): Promise<ExitCode> {
  const runs = await listRuns(options.outputDir);

  if (options.json) {
    outputJson({ outputDir: options.outputDir, runs });
    return ExitCode.SUCCESS;
  }

  if (runs.length === 0) {
    info(`No parsed runs in ${options.outputDir}`);
    return ExitCode.SUCCESS;
  }

  const c = style();
  const rows = [
    ["RUN", "TABLES", "CONFIG"],
    ...runs.map((run) => [run.runName, run.complete ? "complete" : "incomplete", run.hasConfig ? "yes" : "no"]),
  ];
  const [header, ...lines] = formatColumns(rows);
  if (header !== undefined) {
    info(c.bold(header));
  }
  for (const line of lines) {
    info(line);
  }
  return ExitCode.SUCCESS;
}

/**
 * Create the runs command
 *
 * @returns Commander command for 'trainlog runs'
 */
export function createRunsCommand(): Command {
  const command = new Command("runs")
    .description("List parsed runs in the output directory")
    .addOption(new Option("--output-dir <path>", "Directory holding the CSV tables"))
    .action(async (options: Record<string, unknown>, cmd: Command) => {
      await runCommand(cmd, ({ config, globalOptions }) =>
        executeRuns({
          outputDir: optionString(options, "outputDir") ?? config.outputDir ?? "output",
          json: globalOptions.json === true,
        })
      );
    });

  return command;
}

export default createRunsCommand;
