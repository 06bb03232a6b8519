/**
 * trainlog config command
 *
 * Show the effective configuration and where it comes from, with
 * get/list/path subcommands.
 */

import { Command } from "commander";
import type { ChalkInstance } from "chalk";
import { getGlobalConfigPath, getProjectConfigPath, type TrainlogConfig } from "../utils/config.js";
import { info, json as outputJson, style, warn } from "../utils/logger.js";
import { ExitCode } from "../types.js";
import { usageError } from "../errors.js";
import { runCommand } from "./context.js";

/**
 * Valid configuration keys
 */
export const CONFIG_KEYS = [
  "dataDir",
  "outputDir",
  "grammar",
  "logExtensions",
  "configExtensions",
  "bucketWidth",
  "successThreshold",
  "logLevel",
  "color",
] as const satisfies readonly (keyof TrainlogConfig)[];

export type ConfigKey = (typeof CONFIG_KEYS)[number];

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

/**
 * Format a config value for display
 */
export function formatValue(value: unknown, c: ChalkInstance = style()): string {
  if (value === undefined) {
    return c.gray("(not set)");
  }
  if (typeof value === "boolean") {
    return value ? c.green("true") : c.red("false");
  }
  if (typeof value === "string") {
    return c.cyan(value);
  }
  return c.cyan(JSON.stringify(value));
}

async function executeConfigGet(key: string, config: TrainlogConfig, jsonOutput: boolean): Promise<ExitCode> {
  if (!isConfigKey(key)) {
    throw usageError(`Invalid config key: ${key}`, `Valid keys: ${CONFIG_KEYS.join(", ")}`);
  }

  const value = config[key];
  if (jsonOutput) {
    outputJson({ key, value: value ?? null });
  } else {
    info(formatValue(value));
  }
  return ExitCode.SUCCESS;
}

async function executeConfigList(config: TrainlogConfig, jsonOutput: boolean): Promise<ExitCode> {
  if (jsonOutput) {
    outputJson(config);
    return ExitCode.SUCCESS;
  }

  const width = Math.max(...CONFIG_KEYS.map((key) => key.length));
  for (const key of CONFIG_KEYS) {
    info(`${key.padEnd(width)}  ${formatValue(config[key])}`);
  }
  return ExitCode.SUCCESS;
}

async function executeConfigPath(jsonOutput: boolean): Promise<ExitCode> {
  const globalPath = getGlobalConfigPath();
  const projectPath = getProjectConfigPath();

  if (jsonOutput) {
    outputJson({ global: globalPath, project: projectPath ?? null });
    return ExitCode.SUCCESS;
  }

  info(`Global:  ${globalPath}`);
  if (projectPath) {
    info(`Project: ${projectPath}`);
  } else {
    warn("No project config file found");
  }
  return ExitCode.SUCCESS;
}

function createGetCommand(): Command {
  return new Command("get")
    .description("Get a configuration value")
    .argument("<key>", `Config key (${CONFIG_KEYS.join(", ")})`)
    .action(async (key: string, _opts: unknown, cmd: Command) => {
      await runCommand(cmd, ({ config, globalOptions }) =>
        executeConfigGet(key, config, globalOptions.json === true)
      );
    });
}

function createListConfigCommand(): Command {
  return new Command("list")
    .description("List the effective configuration")
    .action(async (_opts: unknown, cmd: Command) => {
      await runCommand(cmd, ({ config, globalOptions }) => executeConfigList(config, globalOptions.json === true));
    });
}

function createPathCommand(): Command {
  return new Command("path")
    .description("Show configuration file path(s)")
    .action(async (_opts: unknown, cmd: Command) => {
      await runCommand(cmd, ({ globalOptions }) => executeConfigPath(globalOptions.json === true));
    });
}

/**
 * Create the config command group
 *
 * @returns Commander command for 'trainlog config'
 */
export function createConfigCommand(): Command {
  const command = new Command("config").description("Show CLI configuration");

  command.addCommand(createGetCommand());
  command.addCommand(createListConfigCommand());
  command.addCommand(createPathCommand());

  // No subcommand: list
  command.action(async (_opts: unknown, cmd: Command) => {
    await runCommand(cmd, ({ config, globalOptions }) => executeConfigList(config, globalOptions.json === true));
  });

  return command;
}

export default createConfigCommand;
