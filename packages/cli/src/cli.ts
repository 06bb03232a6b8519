/**
 * Main CLI setup using Commander.js
 *
 * Creates the main program with global options and registers all command modules
 */
import { Command, CommanderError, Option } from "commander";
import { createParseCommand } from "./commands/parse.js";
import { createRunsCommand } from "./commands/runs.js";
import { createReportCommand } from "./commands/report.js";
import { createConfigCommand } from "./commands/config.js";
import { reportError } from "./commands/context.js";
import { ExitCode } from "./types.js";

/**
 * CLI version - should match package.json
 */
export const CLI_VERSION = "0.1.0";

export const CLI_NAME = "trainlog";

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Turn training logs into per-run CSV tables and reports")
    .version(CLI_VERSION, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display help for command")
    .addHelpText(
      "after",
      `
Examples:
  $ trainlog parse                  Parse every run under ./data into ./output
  $ trainlog parse run1             Parse one run
  $ trainlog runs                   List parsed runs
  $ trainlog report run1            Summarize a parsed run`
    );

  // Global options
  program
    .addOption(new Option("-v, --verbose", "Enable verbose output").default(false))
    .addOption(new Option("-q, --quiet", "Minimize output (only errors)").default(false))
    .addOption(new Option("-c, --config <path>", "Configuration file path"))
    .addOption(new Option("--no-color", "Disable color output"))
    .addOption(new Option("--json", "Output in JSON format").default(false));

  program.addCommand(createParseCommand());
  program.addCommand(createRunsCommand());
  program.addCommand(createReportCommand());
  program.addCommand(createConfigCommand());

  return program;
}

/**
 * Throw CommanderError instead of exiting, on the program and every subcommand
 */
export function applyExitOverride(command: Command): Command {
  command.exitOverride();
  for (const subcommand of command.commands) {
    applyExitOverride(subcommand);
  }
  return command;
}

/**
 * Run the CLI program
 */
export async function run(args?: string[]): Promise<void> {
  const program = applyExitOverride(createProgram());

  try {
    await program.parseAsync(args ?? process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander has already printed help, version or the usage error
      process.exitCode = err.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.INVALID_ARGUMENT;
      return;
    }
    process.exitCode = reportError(err);
  }
}
