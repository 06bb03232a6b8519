import { isTrainlogError, RunInputError, UnknownGrammarError } from "@trainlog/core";
import { ExitCode } from "./types.js";

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
  exitCode: ExitCode;
}

export class CliError extends Error implements StructuredError {
  code: string;

  suggestion?: string;

  exitCode: ExitCode;

  constructor(error: StructuredError) {
    super(error.message);
    this.name = "CliError";
    this.code = error.code;
    this.suggestion = error.suggestion;
    this.exitCode = error.exitCode;
  }
}

export function isCliError(value: unknown): value is CliError {
  return value instanceof CliError;
}

/**
 * Map any thrown value to a CliError with an exit code
 */
export function toCliError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }

  if (error instanceof UnknownGrammarError) {
    return usageError(error.message, error.suggestion);
  }

  if (error instanceof RunInputError) {
    return new CliError({
      code: "INPUT_NOT_FOUND",
      message: error.message,
      suggestion: error.suggestion ?? "Check --data-dir / --output-dir or the dataDir / outputDir keys in .trainlogrc",
      exitCode: ExitCode.INPUT_ERROR,
    });
  }

  if (isTrainlogError(error)) {
    return new CliError({
      code: "TRAINLOG_ERROR",
      message: error.message,
      suggestion: error.suggestion,
      exitCode: ExitCode.ERROR,
    });
  }

  if (error instanceof Error) {
    return new CliError({
      code: "INTERNAL_ERROR",
      message: error.message,
      exitCode: ExitCode.ERROR,
      suggestion: "Re-run with --verbose for details",
    });
  }

  return new CliError({
    code: "UNKNOWN_ERROR",
    message: "An unknown error occurred",
    exitCode: ExitCode.ERROR,
  });
}

export function usageError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: "INVALID_ARGUMENT",
    message,
    exitCode: ExitCode.INVALID_ARGUMENT,
    suggestion,
  });
}

export function configError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: "CONFIG_ERROR",
    message,
    exitCode: ExitCode.INPUT_ERROR,
    suggestion,
  });
}
