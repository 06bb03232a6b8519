/**
 * Logger utility for CLI output
 *
 * Respects --verbose, --quiet, --no-color, --json flags and the configured
 * log level. Progress spinners are silenced whenever plain output would be
 * polluted by them.
 */
import chalk, { Chalk, type ChalkInstance } from "chalk";
import ora, { type Ora } from "ora";

/**
 * Log levels in order of verbosity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

/**
 * Logger configuration options
 */
export interface LoggerOptions {
  /** Show debug output (overrides level) */
  verbose?: boolean;
  /** Only show errors (overrides level and verbose) */
  quiet?: boolean;
  /** Minimum level when neither verbose nor quiet is set */
  level?: LogLevel;
  /** Disable color output */
  noColor?: boolean;
  /** Output in JSON format */
  json?: boolean;
}

/**
 * JSON log entry structure
 */
export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Info level with a green check mark */
  success(message: string, data?: Record<string, unknown>): void;
  /** Output JSON data directly, regardless of quiet mode */
  json(data: unknown): void;
  configure(options: LoggerOptions): void;
  getOptions(): Readonly<LoggerOptions>;
}

let globalOptions: LoggerOptions = {
  verbose: false,
  quiet: false,
  level: "info",
  noColor: false,
  json: false,
};

const plain = new Chalk({ level: 0 });

/**
 * Chalk instance honouring --no-color
 */
export function style(): ChalkInstance {
  return globalOptions.noColor ? plain : chalk;
}

function minimumLevel(): LogLevel {
  if (globalOptions.quiet) return "error";
  if (globalOptions.verbose) return "debug";
  return globalOptions.level ?? "info";
}

function shouldOutput(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

function writeStdout(message: string): void {
  process.stdout.write(message + "\n");
}

function writeStderr(message: string): void {
  process.stderr.write(message + "\n");
}

function formatTextMessage(level: LogLevel, message: string, prefix?: string): string {
  const c = style();
  switch (level) {
    case "debug":
      return c.gray(`[debug] ${message}`);
    case "info":
      return prefix ? `${prefix} ${message}` : message;
    case "warn":
      return c.yellow(`${c.bold("warning:")} ${message}`);
    case "error":
      return c.red(`${c.bold("error:")} ${message}`);
  }
}

function outputLog(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
  prefix?: string
): void {
  if (!shouldOutput(level)) {
    return;
  }

  if (globalOptions.json) {
    const entry: JsonLogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };
    if (data) {
      entry.data = data;
    }
    writeStdout(JSON.stringify(entry));
    return;
  }

  const formatted = formatTextMessage(level, message, prefix);
  if (level === "error" || level === "warn") {
    writeStderr(formatted);
  } else {
    writeStdout(formatted);
  }

  if (data && globalOptions.verbose) {
    writeStdout(style().gray(JSON.stringify(data, null, 2)));
  }
}

function createLoggerInstance(): Logger {
  return {
    debug(message, data) {
      outputLog("debug", message, data);
    },
    info(message, data) {
      outputLog("info", message, data);
    },
    warn(message, data) {
      outputLog("warn", message, data);
    },
    error(message, data) {
      outputLog("error", message, data);
    },
    success(message, data) {
      outputLog("info", message, data, style().green("✓"));
    },
    json(data) {
      writeStdout(JSON.stringify(data, null, globalOptions.json ? 0 : 2));
    },
    configure(options) {
      globalOptions = { ...globalOptions, ...options };
    },
    getOptions() {
      return { ...globalOptions };
    },
  };
}

/**
 * Default logger instance
 */
export const logger = createLoggerInstance();

export const debug = logger.debug.bind(logger);
export const info = logger.info.bind(logger);
export const warn = logger.warn.bind(logger);
export const error = logger.error.bind(logger);
export const success = logger.success.bind(logger);
export const json = logger.json.bind(logger);

export function configureLogger(options: LoggerOptions): void {
  logger.configure(options);
}

export function getLoggerOptions(): Readonly<LoggerOptions> {
  return logger.getOptions();
}

/**
 * Progress spinner on stderr; silent in JSON and quiet modes
 */
export function createSpinner(): Ora {
  return ora({
    isSilent: globalOptions.json === true || globalOptions.quiet === true,
    color: globalOptions.noColor ? undefined : "cyan",
  });
}
