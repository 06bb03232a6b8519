/**
 * Configuration management for the CLI
 *
 * Loads ~/.trainlogrc and the project .trainlogrc (YAML or JSON), then
 * applies environment overrides.
 */
import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import YAML from "yaml";
import {
  DEFAULT_BUCKET_WIDTH,
  DEFAULT_CONFIG_EXTENSIONS,
  DEFAULT_GRAMMAR_NAME,
  DEFAULT_LOG_EXTENSIONS,
  DEFAULT_SUCCESS_THRESHOLD,
} from "@trainlog/core";
import { configError } from "../errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

/**
 * trainlog CLI configuration
 */
export interface TrainlogConfig {
  /** Root holding one directory per run */
  dataDir?: string;
  /** Root receiving one table directory per run */
  outputDir?: string;
  /** Line grammar name */
  grammar?: string;
  /** Log file extensions, e.g. [".txt", ".log"] */
  logExtensions?: string[];
  /** Ini file extensions */
  configExtensions?: string[];
  /** Step bucket width for reports */
  bucketWidth?: number;
  /** Reward counted as a success */
  successThreshold?: number;
  logLevel?: LogLevel;
  color?: boolean;
}

export const DEFAULT_CONFIG: Readonly<TrainlogConfig> = {
  dataDir: "data",
  outputDir: "output",
  grammar: DEFAULT_GRAMMAR_NAME,
  logExtensions: [...DEFAULT_LOG_EXTENSIONS],
  configExtensions: [...DEFAULT_CONFIG_EXTENSIONS],
  bucketWidth: DEFAULT_BUCKET_WIDTH,
  successThreshold: DEFAULT_SUCCESS_THRESHOLD,
  logLevel: "info",
  color: true,
};

export const RC_FILE_NAME = ".trainlogrc";

export function getGlobalConfigPath(homeDir: string = homedir()): string {
  return join(homeDir, RC_FILE_NAME);
}

/**
 * Search from startDir upward for a .trainlogrc
 */
export function getProjectConfigPath(startDir?: string): string | undefined {
  let currentDir = resolve(startDir ?? process.cwd());

  for (;;) {
    const configPath = join(currentDir, RC_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string, source: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw configError(`'${key}' must be a string in ${source}`);
  }
  return value;
}

function readNumber(raw: Record<string, unknown>, key: string, source: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw configError(`'${key}' must be a number in ${source}`);
  }
  return value;
}

function readPositiveNumber(raw: Record<string, unknown>, key: string, source: string): number | undefined {
  const value = readNumber(raw, key, source);
  if (value !== undefined && value <= 0) {
    throw configError(`'${key}' must be a positive number in ${source}`);
  }
  return value;
}

function readStringList(raw: Record<string, unknown>, key: string, source: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw configError(`'${key}' must be a list of strings in ${source}`);
  }
  return value;
}

/**
 * Validate parsed config content
 */
export function parseConfigContent(content: string, source = "config"): TrainlogConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    throw configError(
      `Invalid configuration syntax in ${source}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw configError(`Configuration must be an object in ${source}`);
  }

  const config: TrainlogConfig = {
    dataDir: readString(parsed, "dataDir", source),
    outputDir: readString(parsed, "outputDir", source),
    grammar: readString(parsed, "grammar", source),
    logExtensions: readStringList(parsed, "logExtensions", source),
    configExtensions: readStringList(parsed, "configExtensions", source),
    bucketWidth: readPositiveNumber(parsed, "bucketWidth", source),
    successThreshold: readNumber(parsed, "successThreshold", source),
  };

  const logLevel = parsed["logLevel"];
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw configError(`'logLevel' must be one of debug, info, warn, error in ${source}`);
    }
    config.logLevel = logLevel;
  }

  const color = parsed["color"];
  if (color !== undefined) {
    if (typeof color !== "boolean") {
      throw configError(`'color' must be true or false in ${source}`);
    }
    config.color = color;
  }

  return config;
}

/**
 * Load configuration from a file; undefined when the file does not exist
 */
export async function loadConfigFile(filePath: string): Promise<TrainlogConfig | undefined> {
  try {
    const content = await readFile(filePath, "utf-8");
    return parseConfigContent(content, filePath);
  } catch (err) {
    if (err !== null && typeof err === "object" && "code" in err && err.code === "ENOENT") {
      return undefined;
    }
    throw err;
  }
}

export function expandPath(inputPath: string, homeDir: string = homedir()): string {
  if (inputPath.startsWith("~/")) {
    return join(homeDir, inputPath.slice(2));
  }
  if (inputPath === "~") {
    return homeDir;
  }
  return inputPath;
}

/**
 * Merge configs; defined values in later configs win
 */
export function mergeConfigs(...configs: (TrainlogConfig | undefined)[]): TrainlogConfig {
  const result: TrainlogConfig = {};

  for (const config of configs) {
    if (!config) {
      continue;
    }
    if (config.dataDir !== undefined) result.dataDir = config.dataDir;
    if (config.outputDir !== undefined) result.outputDir = config.outputDir;
    if (config.grammar !== undefined) result.grammar = config.grammar;
    if (config.logExtensions !== undefined) result.logExtensions = [...config.logExtensions];
    if (config.configExtensions !== undefined) result.configExtensions = [...config.configExtensions];
    if (config.bucketWidth !== undefined) result.bucketWidth = config.bucketWidth;
    if (config.successThreshold !== undefined) result.successThreshold = config.successThreshold;
    if (config.logLevel !== undefined) result.logLevel = config.logLevel;
    if (config.color !== undefined) result.color = config.color;
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file (--config); must exist */
  configPath?: string;
  /** Directory to start the project config search from */
  cwd?: string;
  /** Home directory holding the global config */
  homeDir?: string;
  env?: {
    TRAINLOG_DATA_DIR?: string;
    TRAINLOG_OUTPUT_DIR?: string;
    TRAINLOG_LOG_LEVEL?: string;
    NO_COLOR?: string;
  };
}

/**
 * Load and merge all configuration sources
 *
 * Priority (highest to lowest):
 * 1. CLI options (applied by each command)
 * 2. Environment variables
 * 3. Project config (.trainlogrc found from cwd upward, or --config)
 * 4. Global config (~/.trainlogrc)
 * 5. Defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<TrainlogConfig> {
  const homeDir = options.homeDir ?? homedir();
  const globalConfig = await loadConfigFile(getGlobalConfigPath(homeDir));

  let projectConfig: TrainlogConfig | undefined;
  if (options.configPath) {
    projectConfig = await loadConfigFile(options.configPath);
    if (!projectConfig) {
      throw configError(`Configuration file not found: ${options.configPath}`);
    }
  } else {
    const projectConfigPath = getProjectConfigPath(options.cwd);
    projectConfig = projectConfigPath ? await loadConfigFile(projectConfigPath) : undefined;
  }

  const env = options.env ?? process.env;
  const envConfig: TrainlogConfig = {};
  if (env.TRAINLOG_DATA_DIR) {
    envConfig.dataDir = env.TRAINLOG_DATA_DIR;
  }
  if (env.TRAINLOG_OUTPUT_DIR) {
    envConfig.outputDir = env.TRAINLOG_OUTPUT_DIR;
  }
  if (env.TRAINLOG_LOG_LEVEL) {
    const level = env.TRAINLOG_LOG_LEVEL.toLowerCase();
    if (isLogLevel(level)) {
      envConfig.logLevel = level;
    }
  }
  if (env.NO_COLOR) {
    envConfig.color = false;
  }

  const merged = mergeConfigs(DEFAULT_CONFIG, globalConfig, projectConfig, envConfig);

  if (merged.dataDir) {
    merged.dataDir = expandPath(merged.dataDir, homeDir);
  }
  if (merged.outputDir) {
    merged.outputDir = expandPath(merged.outputDir, homeDir);
  }

  return merged;
}
