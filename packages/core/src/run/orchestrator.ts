/**
 * Run orchestration
 *
 * Streams every line of every log file in a run directory through the
 * extractor, feeds matches to the best-per-episode reducer and the sink,
 * and counts the lines that did not match.
 */

import { createReadStream } from 'node:fs';
import path from 'node:path';
import { createInterface } from 'node:readline';
import { harvestConfig } from '../config/ini.js';
import { ITER_LINE_GRAMMAR, type LineGrammar } from '../extract/grammar.js';
import { BEST_RETURN_PER_EPISODE, BestPerGroupReducer, type GroupRanking } from '../reduce/reducer.js';
import { CsvRunSink, type RunSink } from '../output/sink.js';
import type { ConfigPassReport, FileParseReport, LogRecord, ParseReport } from '../types.js';
import {
  DEFAULT_CONFIG_EXTENSIONS,
  DEFAULT_LOG_EXTENSIONS,
  assertDirectory,
  listFilesWithExtensions,
  listRunDirectories,
} from './discovery.js';

/**
 * Receives progress messages; the CLI logger satisfies this
 */
export interface RunLogger {
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface ParseSettings {
  grammar?: LineGrammar;
  ranking?: GroupRanking<LogRecord>;
  /** Log file extensions, with the leading dot (default `.txt`) */
  logExtensions?: readonly string[];
  /** Ini file extensions (default `.ini`, `.cfg`) */
  configExtensions?: readonly string[];
  /** Harvest ini files into the config table (default true) */
  harvestConfig?: boolean;
  logger?: RunLogger;
}

export interface ProcessRunOptions extends ParseSettings {
  runName: string;
  inputDir: string;
  sink: RunSink;
}

async function parseFile(
  filePath: string,
  grammar: LineGrammar,
  onRecord: (record: LogRecord) => Promise<void>
): Promise<{ linesSeen: number; linesParsed: number }> {
  let linesSeen = 0;
  let linesParsed = 0;

  const input = createReadStream(filePath, { encoding: 'utf8' });
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      linesSeen += 1;
      const record = grammar.match(line);
      if (record === null) {
        continue;
      }
      linesParsed += 1;
      await onRecord(record);
    }
  } finally {
    lines.close();
    input.destroy();
  }

  return { linesSeen, linesParsed };
}

async function runConfigPass(
  inputDir: string,
  sink: RunSink,
  extensions: readonly string[],
  logger?: RunLogger
): Promise<ConfigPassReport> {
  const files = await listFilesWithExtensions(inputDir, extensions);
  if (files.length === 0) {
    return { status: 'skipped' };
  }

  try {
    const parameters = await harvestConfig(files.map((file) => path.join(inputDir, file)));
    await sink.writeConfig(parameters);
    logger?.debug(`Harvested ${parameters.length} config parameters`, { files });
    return { status: 'ok', files, parameters: parameters.length };
  } catch (err) {
    return { status: 'failed', files, error: err instanceof Error ? err : new Error(String(err)) };
  }
}

/**
 * Parse one run directory into the sink
 *
 * @throws RunInputError when the input directory is missing; I/O errors while
 *   reading a log file propagate
 */
export async function processRun(options: ProcessRunOptions): Promise<ParseReport> {
  const {
    runName,
    inputDir,
    sink,
    grammar = ITER_LINE_GRAMMAR,
    ranking = BEST_RETURN_PER_EPISODE,
    logExtensions = DEFAULT_LOG_EXTENSIONS,
    configExtensions = DEFAULT_CONFIG_EXTENSIONS,
    logger,
  } = options;

  await assertDirectory(inputDir, `Run directory for '${runName}'`);
  const logFiles = await listFilesWithExtensions(inputDir, logExtensions);
  logger?.debug(`Run '${runName}': ${logFiles.length} log file(s)`, { files: logFiles, grammar: grammar.name });

  const reducer = new BestPerGroupReducer(ranking);
  const files: FileParseReport[] = [];
  let config: ConfigPassReport = { status: 'skipped' };

  await sink.open(runName);
  try {
    for (const file of logFiles) {
      const counts = await parseFile(path.join(inputDir, file), grammar, async (record) => {
        reducer.update(record);
        await sink.writeRecord(record);
      });
      files.push({ file, ...counts });
      logger?.debug(`Parsed ${counts.linesParsed}/${counts.linesSeen} lines of ${file}`);
    }

    await sink.writeBest(reducer.finalize());

    if (options.harvestConfig !== false) {
      config = await runConfigPass(inputDir, sink, configExtensions, logger);
    }
    // A skipped or failed pass leaves no config table behind
    if (config.status !== 'ok') {
      await sink.clearConfig();
    }
  } finally {
    await sink.close();
  }

  const totalLinesSeen = files.reduce((sum, f) => sum + f.linesSeen, 0);
  const linesParsed = files.reduce((sum, f) => sum + f.linesParsed, 0);

  return {
    runName,
    totalLinesSeen,
    linesParsed,
    linesDiscarded: totalLinesSeen - linesParsed,
    episodes: reducer.size,
    files,
    config,
  };
}

export interface ProcessRunsOptions extends ParseSettings {
  dataDir: string;
  outputDir: string;
  /** Run names to process; every run directory under dataDir when omitted */
  runs?: readonly string[];
  /** Sink factory; CSV files under `<outputDir>/<run>` by default */
  createSink?: (runName: string, runOutputDir: string) => RunSink;
  /** Called after each run, whatever its outcome */
  onRunComplete?: (result: RunResult) => void;
  /** Called before each run starts */
  onRunStart?: (runName: string) => void;
}

export type RunResult =
  | { runName: string; status: 'ok'; report: ParseReport; outputDir: string }
  | { runName: string; status: 'failed'; error: Error; outputDir: string };

/**
 * Process several runs independently; one failing run does not stop the others.
 *
 * @throws RunInputError when `dataDir` is missing
 */
export async function processRuns(options: ProcessRunsOptions): Promise<RunResult[]> {
  const { dataDir, outputDir, runs, createSink, onRunStart, onRunComplete, ...settings } = options;
  await assertDirectory(dataDir, 'Data directory');
  const runNames = runs && runs.length > 0 ? [...runs] : await listRunDirectories(dataDir);

  const results: RunResult[] = [];
  for (const runName of runNames) {
    const runOutputDir = path.join(outputDir, runName);
    onRunStart?.(runName);
    let result: RunResult;
    try {
      const report = await processRun({
        ...settings,
        runName,
        inputDir: path.join(dataDir, runName),
        sink: createSink ? createSink(runName, runOutputDir) : new CsvRunSink(runOutputDir),
      });
      result = { runName, status: 'ok', report, outputDir: runOutputDir };
    } catch (err) {
      result = {
        runName,
        status: 'failed',
        error: err instanceof Error ? err : new Error(String(err)),
        outputDir: runOutputDir,
      };
    }
    results.push(result);
    onRunComplete?.(result);
  }
  return results;
}
