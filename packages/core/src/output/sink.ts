/**
 * Run sinks receive the tables a run produces.
 *
 * The full-record stream arrives one record at a time; the best and config
 * tables arrive once, after the input is exhausted.
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { once } from 'node:events';
import { finished } from 'node:stream/promises';
import { CONFIG_HEADER, RECORD_HEADER, type ConfigParameter, type LogRecord } from '../types.js';
import { formatCsvRow, formatRecordRow } from './csv.js';

export interface RunSink {
  open(runName: string): Promise<void>;
  writeRecord(record: LogRecord): Promise<void>;
  writeBest(records: readonly LogRecord[]): Promise<void>;
  writeConfig(parameters: readonly ConfigParameter[]): Promise<void>;
  /** Drop a config table left by an earlier pass */
  clearConfig(): Promise<void>;
  close(): Promise<void>;
}

export const RECORDS_FILE_NAME = 'trainlog.csv';
export const BEST_FILE_NAME = 'best_results.csv';
export const CONFIG_FILE_NAME = 'config.csv';

/**
 * Writes `trainlog.csv`, `best_results.csv` and `config.csv` into one
 * output directory
 */
export class CsvRunSink implements RunSink {
  private stream: WriteStream | null = null;
  private done: Promise<void> = Promise.resolve();
  private failure: unknown = null;

  constructor(readonly outputDir: string) {}

  get recordsPath(): string {
    return path.join(this.outputDir, RECORDS_FILE_NAME);
  }

  get bestPath(): string {
    return path.join(this.outputDir, BEST_FILE_NAME);
  }

  get configPath(): string {
    return path.join(this.outputDir, CONFIG_FILE_NAME);
  }

  async open(): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const stream = createWriteStream(this.recordsPath, { encoding: 'utf8' });
    this.stream = stream;
    this.done = finished(stream).catch((err: unknown) => {
      this.failure = err;
    });
    await this.write(formatCsvRow(RECORD_HEADER));
  }

  async writeRecord(record: LogRecord): Promise<void> {
    await this.write(formatRecordRow(record));
  }

  async writeBest(records: readonly LogRecord[]): Promise<void> {
    const body = records.map(formatRecordRow).join('');
    await fs.writeFile(this.bestPath, formatCsvRow(RECORD_HEADER) + body, 'utf8');
  }

  async writeConfig(parameters: readonly ConfigParameter[]): Promise<void> {
    const body = parameters.map((p) => formatCsvRow([p.parameter, p.value])).join('');
    await fs.writeFile(this.configPath, formatCsvRow(CONFIG_HEADER) + body, 'utf8');
  }

  async clearConfig(): Promise<void> {
    await fs.rm(this.configPath, { force: true });
  }

  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      return;
    }
    this.stream = null;
    stream.end();
    await this.done;
    this.rethrowFailure();
  }

  private async write(chunk: string): Promise<void> {
    this.rethrowFailure();
    const stream = this.stream;
    if (!stream) {
      throw new Error(`Sink for ${this.outputDir} is not open`);
    }
    if (!stream.write(chunk)) {
      await Promise.race([once(stream, 'drain'), this.done]);
      this.rethrowFailure();
    }
  }

  private rethrowFailure(): void {
    if (this.failure !== null) {
      throw this.failure;
    }
  }
}

/**
 * Keeps every table in memory
 */
export class MemoryRunSink implements RunSink {
  runName: string | null = null;
  records: LogRecord[] = [];
  best: LogRecord[] = [];
  config: ConfigParameter[] | null = null;
  closed = false;

  async open(runName: string): Promise<void> {
    this.runName = runName;
  }

  async writeRecord(record: LogRecord): Promise<void> {
    this.records.push(record);
  }

  async writeBest(records: readonly LogRecord[]): Promise<void> {
    this.best = [...records];
  }

  async writeConfig(parameters: readonly ConfigParameter[]): Promise<void> {
    this.config = [...parameters];
  }

  async clearConfig(): Promise<void> {
    this.config = null;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
