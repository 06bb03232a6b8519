/**
 * Read persisted run tables back into typed records
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { RunInputError, TableFormatError } from '../errors.js';
import { CONFIG_HEADER, RECORD_HEADER, type ConfigParameter, type LogRecord } from '../types.js';
import { parseCsv } from './csv.js';
import { BEST_FILE_NAME, CONFIG_FILE_NAME, RECORDS_FILE_NAME } from './sink.js';

export interface RunTables {
  records: LogRecord[];
  best: LogRecord[];
  /** Null when the run has no config table */
  config: ConfigParameter[] | null;
}

function sameHeader(actual: readonly string[] | undefined, expected: readonly string[]): boolean {
  return (
    actual !== undefined &&
    actual.length === expected.length &&
    actual.every((cell, i) => cell === expected[i])
  );
}

function toNumber(cell: string, column: string, line: number, source?: string): number {
  const value = cell.trim() === '' ? Number.NaN : Number(cell);
  if (Number.isNaN(value)) {
    throw new TableFormatError(`Invalid number in column '${column}' on row ${line}: '${cell}'`, { source });
  }
  return value;
}

function toBoolean(cell: string, line: number, source?: string): boolean {
  switch (cell) {
    case 'true':
    case 'True':
      return true;
    case 'false':
    case 'False':
      return false;
    default:
      throw new TableFormatError(`Invalid boolean in column 'Found' on row ${line}: '${cell}'`, { source });
  }
}

/**
 * Parse a full-record or best table. Numeric cells keep their text, so
 * writing the records again reproduces the rows.
 *
 * @throws TableFormatError when the header or a cell does not fit the record schema
 */
export function parseRecordTable(text: string, source?: string): LogRecord[] {
  const rows = parseCsv(text);
  if (rows.length === 0) {
    return [];
  }
  if (!sameHeader(rows[0], RECORD_HEADER)) {
    throw new TableFormatError(`Unexpected header, expected: ${RECORD_HEADER.join(',')}`, { source });
  }

  const records: LogRecord[] = [];
  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    if (!row) continue;
    const line = i + 1;
    const [step, episode, decision, eps, lr, ret, lastCrash, t, sf, found, reward] = row;
    if (
      row.length !== RECORD_HEADER.length ||
      step === undefined ||
      episode === undefined ||
      decision === undefined ||
      eps === undefined ||
      lr === undefined ||
      ret === undefined ||
      lastCrash === undefined ||
      t === undefined ||
      sf === undefined ||
      found === undefined ||
      reward === undefined
    ) {
      throw new TableFormatError(
        `Row ${line} has ${row.length} cells, expected ${RECORD_HEADER.length}`,
        { source }
      );
    }

    records.push({
      step: toNumber(step, 'Step', line, source),
      episode,
      decision,
      eps: toNumber(eps, 'Eps', line, source),
      learningRate: toNumber(lr, 'lr', line, source),
      ret: toNumber(ret, 'Ret', line, source),
      lastCrash: toNumber(lastCrash, 'Last Crash', line, source),
      stepTime: toNumber(t, 't', line, source),
      sf: toNumber(sf, 'SF', line, source),
      found: toBoolean(found, line, source),
      reward: toNumber(reward, 'Reward', line, source),
      text: { step, eps, learningRate: lr, ret, lastCrash, stepTime: t, sf, reward },
    });
  }
  return records;
}

export function parseConfigTable(text: string, source?: string): ConfigParameter[] {
  const rows = parseCsv(text);
  if (rows.length === 0) {
    return [];
  }
  if (!sameHeader(rows[0], CONFIG_HEADER)) {
    throw new TableFormatError(`Unexpected header, expected: ${CONFIG_HEADER.join(',')}`, { source });
  }
  return rows.slice(1).map((row, index) => {
    const [parameter, value] = row;
    if (row.length !== 2 || parameter === undefined || value === undefined) {
      throw new TableFormatError(`Row ${index + 2} has ${row.length} cells, expected 2`, { source });
    }
    return { parameter, value };
  });
}

async function readTable(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * Load the tables of one run's output directory
 *
 * @throws RunInputError when the full-record or best table is missing
 */
export async function readRunTables(outputDir: string): Promise<RunTables> {
  const recordsPath = path.join(outputDir, RECORDS_FILE_NAME);
  const bestPath = path.join(outputDir, BEST_FILE_NAME);
  const configPath = path.join(outputDir, CONFIG_FILE_NAME);

  const [recordsText, bestText, configText] = await Promise.all([
    readTable(recordsPath),
    readTable(bestPath),
    readTable(configPath),
  ]);

  if (recordsText === null || bestText === null) {
    throw new RunInputError(`Run tables not found in ${outputDir}`, {
      path: outputDir,
      suggestion: 'Parse the run first so that trainlog.csv and best_results.csv exist',
    });
  }

  return {
    records: parseRecordTable(recordsText, recordsPath),
    best: parseRecordTable(bestText, bestPath),
    config: configText === null ? null : parseConfigTable(configText, configPath),
  };
}
