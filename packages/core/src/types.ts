/**
 * Record and table types shared by the extractor, reducer and sinks.
 */

export type NumericField = 'step' | 'eps' | 'learningRate' | 'ret' | 'lastCrash' | 'stepTime' | 'sf' | 'reward';

/**
 * Numeric fields as they were written in the source, e.g. `0.0000001` or `-0.0`
 */
export type NumericText = Readonly<Record<NumericField, string>>;

/**
 * One parsed training log line
 */
export interface LogRecord {
  step: number;
  /** Episode id as written in the log (pure digits) */
  episode: string;
  /** Decision label, e.g. `A1-B2` */
  decision: string;
  /** Exploration rate */
  eps: number;
  learningRate: number;
  /** Episode return; ranks records inside an episode */
  ret: number;
  lastCrash: number;
  /** Step duration in seconds */
  stepTime: number;
  sf: number;
  found: boolean;
  reward: number;
  /** Source text of the numeric fields; tables write it in place of the number */
  text?: NumericText;
}

/**
 * Table columns in canonical order, paired with the record property they hold
 */
export const RECORD_COLUMNS = [
  ['Step', 'step'],
  ['Episode', 'episode'],
  ['Decision', 'decision'],
  ['Eps', 'eps'],
  ['lr', 'learningRate'],
  ['Ret', 'ret'],
  ['Last Crash', 'lastCrash'],
  ['t', 'stepTime'],
  ['SF', 'sf'],
  ['Found', 'found'],
  ['Reward', 'reward'],
] as const satisfies ReadonlyArray<readonly [string, keyof LogRecord]>;

export type RecordColumn = (typeof RECORD_COLUMNS)[number][0];

export type RecordField = (typeof RECORD_COLUMNS)[number][1];

export const NUMERIC_FIELDS: readonly NumericField[] = [
  'step',
  'eps',
  'learningRate',
  'ret',
  'lastCrash',
  'stepTime',
  'sf',
  'reward',
];

export function isNumericField(field: string): field is NumericField {
  return NUMERIC_FIELDS.some((numeric) => numeric === field);
}

export const RECORD_HEADER: readonly RecordColumn[] = RECORD_COLUMNS.map(([column]) => column);

/**
 * `section.key` / raw value pair harvested from a run's ini files
 */
export interface ConfigParameter {
  parameter: string;
  value: string;
}

export const CONFIG_HEADER = ['parameter', 'value'] as const;

/**
 * Line counts for a single log file
 */
export interface FileParseReport {
  /** File name relative to the run directory */
  file: string;
  linesSeen: number;
  linesParsed: number;
}

export type ConfigPassReport =
  | { status: 'skipped' }
  | { status: 'ok'; files: string[]; parameters: number }
  | { status: 'failed'; files: string[]; error: Error };

/**
 * Parse yield for one run
 */
export interface ParseReport {
  runName: string;
  totalLinesSeen: number;
  linesParsed: number;
  linesDiscarded: number;
  /** Distinct episodes in the best table */
  episodes: number;
  files: FileParseReport[];
  config: ConfigPassReport;
}
