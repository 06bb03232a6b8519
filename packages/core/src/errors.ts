/**
 * Error types raised by the trainlog core.
 *
 * Line-level mismatches are never errors; these classes cover the failures
 * that stop a run, a config pass or a table read.
 */

/**
 * Base class for every error thrown by @trainlog/core
 */
export class TrainlogError extends Error {
  readonly errorCause?: unknown;
  /** Next step for the user */
  readonly suggestion?: string;

  constructor(message: string, options?: { cause?: unknown; suggestion?: string }) {
    super(message);
    this.name = 'TrainlogError';
    if (options?.cause) {
      this.errorCause = options.cause;
    }
    this.suggestion = options?.suggestion;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Run input directory is missing, unreadable or not a directory
 */
export class RunInputError extends TrainlogError {
  readonly path: string;

  constructor(message: string, options: { path: string; cause?: unknown; suggestion?: string }) {
    super(message, { cause: options.cause, suggestion: options.suggestion });
    this.name = 'RunInputError';
    this.path = options.path;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface IniParseErrorOptions {
  cause?: unknown;
  /** Source file path */
  source?: string;
  /** 1-based line number */
  line?: number;
  suggestion?: string;
}

/**
 * Ini syntax error in a run's configuration file
 */
export class IniParseError extends TrainlogError {
  readonly source?: string;
  readonly line?: number;

  constructor(message: string, options: IniParseErrorOptions = {}) {
    super(message, { cause: options.cause, suggestion: options.suggestion });
    this.name = 'IniParseError';
    this.source = options.source;
    this.line = options.line;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A persisted table does not have the expected layout
 */
export class TableFormatError extends TrainlogError {
  readonly source?: string;

  constructor(message: string, options: { source?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TableFormatError';
    this.source = options.source;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * No line grammar is registered under the requested name
 */
export class UnknownGrammarError extends TrainlogError {
  readonly grammar: string;

  constructor(grammar: string, known: readonly string[]) {
    super(`Unknown line grammar: ${grammar}`, {
      suggestion: `Use one of: ${known.join(', ')}`,
    });
    this.name = 'UnknownGrammarError';
    this.grammar = grammar;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isTrainlogError(value: unknown): value is TrainlogError {
  return value instanceof TrainlogError;
}
