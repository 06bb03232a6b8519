import type { LogRecord } from '../types.js';
import { ITER_LINE_GRAMMAR, type LineGrammar } from './grammar.js';

export type RecordExtractor = (line: string) => LogRecord | null;

/**
 * Extract a record from one log line, or null when the line does not match.
 */
export function extractRecord(line: string, grammar: LineGrammar = ITER_LINE_GRAMMAR): LogRecord | null {
  return grammar.match(line);
}

export function createRecordExtractor(grammar: LineGrammar = ITER_LINE_GRAMMAR): RecordExtractor {
  return (line) => grammar.match(line);
}
