/**
 * Minimal CSV codec for run tables.
 *
 * Values are quoted only when they contain a comma, a quote or a line break;
 * rows end with `\n`.
 */

import { RECORD_COLUMNS, isNumericField, type LogRecord, type RecordField } from '../types.js';

export function escapeCsvValue(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

export function formatCsvRow(values: readonly string[]): string {
  return values.map(escapeCsvValue).join(',') + '\n';
}

function formatField(record: LogRecord, field: RecordField): string {
  if (record.text && isNumericField(field)) {
    return record.text[field];
  }
  return String(record[field]);
}

/**
 * Numeric cells repeat the source text when the record carries it
 */
export function formatRecordRow(record: LogRecord): string {
  return formatCsvRow(RECORD_COLUMNS.map(([, field]) => formatField(record, field)));
}

/**
 * Parse CSV text into rows of raw string cells. Quoted cells may span lines.
 * Blank lines are skipped.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;
  let rowHasContent = false;

  const endRow = (): void => {
    if (rowHasContent || row.length > 0 || current !== '') {
      row.push(current);
      rows.push(row);
    }
    row = [];
    current = '';
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      rowHasContent = true;
    } else if (char === ',') {
      row.push(current);
      current = '';
      rowHasContent = true;
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (text[i + 1] !== '\n') {
        endRow();
      }
    } else {
      current += char;
    }
  }
  endRow();

  return rows;
}
