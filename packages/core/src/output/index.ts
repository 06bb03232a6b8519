export { escapeCsvValue, formatCsvRow, formatRecordRow, parseCsv } from './csv.js';

export {
  CsvRunSink,
  MemoryRunSink,
  RECORDS_FILE_NAME,
  BEST_FILE_NAME,
  CONFIG_FILE_NAME,
  type RunSink,
} from './sink.js';

export {
  readRunTables,
  parseRecordTable,
  parseConfigTable,
  type RunTables,
} from './tables.js';
