export {
  ITER_LINE_GRAMMAR,
  DEFAULT_GRAMMAR_NAME,
  registerLineGrammar,
  listLineGrammars,
  getLineGrammar,
  type LineGrammar,
} from './grammar.js';

export { extractRecord, createRecordExtractor, type RecordExtractor } from './extractor.js';
