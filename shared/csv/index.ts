export {
  COMMA_CHAR,
  DOUBLEQUOTE_CHAR,
  cleanLine,
  getFields,
  stripQuotes,
  stripAllQuotes,
  quoteField
} from './CSVFields';

export {
  StringLineSource,
  FileLineSource,
  type LineSource
} from './LineSource';
