export type { CsvData, CsvFile, CsvInput, CsvParser, CsvRow } from './types.js';
export { DefaultCsvParser, csvParser } from './CsvParser.js';
