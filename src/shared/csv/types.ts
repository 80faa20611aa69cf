import type { Readable } from 'stream';

/**
 * One data row keyed by header; lineNumber counts the header row as line 1
 */
export interface CsvRow {
  lineNumber: number;
  values: Record<string, string>;
}

export interface CsvData {
  fileName: string;
  /** Caller-supplied label for the kind of file, e.g. a bank export name */
  format: string;
  headers: string[];
  rows: CsvRow[];
}

/**
 * Uploaded file, shaped like a multipart file part
 */
export interface CsvFile {
  filename: string;
  file: Readable;
}

export type CsvInput = Readable | Buffer | string;

export interface CsvParser {
  parseCsvFile(file: CsvFile, format: string): Promise<CsvData>;
  parseCsvInputStream(input: CsvInput, fileName: string, format: string): Promise<CsvData>;
}
