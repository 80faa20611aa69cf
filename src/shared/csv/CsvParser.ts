/**
 * CSV Parser
 * Reads a CSV whose first record is the header row into header-keyed rows.
 */
import { parse } from 'csv-parse';
import logger from '../../infra/logger/logger.js';
import { InvalidRequestError } from '../errors/ServiceError.js';
import type { CsvData, CsvFile, CsvInput, CsvParser, CsvRow } from './types.js';

function toRow(headers: string[], record: string[], lineNumber: number): CsvRow {
  const values: Record<string, string> = {};
  const width = Math.min(headers.length, record.length);

  for (let i = 0; i < width; i++) {
    if (headers[i] !== '') {
      values[headers[i]] = record[i].trim();
    }
  }

  return { lineNumber, values };
}

export class DefaultCsvParser implements CsvParser {
  async parseCsvFile(file: CsvFile, format: string): Promise<CsvData> {
    return this.parseCsvInputStream(file.file, file.filename, format);
  }

  async parseCsvInputStream(input: CsvInput, fileName: string, format: string): Promise<CsvData> {
    const records = await this.readRecords(input, fileName);

    if (records.length === 0) {
      logger.info({ fileName, format }, `Ignoring empty csv file: ${fileName}`);
      return { fileName, format, headers: [], rows: [] };
    }

    const headers = records[0].map((header) => header.trim());
    const rows = records.slice(1).map((record, index) => toRow(headers, record, index + 2));

    logger.debug({ fileName, format, headers: headers.length, rows: rows.length }, 'Parsed csv file');

    return { fileName, format, headers, rows };
  }

  private async readRecords(input: CsvInput, fileName: string): Promise<string[][]> {
    const parser = parse({
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });

    const source = typeof input === 'string' || Buffer.isBuffer(input) ? undefined : input;
    if (source) {
      source.on('error', (error) => parser.destroy(error));
      source.pipe(parser);
    } else {
      parser.end(input);
    }

    const records: string[][] = [];
    try {
      for await (const record of parser) {
        if (Array.isArray(record)) {
          records.push(record.map((cell) => String(cell)));
        }
      }
    } catch (error) {
      // Release the rest of an upload the parser gave up on
      if (source) {
        source.unpipe(parser);
        source.destroy();
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidRequestError(`Failed to parse csv file ${fileName}: ${reason}`, { cause: error });
    }

    return records;
  }
}

export const csvParser: CsvParser = new DefaultCsvParser();
