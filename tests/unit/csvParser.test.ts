import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { DefaultCsvParser } from '../../src/shared/csv/CsvParser.js';
import { InvalidRequestError } from '../../src/shared/errors/ServiceError.js';

describe('DefaultCsvParser', () => {
  const parser = new DefaultCsvParser();

  it('should key trimmed cells by trimmed headers', async () => {
    const csv = 'Date, Amount ,Description\n2024-01-01, 10.50 , Coffee \n2024-01-02,20,Lunch\n';

    const data = await parser.parseCsvInputStream(csv, 'statement.csv', 'bank-export');

    expect(data).toEqual({
      fileName: 'statement.csv',
      format: 'bank-export',
      headers: ['Date', 'Amount', 'Description'],
      rows: [
        { lineNumber: 2, values: { Date: '2024-01-01', Amount: '10.50', Description: 'Coffee' } },
        { lineNumber: 3, values: { Date: '2024-01-02', Amount: '20', Description: 'Lunch' } },
      ],
    });
  });

  it('should skip columns with an empty header', async () => {
    const data = await parser.parseCsvInputStream('Name,,Value\na,ignored,1\n', 'a.csv', 'f');

    expect(data.headers).toEqual(['Name', '', 'Value']);
    expect(data.rows).toEqual([{ lineNumber: 2, values: { Name: 'a', Value: '1' } }]);
  });

  it('should ignore extra cells and tolerate short rows', async () => {
    const data = await parser.parseCsvInputStream('A,B\n1,2,3\n4\n', 'a.csv', 'f');

    expect(data.rows).toEqual([
      { lineNumber: 2, values: { A: '1', B: '2' } },
      { lineNumber: 3, values: { A: '4' } },
    ]);
  });

  it('should handle quoted fields', async () => {
    const data = await parser.parseCsvInputStream('Name,Note\n"Smith, J","said ""hi"""\n', 'a.csv', 'f');

    expect(data.rows[0].values).toEqual({ Name: 'Smith, J', Note: 'said "hi"' });
  });

  it('should ignore a byte order mark and CRLF line endings', async () => {
    const data = await parser.parseCsvInputStream('\uFEFFId,Name\r\n1,x\r\n', 'a.csv', 'f');

    expect(data.headers).toEqual(['Id', 'Name']);
    expect(data.rows).toEqual([{ lineNumber: 2, values: { Id: '1', Name: 'x' } }]);
  });

  it('should return empty data for an empty file', async () => {
    const data = await parser.parseCsvInputStream('', 'empty.csv', 'f');

    expect(data).toEqual({ fileName: 'empty.csv', format: 'f', headers: [], rows: [] });
  });

  it('should return headers and no rows for a header-only file', async () => {
    const data = await parser.parseCsvInputStream(Buffer.from('A,B\n'), 'a.csv', 'f');

    expect(data.headers).toEqual(['A', 'B']);
    expect(data.rows).toEqual([]);
  });

  it('should read from a stream', async () => {
    const data = await parser.parseCsvInputStream(Readable.from(['A,B\n1,', '2\n']), 'a.csv', 'f');

    expect(data.rows).toEqual([{ lineNumber: 2, values: { A: '1', B: '2' } }]);
  });

  it('should parse an uploaded file under its original name', async () => {
    const data = await parser.parseCsvFile(
      { filename: 'upload.csv', file: Readable.from([Buffer.from('A\n1\n')]) },
      'bank'
    );

    expect(data.fileName).toBe('upload.csv');
    expect(data.format).toBe('bank');
    expect(data.rows).toEqual([{ lineNumber: 2, values: { A: '1' } }]);
  });

  it('should reject malformed content as an invalid request', async () => {
    const result = parser.parseCsvInputStream('A,B\n"unclosed,2\n', 'bad.csv', 'f');

    await expect(result).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(result).rejects.toThrow(/^Failed to parse csv file bad\.csv: /);
  });

  it('should release an upload stream that fails to parse', async () => {
    const upload = new Readable({ read() {} });
    upload.push('Name,Amount\n"Rent"x,950\n');

    await expect(
      parser.parseCsvFile({ filename: 'upload.csv', file: upload }, 'bank-export')
    ).rejects.toBeInstanceOf(InvalidRequestError);
    expect(upload.destroyed).toBe(true);
  });
});
