import { parse, CsvError } from 'csv-parse';
import { Readable } from 'stream';
import * as fs from 'fs';
import * as path from 'path';
import { InputError } from '../errors';
import { Dataset, Row } from '../types/record';
import { DetectedFormat, FileFormat, ReadOptions } from '../types/csv';

const SAMPLE_BYTES = 4096;

/**
 * Callback for each data row. `rowIndex` is 0-based over data rows,
 * `line` is the 1-based line in the file where the row ends.
 */
export type RowCallback = (row: Row, rowIndex: number, line: number) => void;

/**
 * Detect the source delimiter from the header line.
 * Tab wins when the first line has at least as many tabs as commas.
 */
export async function detectFileFormat(filePath: string): Promise<DetectedFormat> {
  const extension = path.extname(filePath).toLowerCase().replace('.', '');
  const format: FileFormat = extension === 'txt' ? 'txt' : 'csv';

  const handle = await fs.promises.open(filePath, 'r');
  let sample: string;
  try {
    const buffer = Buffer.alloc(SAMPLE_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SAMPLE_BYTES, 0);
    sample = buffer.subarray(0, bytesRead).toString('utf-8').replace(/^\uFEFF/, '');
  } finally {
    await handle.close();
  }

  const firstLine = sample.split(/\r?\n/)[0] ?? '';
  const tabCount = (firstLine.match(/\t/g) || []).length;
  const commaCount = (firstLine.match(/,/g) || []).length;
  const delimiter = tabCount > 0 && tabCount >= commaCount ? '\t' : ',';

  return {
    format,
    delimiter,
    sampleHeaders: firstLine.length > 0 ? firstLine.split(delimiter) : undefined,
  };
}

function unpackRecord(chunk: unknown): { fields: string[]; line: number } {
  if (typeof chunk === 'object' && chunk !== null && 'record' in chunk && 'info' in chunk) {
    const { record, info } = chunk;
    const line =
      typeof info === 'object' && info !== null && 'lines' in info && typeof info.lines === 'number'
        ? info.lines
        : 0;
    if (Array.isArray(record)) {
      return { fields: record.map((field) => String(field)), line };
    }
  }
  throw new InputError('Unexpected record shape from CSV parser', { code: 'CSV_PARSE_ERROR' });
}

function validateHeader(header: string[]): void {
  if (header.length === 0 || header.every((name) => name === '')) {
    throw new InputError('CSV header is empty', { code: 'INVALID_HEADER', line: 1 });
  }

  const seen = new Set<string>();
  for (const name of header) {
    if (seen.has(name)) {
      throw new InputError(`Duplicate column "${name}" in CSV header`, { code: 'INVALID_HEADER', line: 1 });
    }
    seen.add(name);
  }
}

function toInputError(err: Error): InputError {
  if (err instanceof InputError) return err;
  if (err instanceof CsvError) {
    const line = typeof err.lines === 'number' ? err.lines : undefined;
    return new InputError(`CSV parse error${line ? ` at line ${line}` : ''}: ${err.message}`, {
      code: 'CSV_PARSE_ERROR',
      line,
      cause: err,
    });
  }
  return new InputError(`Unable to read source file: ${err.message}`, { code: 'FILE_UNREADABLE', cause: err });
}

/**
 * Parse a CSV stream, calling `onHeader` once and `onRow` for every data row.
 * Rejects with InputError on the first malformed row.
 */
export function parseCSVStream(
  stream: Readable,
  onHeader: (header: string[]) => void,
  onRow: RowCallback,
  options: ReadOptions = {}
): Promise<void> {
  return new Promise((resolve, reject) => {
    const parser = parse({
      delimiter: options.delimiter || ',',
      quote: options.quote || '"',
      escape: options.escape || '"',
      skip_empty_lines: options.skipEmptyLines !== false,
      bom: true,
      // Field counts are checked below so the error can name the row
      relax_column_count: true,
      info: true,
    });

    let header: string[] | null = null;
    let rowIndex = 0;
    let failed = false;

    const fail = (err: Error) => {
      if (failed) return;
      failed = true;
      stream.unpipe(parser);
      stream.destroy();
      parser.destroy();
      reject(toInputError(err));
    };

    parser.on('readable', () => {
      try {
        let chunk: unknown;
        while (!failed && (chunk = parser.read()) !== null) {
          const { fields, line } = unpackRecord(chunk);

          if (header === null) {
            validateHeader(fields);
            header = fields;
            onHeader(fields);
            continue;
          }

          if (fields.length !== header.length) {
            throw new InputError(
              `Malformed row ${rowIndex} at line ${line}: expected ${header.length} fields, got ${fields.length}`,
              { code: 'MALFORMED_ROW', rowIndex, line }
            );
          }

          const row: Row = Object.fromEntries(header.map((name, index) => [name, fields[index]]));
          onRow(row, rowIndex, line);
          rowIndex++;
        }
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
      }
    });

    stream.on('error', fail);
    parser.on('error', fail);

    parser.on('end', () => {
      if (failed) return;
      if (header === null) {
        reject(new InputError('CSV file has no header line', { code: 'INVALID_HEADER', line: 1 }));
        return;
      }
      resolve();
    });

    stream.pipe(parser);
  });
}

/**
 * Read a whole CSV file into a Dataset
 */
export async function readDataset(filePath: string, options: ReadOptions = {}): Promise<Dataset> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    throw new InputError(
      missing ? `Source file not found: ${filePath}` : `Source file is not readable: ${filePath}`,
      { code: missing ? 'FILE_NOT_FOUND' : 'FILE_UNREADABLE', cause: err }
    );
  }

  console.log(`[CSV] Reading source file: ${filePath}`);

  let header: string[] = [];
  const rows: Row[] = [];

  await parseCSVStream(
    fs.createReadStream(filePath),
    (names) => {
      header = names;
    },
    (row) => {
      rows.push(row);
    },
    options
  );

  console.log(`[CSV] Read ${rows.length.toLocaleString()} row(s) with ${header.length} column(s)`);
  return { header, rows };
}
