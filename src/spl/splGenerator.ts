import { GenerationError } from '../errors';
import { Dataset } from '../types/record';
import { validateLookupName } from './lookupName';

export const DEFAULT_DELIMITER = '|;|';
export const DEFAULT_CHUNK_SIZE = 500;

/** Scratch fields used while expanding records; never written to the lookup */
const RECORD_FIELD = '__record';
const CELL_FIELD = '__cell';

/** Leading marker on every encoded cell, so no split element is ever empty */
const CELL_MARKER = '=';

export interface GenerateOptions {
  /** Field boundary inside one synthetic record; must not occur in any value */
  delimiter?: string;
  /** Rows per statement (default: 500) */
  chunkSize?: number;
}

/**
 * Quote a value as an SPL string literal
 */
export function quoteSplString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Reject column names that cannot be written as plain lookup fields.
 * `_`-prefixed fields are internal to Splunk and `*` is a wildcard in `table`.
 */
export function assertSafeFieldName(name: string): void {
  let reason: string | null = null;
  if (name === '') reason = 'is empty';
  else if (name.startsWith('_')) reason = "starts with '_'";
  else if (name.includes('"')) reason = 'contains a double quote';
  else if (name.includes('*')) reason = "contains '*'";

  if (reason) {
    throw new GenerationError(`Column name "${name}" ${reason}`, { code: 'UNSAFE_FIELD_NAME', column: name });
  }
}

/** Characters that can appear in a row number or an encoded cell */
const ENCODED_ALPHABET = /^[A-Za-z0-9\-_.!~*'()%=]*$/;

/**
 * The delimiter needs at least one character that encoding never produces,
 * otherwise it could match inside a cell or across a boundary.
 */
export function assertUsableDelimiter(delimiter: string): void {
  if (delimiter === '') {
    throw new GenerationError('Delimiter must not be empty', { code: 'INVALID_DELIMITER' });
  }
  if (ENCODED_ALPHABET.test(delimiter)) {
    throw new GenerationError(
      `Delimiter ${JSON.stringify(delimiter)} must contain a character other than letters, digits or -_.!~*'()%=`,
      { code: 'INVALID_DELIMITER' }
    );
  }
}

/**
 * Percent-encode one cell behind the marker. A raw value containing the
 * delimiter is refused rather than altered.
 */
export function encodeCell(value: string, delimiter: string, rowIndex: number, column: string): string {
  if (value.includes(delimiter)) {
    throw new GenerationError(
      `Value in row ${rowIndex}, column "${column}" contains the delimiter ${JSON.stringify(delimiter)}`,
      { code: 'DELIMITER_COLLISION', rowIndex, column }
    );
  }
  return CELL_MARKER + encodeURIComponent(value);
}

function fieldList(header: string[]): string {
  return header.map(quoteSplString).join(', ');
}

/**
 * Replaces the lookup with an empty one. Splunk writes a 0-length file when
 * there are no results, so the column names do not survive.
 */
function emptyLookupStatement(header: string[], lookupName: string): string {
  const nulls = header.map((name) => `${quoteSplString(name)}=null()`).join(', ');
  return [
    '| makeresults',
    `| eval ${nulls}`,
    `| table ${fieldList(header)}`,
    '| where false()',
    `| outputlookup create_empty=true override_if_empty=true ${lookupName}`,
  ].join('\n');
}

function chunkStatement(
  dataset: Dataset,
  start: number,
  end: number,
  lookupName: string,
  delimiter: string,
  append: boolean
): string {
  const { header, rows } = dataset;

  const records: string[] = [];
  for (let rowIndex = start; rowIndex < end; rowIndex++) {
    const row = rows[rowIndex];
    const cells = header.map((column) => encodeCell(row[column], delimiter, rowIndex, column));
    records.push(quoteSplString([String(rowIndex + 1), ...cells].join(delimiter)));
  }

  // mvindex 0 is the row number, cells start at 1
  const assignments = header
    .map((name, index) => `${quoteSplString(name)}=urldecode(substr(mvindex(${CELL_FIELD}, ${index + 1}), 2))`)
    .join(', ');

  return [
    '| makeresults',
    `| eval ${RECORD_FIELD}=mvappend(${records.join(', ')})`,
    `| mvexpand ${RECORD_FIELD}`,
    `| eval ${CELL_FIELD}=split(${RECORD_FIELD}, ${quoteSplString(delimiter)})`,
    `| eval ${assignments}`,
    `| table ${fieldList(header)}`,
    `| outputlookup ${append ? 'append=true ' : ''}${lookupName}`,
  ].join('\n');
}

/**
 * Translate a dataset into SPL statements that, run in order, write it to
 * `lookupName`. The first statement replaces the lookup, the rest append.
 */
export function generateStatements(dataset: Dataset, lookupName: string, options: GenerateOptions = {}): string[] {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;

  validateLookupName(lookupName);
  assertUsableDelimiter(delimiter);
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new GenerationError(`Chunk size must be a positive integer, got ${chunkSize}`, {
      code: 'INVALID_CHUNK_SIZE',
    });
  }
  dataset.header.forEach(assertSafeFieldName);

  if (dataset.rows.length === 0) {
    console.warn(`[SPL] No data rows: '${lookupName}' will be written as an empty file, without a header line`);
    return [emptyLookupStatement(dataset.header, lookupName)];
  }

  const statements: string[] = [];
  for (let start = 0; start < dataset.rows.length; start += chunkSize) {
    const end = Math.min(start + chunkSize, dataset.rows.length);
    statements.push(chunkStatement(dataset, start, end, lookupName, delimiter, start > 0));
  }

  console.log(
    `[SPL] Generated ${statements.length} statement(s) for ${dataset.rows.length.toLocaleString()} row(s) into '${lookupName}'`
  );
  return statements;
}
