/**
 * In-memory shape of a source CSV file.
 *
 * Values are opaque strings: the reader neither trims nor coerces them.
 */

/**
 * One data row, keyed by column name. Key order is not significant:
 * always iterate `Dataset.header` for column order (integer-like keys
 * would otherwise sort first).
 */
export type Row = Record<string, string>;

export interface Dataset {
  /** Column names in file order */
  header: string[];
  /** Data rows in file order, each with exactly the header's keys */
  rows: Row[];
}
