/**
 * CSV specific types for reading source files.
 */

export type FileFormat = 'csv' | 'txt';

export interface DetectedFormat {
  format: FileFormat;
  delimiter: string;
  sampleHeaders?: string[];
}

export interface ReadOptions {
  /** Field delimiter of the source file (default: ',') */
  delimiter?: ',' | '\t' | string;
  /** Quote character for enclosed fields (default: '"') */
  quote?: string;
  /** Escape character inside quoted fields (default: '"') */
  escape?: string;
  /** Skip blank lines (default: true) */
  skipEmptyLines?: boolean;
}
