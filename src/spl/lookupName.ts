import { InputError } from '../errors';

/** File extensions Splunk accepts for CSV lookup table files, longest first */
export const LOOKUP_EXTENSIONS = ['.csv.gz', '.csv'] as const;

const LOOKUP_NAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]*\.(csv|csv\.gz)$/;

/**
 * Validate a lookup table file name and return it unchanged
 */
export function validateLookupName(name: string): string {
  if (!LOOKUP_NAME_PATTERN.test(name)) {
    throw new InputError(
      `Invalid lookup name "${name}": use letters, digits, '_', '-' or '.', ending in .csv or .csv.gz`,
      { code: 'INVALID_LOOKUP_NAME' }
    );
  }
  return name;
}

export function lookupExtension(name: string): string {
  const extension = LOOKUP_EXTENSIONS.find((ext) => name.toLowerCase().endsWith(ext));
  return extension ? name.slice(name.length - extension.length) : '';
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format an instant as YYYYMMDDHHmmss in local time
 */
export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * `<lookup>_<timestamp><ext>`: the extension is repeated so the backup is
 * itself a valid lookup file name.
 */
export function backupLookupName(lookupName: string, timestamp: string): string {
  return `${lookupName}_${timestamp}${lookupExtension(lookupName)}`;
}

/**
 * Issues backup names that never repeat within this process, even when two
 * runs fall in the same second.
 */
export class BackupNamer {
  private lastIssuedMs: number | null = null;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  next(lookupName: string): { backupName: string; timestamp: string } {
    // One clock read per run; truncated to the second the name can express
    let instantMs = Math.floor(this.clock().getTime() / 1000) * 1000;
    if (this.lastIssuedMs !== null && instantMs <= this.lastIssuedMs) {
      instantMs = this.lastIssuedMs + 1000;
    }
    this.lastIssuedMs = instantMs;

    const timestamp = formatBackupTimestamp(new Date(instantMs));
    return { backupName: backupLookupName(lookupName, timestamp), timestamp };
  }
}
