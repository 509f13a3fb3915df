/**
 * Error taxonomy for the import pipeline.
 *
 * Every stage fails fast with one of these; nothing is rolled back remotely.
 */

export class ImportError extends Error {
  public readonly code: string;

  constructor(message: string, options: { code: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
  }
}

/** Missing or malformed source file, or an invalid lookup name */
export class InputError extends ImportError {
  public readonly rowIndex?: number;
  public readonly line?: number;

  constructor(
    message: string,
    options: { code: string; rowIndex?: number; line?: number; cause?: unknown }
  ) {
    super(message, options);
    this.rowIndex = options.rowIndex;
    this.line = options.line;
  }
}

/** A value or column name that cannot be carried safely inside generated SPL */
export class GenerationError extends ImportError {
  public readonly rowIndex?: number;
  public readonly column?: string;

  constructor(message: string, options: { code: string; rowIndex?: number; column?: string }) {
    super(message, options);
    this.rowIndex = options.rowIndex;
    this.column = options.column;
  }
}

export type RemoteErrorKind = 'auth' | 'network' | 'search' | 'timeout';

export interface RemoteMessage {
  type: string;
  text: string;
}

export class RemoteError extends ImportError {
  public readonly kind: RemoteErrorKind;
  public readonly statusCode?: number;
  public readonly payload: RemoteMessage[];

  constructor(
    message: string,
    options: {
      kind: RemoteErrorKind;
      statusCode?: number;
      payload?: RemoteMessage[];
      cause?: unknown;
    }
  ) {
    super(message, { code: `REMOTE_${options.kind.toUpperCase()}`, cause: options.cause });
    this.kind = options.kind;
    this.statusCode = options.statusCode;
    this.payload = options.payload ?? [];
  }
}

/** The backup of an existing lookup failed, so the new data was not written */
export class ConflictError extends ImportError {
  public readonly lookupName: string;
  public readonly backupName: string;
  public readonly remote: RemoteError;

  constructor(lookupName: string, backupName: string, remote: RemoteError) {
    super(`Backup of existing lookup '${lookupName}' to '${backupName}' failed: ${remote.message}`, {
      code: 'BACKUP_FAILED',
      cause: remote,
    });
    this.lookupName = lookupName;
    this.backupName = backupName;
    this.remote = remote;
  }
}

/** The published lookup does not hold the rows that were written */
export class VerificationError extends ImportError {
  public readonly lookupName: string;
  public readonly expected: number;
  public readonly actual: number;

  constructor(lookupName: string, expected: number, actual: number) {
    super(`Lookup '${lookupName}' has ${actual} row(s), expected ${expected}`, { code: 'VERIFY_MISMATCH' });
    this.lookupName = lookupName;
    this.expected = expected;
    this.actual = actual;
  }
}

export class ConfigurationError extends ImportError {
  constructor(message: string) {
    super(message, { code: 'CONFIGURATION_ERROR' });
  }
}

export type ImportStage = 'read' | 'generate' | 'backup' | 'publish' | 'verify';

export class ImportStageError extends ImportError {
  public readonly stage: ImportStage;

  constructor(stage: ImportStage, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(message, {
      code: cause instanceof ImportError ? cause.code : 'UNKNOWN_ERROR',
      cause,
    });
    this.stage = stage;
  }
}

/**
 * Remote error payload of a failure, if it carries one
 */
export function remotePayloadOf(error: unknown): RemoteMessage[] {
  if (error instanceof RemoteError) return error.payload;
  if (error instanceof ConflictError) return error.remote.payload;
  if (error instanceof ImportStageError) return remotePayloadOf(error.cause);
  return [];
}
