import { ConflictError } from '../errors';
import { PublishExecutor } from '../splunk/publishExecutor';
import { quoteSplString } from '../spl/splGenerator';
import { BackupNamer, validateLookupName } from '../spl/lookupName';

/**
 * Unknown → NotExists → Proceed
 * Unknown → Exists → Renaming → RenameOK → Proceed
 *                             → RenameFailed → Abort
 */
export type BackupState = 'Unknown' | 'NotExists' | 'Exists' | 'Renaming' | 'RenameOK' | 'RenameFailed';

export interface BackupRecord {
  originalName: string;
  backupName: string;
  timestamp: string;
}

export type BackupOutcome =
  | { state: 'NotExists'; backup: null }
  | { state: 'RenameOK'; backup: BackupRecord };

/**
 * Lists the lookup files visible from `app`, the namespace the backup and the
 * write run in. A lookup private to another app is not visible there.
 */
export function lookupExistsStatement(lookupName: string, app: string): string {
  return [
    `| rest splunk_server=local /servicesNS/-/${encodeURIComponent(app)}/data/lookup-table-files`,
    `| search title=${quoteSplString(lookupName)}`,
    '| head 1',
    '| fields title',
  ].join(' ');
}

export function backupStatement(lookupName: string, backupName: string): string {
  return `| inputlookup ${lookupName} | outputlookup ${backupName}`;
}

/**
 * Moves an existing lookup out of the way before it is overwritten.
 * The backup is a copy under the new name; the write that follows replaces
 * the original, which completes the rename.
 */
export class BackupOrchestrator {
  private state: BackupState = 'Unknown';

  constructor(
    private readonly executor: PublishExecutor,
    private readonly app: string,
    private readonly namer: BackupNamer = new BackupNamer()
  ) {}

  get currentState(): BackupState {
    return this.state;
  }

  async lookupExists(lookupName: string): Promise<boolean> {
    const rows = await this.executor.query(lookupExistsStatement(lookupName, this.app));
    // `search` matches case-insensitively; lookup file names do not
    return rows.some((row) => row.title === lookupName);
  }

  async backupIfExists(lookupName: string): Promise<BackupOutcome> {
    validateLookupName(lookupName);
    this.state = 'Unknown';

    console.log(`[Backup] Checking if lookup '${lookupName}' exists...`);
    const exists = await this.lookupExists(lookupName);

    if (!exists) {
      this.state = 'NotExists';
      console.log(`[Backup] Lookup '${lookupName}' not found, no backup needed`);
      return { state: 'NotExists', backup: null };
    }

    this.state = 'Exists';
    const { backupName, timestamp } = this.namer.next(lookupName);

    this.state = 'Renaming';
    console.log(`[Backup] Backing up '${lookupName}' as '${backupName}'`);
    const result = await this.executor.publish([backupStatement(lookupName, backupName)]);

    if (!result.ok) {
      this.state = 'RenameFailed';
      console.error(`[Backup] Backup of '${lookupName}' failed, aborting before any data is written`);
      throw new ConflictError(lookupName, backupName, result.error);
    }

    this.state = 'RenameOK';
    console.log(`[Backup] Backup created for '${lookupName}' as '${backupName}'`);
    return { state: 'RenameOK', backup: { originalName: lookupName, backupName, timestamp } };
  }
}
