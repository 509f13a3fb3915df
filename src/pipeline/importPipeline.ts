import { ImportStage, ImportStageError, VerificationError } from '../errors';
import { BackupOrchestrator, BackupRecord } from '../lookup/backupOrchestrator';
import { readDataset } from '../parsers/csvParser';
import { PublishExecutor } from '../splunk/publishExecutor';
import { SplunkClient, SplunkConnectionConfig } from '../splunk/splunkClient';
import { GenerateOptions, generateStatements } from '../spl/splGenerator';
import { BackupNamer, validateLookupName } from '../spl/lookupName';
import { ReadOptions } from '../types/csv';

export interface ImportRequest {
  sourceFile: string;
  lookupName: string;
  /** Source CSV delimiter (default ',') */
  sourceDelimiter?: string;
}

export interface ImportDependencies {
  executor: PublishExecutor;
  backup: BackupOrchestrator;
  generate?: GenerateOptions;
}

export interface ImportReport {
  lookupName: string;
  rowCount: number;
  columnCount: number;
  statementCount: number;
  jobIds: string[];
  backup: BackupRecord | null;
  /** Row count read back from Splunk, or null when it could not be read */
  verifiedRowCount: number | null;
}

async function stage<T>(name: ImportStage, work: () => Promise<T> | T): Promise<T> {
  try {
    return await work();
  } catch (err) {
    throw new ImportStageError(name, err);
  }
}

export function countStatement(lookupName: string): string {
  return `| inputlookup ${lookupName} | stats count`;
}

/**
 * read → generate → backup → publish → verify.
 * Each stage aborts the run on failure; completed remote effects stay.
 * A row count that differs from the source fails `verify`.
 */
export async function runImport(request: ImportRequest, deps: ImportDependencies): Promise<ImportReport> {
  const { sourceFile, lookupName } = request;
  console.log(`[Import] Importing '${sourceFile}' into lookup '${lookupName}'`);

  const readOptions: ReadOptions = request.sourceDelimiter ? { delimiter: request.sourceDelimiter } : {};
  const dataset = await stage('read', async () => {
    validateLookupName(lookupName);
    return readDataset(sourceFile, readOptions);
  });

  // Generation is pure, so it runs before anything touches Splunk
  const statements = await stage('generate', () => generateStatements(dataset, lookupName, deps.generate));

  const backup = await stage('backup', () => deps.backup.backupIfExists(lookupName));

  const jobIds = await stage('publish', async () => {
    const result = await deps.executor.publish(statements);
    if (!result.ok) throw result.error;
    return result.jobIds;
  });
  console.log(`[Import] Lookup '${lookupName}' created successfully from '${sourceFile}'`);

  const verifiedRowCount = await stage('verify', async () => {
    const rows = await deps.executor.query(countStatement(lookupName));
    const raw = rows[0]?.count;
    const count = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
    if (isNaN(count)) {
      console.warn(`[Import] Could not read back the row count of '${lookupName}'`);
      return null;
    }
    if (count !== dataset.rows.length) {
      throw new VerificationError(lookupName, dataset.rows.length, count);
    }
    console.log(`[Import] Lookup '${lookupName}' contains ${count} row(s)`);
    return count;
  });

  return {
    lookupName,
    rowCount: dataset.rows.length,
    columnCount: dataset.header.length,
    statementCount: statements.length,
    jobIds,
    backup: backup.backup,
    verifiedRowCount,
  };
}

/**
 * Wire the pipeline's collaborators for one Splunk instance
 */
export function createImportDependencies(
  config: { splunk: SplunkConnectionConfig; spl: GenerateOptions },
  namer: BackupNamer = new BackupNamer()
): ImportDependencies {
  const executor = new PublishExecutor(new SplunkClient(config.splunk));
  return {
    executor,
    backup: new BackupOrchestrator(executor, config.splunk.app, namer),
    generate: config.spl,
  };
}
