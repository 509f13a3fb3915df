#!/usr/bin/env node
import dotenv from 'dotenv';
import { parseArgs } from 'util';
import { loadConfig } from './config/appConfig';
import { ConfigurationError, ImportStageError, remotePayloadOf } from './errors';
import { detectFileFormat } from './parsers/csvParser';
import { createImportDependencies, ImportDependencies, runImport } from './pipeline/importPipeline';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE = [
  'Usage: splunk-lookup-import --source_file <path> --target_lookup_name <name> [--delimiter <char>]',
  '',
  '  --source_file          Path to the CSV file to upload as a lookup.',
  '  --target_lookup_name   Name of the target lookup file in Splunk (e.g. attacks_lookup.csv).',
  '  --delimiter            Field delimiter of the source file (default: detected, "," or tab).',
  '',
  'Example: splunk-lookup-import --source_file cyber_attacks.csv --target_lookup_name attacks_lookup.csv',
].join('\n');

export interface CliArgs {
  sourceFile: string;
  lookupName: string;
  delimiter?: string;
}

/**
 * Parse argv; returns null when --help was asked for. Accepts both
 * `--source_file` and `--source-file` spellings.
 */
export function parseCliArgs(argv: string[]): CliArgs | null {
  const { values } = parseArgs({
    args: argv,
    options: {
      source_file: { type: 'string' },
      'source-file': { type: 'string' },
      target_lookup_name: { type: 'string' },
      'target-lookup-name': { type: 'string' },
      delimiter: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });

  if (values.help) return null;

  const sourceFile = values.source_file ?? values['source-file'];
  const lookupName = values.target_lookup_name ?? values['target-lookup-name'];
  if (!sourceFile || !lookupName) {
    throw new TypeError('--source_file and --target_lookup_name are required');
  }

  const delimiter = values.delimiter === '\\t' ? '\t' : values.delimiter;
  return { sourceFile, lookupName, delimiter };
}

/**
 * Run the command line program and return its exit code
 */
export async function main(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  makeDependencies: (config: ReturnType<typeof loadConfig>) => ImportDependencies = createImportDependencies
): Promise<number> {
  let args: CliArgs | null;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  if (args === null) {
    console.log(USAGE);
    return EXIT_OK;
  }

  try {
    const config = loadConfig(env);

    let sourceDelimiter = args.delimiter;
    if (!sourceDelimiter) {
      try {
        sourceDelimiter = (await detectFileFormat(args.sourceFile)).delimiter;
      } catch {
        // The read stage reports the missing file with its own error
        sourceDelimiter = ',';
      }
    }

    const report = await runImport(
      { sourceFile: args.sourceFile, lookupName: args.lookupName, sourceDelimiter },
      makeDependencies(config)
    );

    console.log(
      `[Import] Done: ${report.rowCount} row(s) in ${report.statementCount} statement(s) written to '${report.lookupName}'` +
        (report.backup ? `, previous lookup saved as '${report.backup.backupName}'` : '')
    );
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`[Config] ${err.message}`);
    } else if (err instanceof ImportStageError) {
      console.error(`[Import] Failed at stage '${err.stage}': ${err.message}`);
    } else {
      console.error(`[Import] Failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    for (const message of remotePayloadOf(err)) {
      console.error(`[Splunk] ${message.type}: ${message.text}`);
    }
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  dotenv.config();
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Unexpected error:', error);
      process.exitCode = EXIT_FAILURE;
    });
}
