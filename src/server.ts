import express, { Request, Response, NextFunction, Express } from 'express';
import dotenv from 'dotenv';
import * as fs from 'fs';
import path from 'path';
import { queue as asyncQueue, QueueObject } from 'async';
import { z } from 'zod';
import { AppConfig, loadConfig } from './config/appConfig';
import { ImportError, ImportStageError, RemoteMessage, remotePayloadOf } from './errors';
import { createUploadMiddleware, UploadError, UPLOAD_FILE_PREFIX } from './middleware/upload';
import { detectFileFormat } from './parsers/csvParser';
import { createImportDependencies, ImportDependencies, ImportReport, runImport } from './pipeline/importPipeline';
import { validateLookupName } from './spl/lookupName';

type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export interface ImportJobState {
  id: string;
  status: JobStatus;
  lookupName: string;
  originalName: string;
  createdAt: string;
  updatedAt?: string;
  result?: ImportReport;
  error?: {
    stage?: string;
    code: string;
    message: string;
    payload: RemoteMessage[];
  };
}

interface ImportJob {
  jobId: string;
  filePath: string;
  lookupName: string;
  sourceDelimiter?: string;
}

export interface ServerOptions {
  storageDir: string;
  /** How long finished job results stay queryable */
  jobResultTtlMs?: number;
}

const JOB_RESULT_TTL = 3600000; // Keep results for 1 hour

const optionalField = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

/** Text fields sent alongside the upload */
const importFieldsSchema = z.object({
  lookupName: optionalField,
  delimiter: optionalField,
});

/**
 * Clean up old files in storage directory (handles orphaned files from crashes)
 */
export function cleanupOldStorageFiles(storageDir: string, maxAgeMs: number): number {
  if (!fs.existsSync(storageDir)) {
    return 0;
  }

  const now = Date.now();
  let cleanedCount = 0;

  for (const file of fs.readdirSync(storageDir)) {
    if (!file.startsWith(UPLOAD_FILE_PREFIX)) {
      continue; // Skip non-upload files
    }

    const filePath = path.join(storageDir, file);
    try {
      const stats = fs.statSync(filePath);
      if (now - stats.mtimeMs > maxAgeMs) {
        fs.unlinkSync(filePath);
        cleanedCount++;
      }
    } catch (err) {
      console.error(`[Cleanup] Error processing file ${file}:`, err);
    }
  }

  if (cleanedCount > 0) {
    console.log(`[Cleanup] Removed ${cleanedCount} orphaned file(s) from storage`);
  }
  return cleanedCount;
}

function removeFile(filePath: string): void {
  if (fs.existsSync(filePath)) {
    try {
      fs.unlinkSync(filePath);
      console.log(`[Cleanup] Deleted temporary file: ${filePath}`);
    } catch (unlinkError) {
      console.error('[Cleanup] Error deleting temp file:', unlinkError);
    }
  }
}

function describeError(err: unknown): NonNullable<ImportJobState['error']> {
  return {
    stage: err instanceof ImportStageError ? err.stage : undefined,
    code: err instanceof ImportError ? err.code : 'UNKNOWN_ERROR',
    message: err instanceof Error ? err.message : String(err),
    payload: remotePayloadOf(err),
  };
}

/**
 * Build the upload server. Imports run one at a time, which also keeps two
 * uploads for the same lookup from racing on the backup.
 */
export function createApp(
  deps: ImportDependencies,
  options: ServerOptions
): { app: Express; importQueue: QueueObject<ImportJob>; jobs: Map<string, ImportJobState> } {
  const app = express();
  const jobs = new Map<string, ImportJobState>();
  const ttl = options.jobResultTtlMs ?? JOB_RESULT_TTL;

  const updateJob = (jobId: string, updates: Partial<ImportJobState>) => {
    const current = jobs.get(jobId);
    if (current) {
      jobs.set(jobId, { ...current, ...updates, updatedAt: new Date().toISOString() });
    }
  };

  const processImportJob = async (job: ImportJob): Promise<void> => {
    const { jobId, filePath, lookupName, sourceDelimiter } = job;
    console.log(`[Queue] Processing job ${jobId}: ${filePath} → '${lookupName}'`);
    updateJob(jobId, { status: 'processing' });

    try {
      const delimiter = sourceDelimiter || (await detectFileFormat(filePath)).delimiter;
      const result = await runImport({ sourceFile: filePath, lookupName, sourceDelimiter: delimiter }, deps);
      updateJob(jobId, { status: 'completed', result });
    } catch (error) {
      const described = describeError(error);
      console.error(`[Queue] Job ${jobId} failed${described.stage ? ` at stage '${described.stage}'` : ''}:`, described.message);
      updateJob(jobId, { status: 'failed', error: described });
    } finally {
      // Clean up temporary file (always executes, even on error)
      removeFile(filePath);
      setTimeout(() => {
        jobs.delete(jobId);
      }, ttl).unref();
    }
  };

  // Create a queue that processes 1 import at a time
  const importQueue: QueueObject<ImportJob> = asyncQueue(async (job: ImportJob) => {
    console.log(`[Queue] Starting processing (queue length: ${importQueue.length()}, running: ${importQueue.running()})`);
    await processImportJob(job);
    console.log(`[Queue] Finished processing (queue length: ${importQueue.length()}, running: ${importQueue.running()})`);
  }, 1);

  app.use(express.json());

  app.get('/health', (req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      queue: {
        length: importQueue.length(),
        running: importQueue.running(),
        idle: importQueue.idle(),
      },
    });
  });

  /**
   * API: Upload a CSV file and queue its import into a lookup
   */
  app.post(
    '/api/import',
    createUploadMiddleware(options.storageDir),
    (req: Request, res: Response, next: NextFunction): void => {
      const file = req.file;
      if (!file) {
        next(new UploadError('No file uploaded'));
        return;
      }

      const fields = importFieldsSchema.safeParse(req.body ?? {});
      if (!fields.success) {
        removeFile(file.path);
        next(new UploadError(fields.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')));
        return;
      }

      const { lookupName, delimiter } = fields.data;
      if (!lookupName) {
        removeFile(file.path);
        next(new UploadError('lookupName is required'));
        return;
      }
      try {
        validateLookupName(lookupName);
      } catch (err) {
        removeFile(file.path);
        next(err instanceof ImportError ? new UploadError(err.message) : err);
        return;
      }

      const jobId = `job-${Date.now()}-${Math.round(Math.random() * 1e9)}`;
      const queuePosition = importQueue.length() + (importQueue.running() > 0 ? 1 : 0);
      jobs.set(jobId, {
        id: jobId,
        status: 'queued',
        lookupName,
        originalName: file.originalname,
        createdAt: new Date().toISOString(),
      });

      console.log(`[API] File uploaded: ${file.path} (${file.originalname}) → '${lookupName}', job ${jobId}`);

      importQueue.push(
        {
          jobId,
          filePath: file.path,
          lookupName,
          sourceDelimiter: delimiter === '\\t' ? '\t' : delimiter,
        },
        (err) => {
          if (err) console.error(`[Queue] Job ${jobId} failed with error:`, err);
        }
      );

      res.status(202).json({
        success: true,
        jobId,
        status: 'queued',
        queuePosition,
        statusUrl: `/api/status/${jobId}`,
      });
    }
  );

  /**
   * API: Check job status
   */
  app.get('/api/status/:jobId', (req: Request, res: Response): void => {
    const job = jobs.get(req.params.jobId);

    if (!job) {
      res.status(404).json({
        success: false,
        error: 'Job not found or expired',
      });
      return;
    }

    res.json({ success: true, job });
  });

  app.use((err: Error, req: Request, res: Response, next: NextFunction): void => {
    if (err instanceof UploadError) {
      res.status(400).json({ success: false, error: err.message });
      return;
    }
    console.error('Error:', err);
    res.status(500).json({ success: false, error: err.message || 'Internal server error' });
  });

  return { app, importQueue, jobs };
}

function start(config: AppConfig): void {
  cleanupOldStorageFiles(config.server.storageDir, config.server.storageMaxAgeMs);

  const { app } = createApp(createImportDependencies(config), { storageDir: config.server.storageDir });

  app.listen(config.server.port, () => {
    console.log(`Splunk lookup import server running on port ${config.server.port}`);
    console.log(`Target: ${config.splunk.scheme}://${config.splunk.host}:${config.splunk.port} (app: ${config.splunk.app})`);
  });

  process.on('SIGTERM', () => {
    console.log('SIGTERM received, shutting down...');
    process.exit(0);
  });

  process.on('SIGINT', () => {
    console.log('SIGINT received, shutting down...');
    process.exit(0);
  });
}

if (require.main === module) {
  dotenv.config();
  try {
    start(loadConfig());
  } catch (err) {
    console.error(`[Config] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
