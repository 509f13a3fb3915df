import { RemoteError } from '../errors';

/** Handle of a dispatched search job */
export interface JobHandle {
  sid: string;
  spl: string;
}

/** One result row as Splunk returns it (multivalue fields come back as arrays) */
export type SearchRow = Record<string, string | string[]>;

export interface SearchResult {
  sid: string;
  rows: SearchRow[];
}

/**
 * Execute-SPL capability: dispatch a statement, then wait for its job.
 * Both calls reject with a RemoteError.
 */
export interface SearchService {
  submit(spl: string): Promise<JobHandle>;
  awaitJob(handle: JobHandle): Promise<SearchResult>;
}

export type PublishResult =
  | { ok: true; jobIds: string[] }
  | { ok: false; failedIndex: number; error: RemoteError; completedJobIds: string[] };
