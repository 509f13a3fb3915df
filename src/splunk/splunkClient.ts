import axios, { AxiosError, AxiosInstance } from 'axios';
import * as https from 'https';
import { z } from 'zod';
import { RemoteError, RemoteMessage } from '../errors';
import { JobHandle, SearchResult, SearchRow, SearchService } from '../types/splunk';

export interface SplunkConnectionConfig {
  scheme: 'http' | 'https';
  host: string;
  port: number;
  token?: string;
  username?: string;
  password?: string;
  /** Namespace the jobs (and so the lookups they write) belong to */
  app: string;
  owner: string;
  verifyTls: boolean;
  requestTimeoutMs: number;
  pollIntervalMs: number;
  /** Upper bound on waiting for one job to finish */
  jobTimeoutMs: number;
}

const messageSchema = z.object({
  type: z.string(),
  text: z.string(),
});

const submitResponseSchema = z.object({ sid: z.string().min(1) });

const loginResponseSchema = z.object({ sessionKey: z.string().min(1) });

const jobStatusSchema = z.object({
  entry: z
    .array(
      z.object({
        content: z.object({
          dispatchState: z.string(),
          isFailed: z.boolean().optional(),
          messages: z.array(messageSchema).optional(),
        }),
      })
    )
    .min(1),
});

const searchRowSchema = z.record(z.union([z.string(), z.array(z.string())]));

const resultsResponseSchema = z.object({
  results: z.array(searchRowSchema).default([]),
  messages: z.array(messageSchema).optional(),
});

const errorBodySchema = z.object({ messages: z.array(messageSchema) });

const FAILURE_MESSAGE_TYPES = new Set(['ERROR', 'FATAL']);

function failureMessages(messages: RemoteMessage[] | undefined): RemoteMessage[] {
  return (messages ?? []).filter((message) => FAILURE_MESSAGE_TYPES.has(message.type.toUpperCase()));
}

function summarize(messages: RemoteMessage[]): string {
  return messages.map((message) => `${message.type}: ${message.text}`).join('; ');
}

/**
 * Map a transport or decoding failure to a RemoteError
 */
export function toRemoteError(err: unknown, context: string): RemoteError {
  if (err instanceof RemoteError) return err;

  if (axios.isAxiosError(err)) {
    if (err.code === AxiosError.ECONNABORTED || err.code === AxiosError.ETIMEDOUT) {
      return new RemoteError(`${context}: ${err.message}`, { kind: 'timeout', cause: err });
    }
    if (!err.response) {
      return new RemoteError(`${context}: ${err.message}`, { kind: 'network', cause: err });
    }

    const status = err.response.status;
    const body = errorBodySchema.safeParse(err.response.data);
    const payload = body.success ? body.data.messages : [];
    const detail = payload.length > 0 ? summarize(payload) : err.message;

    return new RemoteError(`${context}: HTTP ${status} ${detail}`, {
      kind: status === 401 || status === 403 ? 'auth' : 'search',
      statusCode: status,
      payload,
      cause: err,
    });
  }

  if (err instanceof z.ZodError) {
    return new RemoteError(`${context}: unexpected response from Splunk`, { kind: 'search', cause: err });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new RemoteError(`${context}: ${message}`, { kind: 'network', cause: err });
}

/**
 * Splunk management REST API client: dispatches search jobs and waits for them.
 */
export class SplunkClient implements SearchService {
  private readonly http: AxiosInstance;
  private readonly login: AxiosInstance;
  private sessionKey: string | null = null;

  constructor(
    private readonly config: SplunkConnectionConfig,
    private readonly sleep: (ms: number) => Promise<void> = (ms) => new Promise((r) => setTimeout(r, ms))
  ) {
    const base = {
      baseURL: `${config.scheme}://${config.host}:${config.port}`,
      timeout: config.requestTimeoutMs,
      httpsAgent: config.scheme === 'https' ? new https.Agent({ rejectUnauthorized: config.verifyTls }) : undefined,
    };

    this.login = axios.create(base);
    this.http = axios.create(base);

    this.http.interceptors.request.use(async (request) => {
      request.headers.Authorization = await this.authorization();
      return request;
    });
  }

  private get jobsPath(): string {
    const owner = encodeURIComponent(this.config.owner);
    const app = encodeURIComponent(this.config.app);
    return `/servicesNS/${owner}/${app}/search/jobs`;
  }

  private async authorization(): Promise<string> {
    if (this.config.token) {
      return `Bearer ${this.config.token}`;
    }

    if (!this.sessionKey) {
      console.log(`[Splunk] Logging in as '${this.config.username ?? ''}'`);
      try {
        const response = await this.login.post(
          '/services/auth/login',
          new URLSearchParams({
            username: this.config.username ?? '',
            password: this.config.password ?? '',
            output_mode: 'json',
          })
        );
        this.sessionKey = loginResponseSchema.parse(response.data).sessionKey;
      } catch (err) {
        throw toRemoteError(err, 'Login failed');
      }
    }

    return `Splunk ${this.sessionKey}`;
  }

  async submit(spl: string): Promise<JobHandle> {
    console.log(`[Splunk] Dispatching search: ${spl.replace(/\s+/g, ' ').slice(0, 50)}...`);
    try {
      const response = await this.http.post(
        this.jobsPath,
        new URLSearchParams({ search: spl, output_mode: 'json' })
      );
      const { sid } = submitResponseSchema.parse(response.data);
      return { sid, spl };
    } catch (err) {
      throw toRemoteError(err, 'Search dispatch failed');
    }
  }

  async awaitJob(handle: JobHandle): Promise<SearchResult> {
    const jobPath = `${this.jobsPath}/${encodeURIComponent(handle.sid)}`;
    const deadline = Date.now() + this.config.jobTimeoutMs;

    for (;;) {
      let content: z.infer<typeof jobStatusSchema>['entry'][number]['content'];
      try {
        const response = await this.http.get(jobPath, { params: { output_mode: 'json' } });
        content = jobStatusSchema.parse(response.data).entry[0].content;
      } catch (err) {
        throw toRemoteError(err, `Status of job ${handle.sid} unavailable`);
      }

      const errors = failureMessages(content.messages);
      if (content.dispatchState === 'FAILED' || content.isFailed === true || errors.length > 0) {
        throw new RemoteError(`Job ${handle.sid} failed${errors.length > 0 ? `: ${summarize(errors)}` : ''}`, {
          kind: 'search',
          payload: errors.length > 0 ? errors : content.messages ?? [],
        });
      }

      if (content.dispatchState === 'DONE') {
        return { sid: handle.sid, rows: await this.fetchResults(jobPath, handle.sid) };
      }

      if (Date.now() >= deadline) {
        throw new RemoteError(
          `Job ${handle.sid} did not finish within ${this.config.jobTimeoutMs}ms (state ${content.dispatchState})`,
          { kind: 'timeout' }
        );
      }

      await this.sleep(this.config.pollIntervalMs);
    }
  }

  private async fetchResults(jobPath: string, sid: string): Promise<SearchRow[]> {
    let parsed: z.infer<typeof resultsResponseSchema>;
    try {
      const response = await this.http.get(`${jobPath}/results`, { params: { output_mode: 'json', count: 0 } });
      if (response.status === 204) return [];
      parsed = resultsResponseSchema.parse(response.data);
    } catch (err) {
      throw toRemoteError(err, `Results of job ${sid} unavailable`);
    }

    const errors = failureMessages(parsed.messages);
    if (errors.length > 0) {
      throw new RemoteError(`Job ${sid} reported errors: ${summarize(errors)}`, { kind: 'search', payload: errors });
    }
    return parsed.results;
  }
}
