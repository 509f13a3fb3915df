import path from 'path';
import { ConfigurationError } from '../errors';
import { SplunkConnectionConfig } from '../splunk/splunkClient';
import { DEFAULT_CHUNK_SIZE, DEFAULT_DELIMITER } from '../spl/splGenerator';

export interface AppConfig {
  splunk: SplunkConnectionConfig;
  spl: {
    delimiter: string;
    chunkSize: number;
  };
  server: {
    port: number;
    storageDir: string;
    storageMaxAgeMs: number;
  };
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function boolFrom(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(raw.toLowerCase());
}

/**
 * Build the configuration from environment variables (after dotenv has run).
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const host = env.SPLUNK_HOST;
  if (!host) {
    throw new ConfigurationError('SPLUNK_HOST is not set');
  }

  const scheme = (env.SPLUNK_SCHEME || 'https').toLowerCase();
  if (scheme !== 'http' && scheme !== 'https') {
    throw new ConfigurationError(`SPLUNK_SCHEME must be http or https, got "${scheme}"`);
  }

  const token = env.SPLUNK_TOKEN || undefined;
  const username = env.SPLUNK_USERNAME || undefined;
  const password = env.SPLUNK_PASSWORD || undefined;
  if (!token && !(username && password)) {
    throw new ConfigurationError('Set SPLUNK_TOKEN, or both SPLUNK_USERNAME and SPLUNK_PASSWORD');
  }

  const chunkSize = intFrom(env, 'SPL_CHUNK_ROWS', DEFAULT_CHUNK_SIZE);
  if (chunkSize < 1) {
    throw new ConfigurationError('SPL_CHUNK_ROWS must be at least 1');
  }

  return {
    splunk: {
      scheme,
      host,
      port: intFrom(env, 'SPLUNK_PORT', 8089),
      token,
      username,
      password,
      app: env.SPLUNK_APP || 'search',
      owner: env.SPLUNK_OWNER || 'nobody',
      verifyTls: boolFrom(env, 'SPLUNK_VERIFY_TLS', true),
      requestTimeoutMs: intFrom(env, 'SPLUNK_REQUEST_TIMEOUT_MS', 30000),
      pollIntervalMs: intFrom(env, 'SPLUNK_POLL_INTERVAL_MS', 500),
      jobTimeoutMs: intFrom(env, 'SPLUNK_JOB_TIMEOUT_MS', 300000),
    },
    spl: {
      delimiter: env.SPL_DELIMITER || DEFAULT_DELIMITER,
      chunkSize,
    },
    server: {
      port: intFrom(env, 'PORT', 3001),
      storageDir: env.STORAGE_DIR || path.join(process.cwd(), 'storage'),
      storageMaxAgeMs: intFrom(env, 'STORAGE_MAX_AGE_MS', 3600000), // 1 hour default
    },
  };
}
