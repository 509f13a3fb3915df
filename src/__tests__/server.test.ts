import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs';
import path from 'path';
import { Server } from 'http';
import { cleanupOldStorageFiles, createApp } from '../server';
import { BackupOrchestrator } from '../lookup/backupOrchestrator';
import { PublishExecutor } from '../splunk/publishExecutor';
import { UPLOAD_FILE_PREFIX } from '../middleware/upload';
import { FakeSplunk } from './helpers/fakeSplunk';
import { createTempDir } from './helpers/tempFiles';

function csvForm(fields: Record<string, string>, file?: { name: string; content: string; type: string }): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, value);
  }
  if (file) {
    form.append('datafile', new Blob([file.content], { type: file.type }), file.name);
  }
  return form;
}

describe('import server', () => {
  let temp: ReturnType<typeof createTempDir>;
  let splunk: FakeSplunk;
  let server: Server;
  let http: AxiosInstance;

  const uploads = () => fs.readdirSync(temp.dir).filter((name) => name.startsWith(UPLOAD_FILE_PREFIX));

  async function waitForJob(statusUrl: string): Promise<{ status: string; [key: string]: unknown }> {
    for (let attempt = 0; attempt < 200; attempt++) {
      const response = await http.get(statusUrl);
      const job = response.data.job;
      if (job.status === 'completed' || job.status === 'failed') return job;
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
    throw new Error(`Job at ${statusUrl} did not finish`);
  }

  beforeEach(async () => {
    temp = createTempDir();
    splunk = new FakeSplunk();
    const executor = new PublishExecutor(splunk);
    const { app } = createApp({ executor, backup: new BackupOrchestrator(executor, 'search') }, { storageDir: temp.dir });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    const port = address !== null && typeof address === 'object' ? address.port : 0;
    http = axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true });
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    temp.cleanup();
  });

  it('reports health and queue state', async () => {
    const response = await http.get('/health');

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ status: 'ok', queue: { length: 0, running: 0, idle: true } });
  });

  it('queues an upload and imports it into the lookup', async () => {
    const response = await http.post(
      '/api/import',
      csvForm({ lookupName: 'hosts.csv' }, { name: 'hosts.csv', content: 'host,owner\nweb-1,ops\n', type: 'text/csv' })
    );

    expect(response.status).toBe(202);
    expect(response.data).toMatchObject({ success: true, status: 'queued', queuePosition: 0 });
    expect(response.data.statusUrl).toBe(`/api/status/${response.data.jobId}`);

    const job = await waitForJob(response.data.statusUrl);

    expect(job).toMatchObject({
      status: 'completed',
      lookupName: 'hosts.csv',
      originalName: 'hosts.csv',
      result: { lookupName: 'hosts.csv', rowCount: 1, columnCount: 2, backup: null, verifiedRowCount: 1 },
    });
    expect(splunk.lookups.get('hosts.csv')?.rows).toEqual([{ host: 'web-1', owner: 'ops' }]);
    expect(uploads()).toEqual([]);
  });

  it('detects tab separated uploads', async () => {
    const response = await http.post(
      '/api/import',
      csvForm({ lookupName: 'tabs.csv' }, { name: 'export.txt', content: 'a\tb\nx,y\tz\n', type: 'text/plain' })
    );

    await waitForJob(response.data.statusUrl);

    expect(splunk.lookups.get('tabs.csv')?.rows).toEqual([{ a: 'x,y', b: 'z' }]);
  });

  it('reads the source with the delimiter sent in the form', async () => {
    const response = await http.post(
      '/api/import',
      csvForm({ lookupName: 'semi.csv', delimiter: ';' }, { name: 'semi.csv', content: 'a;b\n1;2\n', type: 'text/csv' })
    );

    await waitForJob(response.data.statusUrl);

    expect(splunk.lookups.get('semi.csv')?.rows).toEqual([{ a: '1', b: '2' }]);
  });

  it('treats an empty lookup name as missing', async () => {
    const response = await http.post(
      '/api/import',
      csvForm({ lookupName: '' }, { name: 'hosts.csv', content: 'a\n1\n', type: 'text/csv' })
    );

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ success: false, error: 'lookupName is required' });
    expect(uploads()).toEqual([]);
  });

  it('records the failing stage of an import', async () => {
    const response = await http.post(
      '/api/import',
      csvForm({ lookupName: 'broken.csv' }, { name: 'broken.csv', content: 'a,b\n1\n', type: 'text/csv' })
    );

    const job = await waitForJob(response.data.statusUrl);

    expect(job).toMatchObject({
      status: 'failed',
      error: { stage: 'read', code: 'MALFORMED_ROW', payload: [] },
    });
    expect(splunk.submitted).toEqual([]);
    expect(uploads()).toEqual([]);
  });

  it('requires a lookup name', async () => {
    const response = await http.post(
      '/api/import',
      csvForm({}, { name: 'hosts.csv', content: 'a\n1\n', type: 'text/csv' })
    );

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ success: false, error: 'lookupName is required' });
    expect(uploads()).toEqual([]);
  });

  it('rejects an invalid lookup name', async () => {
    const response = await http.post(
      '/api/import',
      csvForm({ lookupName: 'hosts.json' }, { name: 'hosts.csv', content: 'a\n1\n', type: 'text/csv' })
    );

    expect(response.status).toBe(400);
    expect(response.data.error).toMatch(/^Invalid lookup name "hosts\.json"/);
    expect(uploads()).toEqual([]);
  });

  it('rejects files that are not CSV or text', async () => {
    const response = await http.post(
      '/api/import',
      csvForm({ lookupName: 'hosts.csv' }, { name: 'hosts.json', content: '{}', type: 'application/json' })
    );

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ success: false, error: 'Only CSV and TXT files are allowed' });
  });

  it('rejects a request without a file', async () => {
    const response = await http.post('/api/import', csvForm({ lookupName: 'hosts.csv' }));

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ success: false, error: 'No file uploaded' });
  });

  it('answers 404 for an unknown job', async () => {
    const response = await http.get('/api/status/job-unknown');

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ success: false, error: 'Job not found or expired' });
  });
});

describe('cleanupOldStorageFiles', () => {
  let temp: ReturnType<typeof createTempDir>;

  beforeEach(() => {
    temp = createTempDir();
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('removes only stale upload files', () => {
    const stale = temp.write(`${UPLOAD_FILE_PREFIX}old.csv`, 'a\n');
    temp.write(`${UPLOAD_FILE_PREFIX}new.csv`, 'a\n');
    temp.write('keep.csv', 'a\n');
    const hourAgo = new Date(Date.now() - 3600000);
    fs.utimesSync(stale, hourAgo, hourAgo);

    const removed = cleanupOldStorageFiles(temp.dir, 60000);

    expect(removed).toBe(1);
    expect(fs.readdirSync(temp.dir).sort()).toEqual(['keep.csv', `${UPLOAD_FILE_PREFIX}new.csv`]);
  });

  it('ignores a missing directory', () => {
    expect(cleanupOldStorageFiles(path.join(temp.dir, 'absent'), 0)).toBe(0);
  });
});
