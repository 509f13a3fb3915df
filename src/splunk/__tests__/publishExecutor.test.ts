import { describe, it, expect, vi } from 'vitest';
import { PublishExecutor } from '../publishExecutor';
import { RemoteError } from '../../errors';
import { JobHandle, SearchService } from '../../types/splunk';

function stubSearch(failOn?: string): SearchService & { order: string[] } {
  const order: string[] = [];
  let sid = 0;
  return {
    order,
    submit: vi.fn(async (spl: string): Promise<JobHandle> => {
      order.push(`submit ${spl}`);
      sid++;
      return { sid: `job-${sid}`, spl };
    }),
    awaitJob: vi.fn(async (handle: JobHandle) => {
      order.push(`await ${handle.spl}`);
      if (handle.spl === failOn) {
        throw new RemoteError('Lookup write failed', {
          kind: 'search',
          payload: [{ type: 'ERROR', text: 'disk full' }],
        });
      }
      return { sid: handle.sid, rows: [{ spl: handle.spl }] };
    }),
  };
}

describe('PublishExecutor.publish', () => {
  it('waits for each job before dispatching the next one', async () => {
    const search = stubSearch();

    const result = await new PublishExecutor(search).publish(['s1', 's2', 's3']);

    expect(result).toEqual({ ok: true, jobIds: ['job-1', 'job-2', 'job-3'] });
    expect(search.order).toEqual(['submit s1', 'await s1', 'submit s2', 'await s2', 'submit s3', 'await s3']);
  });

  it('stops at the first failure and reports its index', async () => {
    const search = stubSearch('s2');

    const result = await new PublishExecutor(search).publish(['s1', 's2', 's3']);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failedIndex).toBe(1);
    expect(result.completedJobIds).toEqual(['job-1']);
    expect(result.error.payload).toEqual([{ type: 'ERROR', text: 'disk full' }]);
    expect(search.submit).toHaveBeenCalledTimes(2);
  });

  it('wraps a non-remote failure as a network error', async () => {
    const search = stubSearch();
    vi.mocked(search.submit).mockRejectedValueOnce(new Error('socket hang up'));

    const result = await new PublishExecutor(search).publish(['s1']);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failedIndex).toBe(0);
    expect(result.error.kind).toBe('network');
    expect(result.error.message).toBe('Statement 1 of 1 failed: socket hang up');
  });

  it('succeeds trivially with no statements', async () => {
    const search = stubSearch();

    await expect(new PublishExecutor(search).publish([])).resolves.toEqual({ ok: true, jobIds: [] });
    expect(search.submit).not.toHaveBeenCalled();
  });
});

describe('PublishExecutor.query', () => {
  it('returns the rows of the finished job', async () => {
    const rows = await new PublishExecutor(stubSearch()).query('| inputlookup a.csv | stats count');

    expect(rows).toEqual([{ spl: '| inputlookup a.csv | stats count' }]);
  });

  it('rejects with the RemoteError of a failed job', async () => {
    const query = new PublishExecutor(stubSearch('bad')).query('bad');

    await expect(query).rejects.toBeInstanceOf(RemoteError);
    await expect(query).rejects.toMatchObject({ code: 'REMOTE_SEARCH' });
  });
});
