import { eachSeries } from 'async';
import { RemoteError } from '../errors';
import { PublishResult, SearchRow, SearchService } from '../types/splunk';
import { toRemoteError } from './splunkClient';

interface IndexedStatement {
  index: number;
  spl: string;
}

/**
 * Runs SPL statements against Splunk one at a time, in order.
 * Rename must land before write, so nothing here runs concurrently.
 */
export class PublishExecutor {
  constructor(private readonly search: SearchService) {}

  /**
   * Run a single statement to completion and return its result rows
   */
  async query(spl: string): Promise<SearchRow[]> {
    try {
      const handle = await this.search.submit(spl);
      const result = await this.search.awaitJob(handle);
      return result.rows;
    } catch (err) {
      throw toRemoteError(err, 'Search failed');
    }
  }

  /**
   * Run statements in order, stopping at the first failure. No retries:
   * re-running the whole import is the retry.
   */
  async publish(statements: string[]): Promise<PublishResult> {
    const completedJobIds: string[] = [];
    let current = -1;

    console.log(`[Publish] Executing ${statements.length} statement(s)`);

    try {
      await eachSeries(
        statements.map((spl, index): IndexedStatement => ({ index, spl })),
        async ({ index, spl }: IndexedStatement) => {
          current = index;
          const handle = await this.search.submit(spl);
          await this.search.awaitJob(handle);
          completedJobIds.push(handle.sid);
          console.log(`[Publish] Statement ${index + 1}/${statements.length} completed (job ${handle.sid})`);
        }
      );
    } catch (err) {
      const error: RemoteError = toRemoteError(err, `Statement ${current + 1} of ${statements.length} failed`);
      console.error(`[Publish] Statement ${current + 1}/${statements.length} failed: ${error.message}`);
      return { ok: false, failedIndex: current, error, completedJobIds };
    }

    return { ok: true, jobIds: completedJobIds };
  }
}
