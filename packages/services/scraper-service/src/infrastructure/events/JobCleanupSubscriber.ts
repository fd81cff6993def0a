/**
 * Job Cleanup Subscriber
 * Removes the artifacts of jobs that end `failed` or `cancelled`. Such jobs
 * never get a bundle, so their lyrics and audio blobs are not reachable
 * through the public status view.
 */

import { serializeError } from '@songharvest/platform-core';
import type { IJobEventPublisher } from '../../application/ports';
import type { StorageLifecycleSweeper } from '../../application/services/StorageLifecycleSweeper';
import { getLogger } from '../../config/logger';

const logger = getLogger('scraper-service:job-cleanup');

type UnfinishedOutcome = 'failed' | 'cancelled';

export class JobCleanupSubscriber {
  private subscriptions: Array<() => void> = [];
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly events: IJobEventPublisher,
    private readonly sweeper: StorageLifecycleSweeper
  ) {}

  start(): void {
    if (this.subscriptions.length > 0) return;

    this.subscriptions = [
      this.events.subscribe('job.failed', ({ jobId }) => this.track(jobId, 'failed')),
      this.events.subscribe('job.cancelled', ({ jobId }) => this.track(jobId, 'cancelled')),
    ];
    logger.debug('Job cleanup subscriber started');
  }

  /** Stops listening, then waits for cleanups already under way. */
  async stop(): Promise<void> {
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
    await Promise.all(this.pending);
  }

  private track(jobId: string, outcome: UnfinishedOutcome): void {
    const cleanup: Promise<void> = this.cleanUp(jobId, outcome).finally(() => {
      this.pending.delete(cleanup);
    });
    this.pending.add(cleanup);
  }

  private async cleanUp(jobId: string, outcome: UnfinishedOutcome): Promise<void> {
    try {
      const result = await this.sweeper.sweepJob(jobId, 'job_cleanup');
      logger.info('Removed artifacts of unfinished job', {
        jobId,
        outcome,
        deleted: result.deleted,
        failed: result.failed,
      });
    } catch (error) {
      logger.error('Failed to remove artifacts of unfinished job', { jobId, outcome, error: serializeError(error) });
    }
  }
}
