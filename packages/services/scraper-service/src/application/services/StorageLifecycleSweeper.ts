/**
 * StorageLifecycleSweeper
 *
 * Deletes artifact blobs older than the TTL and appends one cleanup record
 * per deleted blob. Whether a blob was already handled is decided by the
 * cleanup log, not by the blob store listing.
 */

import { errorMessage, serializeError } from '@songharvest/platform-core';
import { getLogger } from '../../config/logger';
import { parseArtifactPath } from '../../domains/artifacts/artifact-paths';
import type { BlobEntry, CleanupReason, IBlobStore, ICleanupLogRepository, IScrapeJobRepository } from '../ports';
import type { Clock } from './ProgressTracker';

const logger = getLogger('scraper-service:storage-sweeper');

export interface StorageLifecycleSweeperDeps {
  blobStore: IBlobStore;
  cleanupLog: ICleanupLogRepository;
  jobs: IScrapeJobRepository;
  ttlSeconds: number;
  clock?: Clock;
}

export interface SweepError {
  path: string;
  error: string;
}

export interface SweepResult {
  scanned: number;
  expired: number;
  deleted: number;
  skipped: number;
  failed: number;
  errors: SweepError[];
}

export class StorageLifecycleSweeper {
  private readonly clock: Clock;

  constructor(private readonly deps: StorageLifecycleSweeperDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  get ttlSeconds(): number {
    return this.deps.ttlSeconds;
  }

  isExpired(entry: BlobEntry, now: Date): boolean {
    return now.getTime() - entry.createdAt.getTime() > this.deps.ttlSeconds * 1000;
  }

  async sweep(now: Date = this.clock()): Promise<SweepResult> {
    const entries = await this.deps.blobStore.list();
    const expired = entries.filter(entry => this.isExpired(entry, now));
    const result = await this.removeAll(expired, 'auto_delete', now);
    result.scanned = entries.length;

    if (result.deleted > 0 || result.failed > 0) {
      logger.info('Storage sweep finished', { ...result, errors: result.errors.length, ttlSeconds: this.deps.ttlSeconds });
    } else {
      logger.debug('Storage sweep found nothing to delete', { scanned: result.scanned, skipped: result.skipped });
    }
    return result;
  }

  /** Deletes every blob of one job regardless of age. */
  async sweepJob(jobId: string, reason: CleanupReason = 'manual'): Promise<SweepResult> {
    const now = this.clock();
    const entries = await this.deps.blobStore.list(`${jobId}/`);
    const result = await this.removeAll(entries, reason, now);
    result.scanned = entries.length;
    logger.info('Job artifacts swept', { jobId, reason, deleted: result.deleted, failed: result.failed });
    return result;
  }

  private async removeAll(entries: BlobEntry[], reason: CleanupReason, now: Date): Promise<SweepResult> {
    const result: SweepResult = { scanned: 0, expired: entries.length, deleted: 0, skipped: 0, failed: 0, errors: [] };
    if (entries.length === 0) {
      return result;
    }

    const logged = await this.deps.cleanupLog.findLoggedPaths(entries.map(entry => entry.path));

    for (const entry of entries) {
      if (logged.has(entry.path)) {
        result.skipped++;
        continue;
      }
      try {
        const recorded = await this.remove(entry, reason, now);
        if (recorded) {
          result.deleted++;
        } else {
          result.skipped++;
        }
      } catch (error) {
        result.failed++;
        result.errors.push({ path: entry.path, error: errorMessage(error) });
        logger.warn('Could not delete expired blob', { path: entry.path, error: serializeError(error) });
      }
    }
    return result;
  }

  private async remove(entry: BlobEntry, reason: CleanupReason, now: Date): Promise<boolean> {
    await this.deps.blobStore.delete(entry.path);

    const parsed = parseArtifactPath(entry.path);
    const record = await this.deps.cleanupLog.append({
      blobPath: entry.path,
      artifactType: parsed?.type ?? 'unknown',
      sizeBytes: entry.sizeBytes,
      jobId: parsed?.jobId ?? null,
      reason,
      deletedAt: now,
    });

    const cleared = await this.deps.jobs.clearArtifactReference(entry.path);
    logger.debug('Blob deleted', { path: entry.path, reason, songsUpdated: cleared });
    return record !== null;
  }
}
