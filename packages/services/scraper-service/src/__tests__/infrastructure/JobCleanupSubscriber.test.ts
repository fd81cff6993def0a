import { describe, it, expect, beforeEach, vi } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn(),
}));

vi.mock('@songharvest/platform-core', async importOriginal => ({
  ...(await importOriginal<typeof import('@songharvest/platform-core')>()),
  getLogger: () => mockLogger,
  createLogger: () => mockLogger,
}));

import { JobCleanupSubscriber } from '../../infrastructure/events/JobCleanupSubscriber';
import { JobEventPublisher } from '../../infrastructure/events/JobEventPublisher';
import { StorageLifecycleSweeper } from '../../application/services/StorageLifecycleSweeper';
import { InMemoryBlobStore, InMemoryCleanupLog, InMemoryScrapeJobRepository, createClock } from '../helpers/fakes';

const NOW = new Date('2024-03-01T10:00:00Z');

describe('JobCleanupSubscriber', () => {
  let blobs: InMemoryBlobStore;
  let cleanupLog: InMemoryCleanupLog;
  let events: JobEventPublisher;
  let sweeper: StorageLifecycleSweeper;
  let subscriber: JobCleanupSubscriber;

  beforeEach(async () => {
    vi.clearAllMocks();
    const clock = createClock(NOW);
    blobs = new InMemoryBlobStore(clock);
    cleanupLog = new InMemoryCleanupLog();
    events = new JobEventPublisher();
    sweeper = new StorageLifecycleSweeper({
      blobStore: blobs,
      cleanupLog,
      jobs: new InMemoryScrapeJobRepository(clock),
      ttlSeconds: 3600,
      clock,
    });
    subscriber = new JobCleanupSubscriber(events, sweeper);

    await blobs.put('job-1/lyrics/001_A.txt', Buffer.from('words'));
    await blobs.put('job-1/audio/001_A.mp3', Buffer.from('sound'));
    await blobs.put('job-2/lyrics/001_B.txt', Buffer.from('other'));
  });

  it('removes every artifact of a cancelled job', async () => {
    subscriber.start();
    events.publish('job.cancelled', { jobId: 'job-1', userId: 'u1', completedSongs: 1, failedSongs: 0 });
    await subscriber.stop();

    expect(cleanupLog.records).toEqual([
      {
        id: 'cleanup-1',
        blobPath: 'job-1/audio/001_A.mp3',
        artifactType: 'audio',
        sizeBytes: 5,
        jobId: 'job-1',
        reason: 'job_cleanup',
        deletedAt: NOW,
      },
      {
        id: 'cleanup-2',
        blobPath: 'job-1/lyrics/001_A.txt',
        artifactType: 'lyrics',
        sizeBytes: 5,
        jobId: 'job-1',
        reason: 'job_cleanup',
        deletedAt: NOW,
      },
    ]);
    expect(Array.from(blobs.blobs.keys())).toEqual(['job-2/lyrics/001_B.txt']);
  });

  it('removes artifacts of failed jobs and leaves completed ones alone', async () => {
    subscriber.start();
    events.publish('job.completed', {
      jobId: 'job-2',
      userId: 'u1',
      downloadUrl: 'memory://blobs/job-2/bundle/job-2.zip',
      totalSongs: 1,
      completedSongs: 1,
      failedSongs: 0,
    });
    events.publish('job.failed', { jobId: 'job-1', userId: 'u1', error: 'Archiving failed: disk full' });
    await subscriber.stop();

    expect(cleanupLog.records.map(record => record.blobPath)).toEqual(['job-1/audio/001_A.mp3', 'job-1/lyrics/001_A.txt']);
    expect(await blobs.exists('job-2/lyrics/001_B.txt')).toBe(true);
  });

  it('ignores events once stopped', async () => {
    subscriber.start();
    await subscriber.stop();
    events.publish('job.failed', { jobId: 'job-1', userId: 'u1', error: 'All 1 songs failed' });

    expect(cleanupLog.records).toEqual([]);
    expect(blobs.blobs.size).toBe(3);
  });

  it('logs a cleanup that could not run', async () => {
    vi.spyOn(sweeper, 'sweepJob').mockRejectedValue(new Error('listing failed'));
    subscriber.start();
    events.publish('job.cancelled', { jobId: 'job-1', userId: 'u1', completedSongs: 0, failedSongs: 0 });
    await subscriber.stop();

    expect(mockLogger.error).toHaveBeenCalledWith(
      'Failed to remove artifacts of unfinished job',
      expect.objectContaining({ jobId: 'job-1', outcome: 'cancelled' })
    );
    expect(blobs.blobs.size).toBe(3);
  });
});
