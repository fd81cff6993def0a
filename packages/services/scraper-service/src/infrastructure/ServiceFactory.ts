/**
 * Service Factory
 *
 * Builds the engine from its adapters. main.ts passes the PostgreSQL,
 * filesystem and HTTP adapters; tests pass in-memory ones.
 */

import type { ScraperConfig } from '../config/service-config';
import type {
  IBlobStore,
  ICleanupLogRepository,
  IJobEventPublisher,
  IScrapeJobRepository,
  ISessionRepository,
  ISongFetcher,
} from '../application/ports';
import { ProgressTracker, type Clock } from '../application/services/ProgressTracker';
import { SongWorkerPool } from '../application/services/SongWorkerPool';
import { BundleArchiver } from '../application/services/BundleArchiver';
import { ScrapeJobManager } from '../application/services/ScrapeJobManager';
import { SongListParser } from '../application/services/SongListParser';
import { SongListSessionService } from '../application/services/SongListSessionService';
import { StorageLifecycleSweeper } from '../application/services/StorageLifecycleSweeper';
import { StorageSweepScheduler } from '../application/schedulers/StorageSweepScheduler';

export interface ScraperAdapters {
  jobRepository: IScrapeJobRepository;
  sessionRepository: ISessionRepository;
  cleanupLog: ICleanupLogRepository;
  blobStore: IBlobStore;
  fetcher: ISongFetcher;
  events: IJobEventPublisher;
  clock?: Clock;
}

export interface ScraperServices {
  tracker: ProgressTracker;
  pool: SongWorkerPool;
  jobs: ScrapeJobManager;
  parser: SongListParser;
  sessions: SongListSessionService;
  sweeper: StorageLifecycleSweeper;
  sweepScheduler: StorageSweepScheduler;
}

export function createScraperServices(
  config: Pick<ScraperConfig, 'jobs' | 'storage'>,
  adapters: ScraperAdapters
): ScraperServices {
  const tracker = new ProgressTracker(adapters.clock);

  const pool = new SongWorkerPool({
    fetcher: adapters.fetcher,
    blobStore: adapters.blobStore,
    repository: adapters.jobRepository,
    tracker,
    events: adapters.events,
    concurrency: config.jobs.maxConcurrentWorkers,
  });

  const jobs = new ScrapeJobManager({
    repository: adapters.jobRepository,
    pool,
    archiver: new BundleArchiver(adapters.blobStore),
    tracker,
    events: adapters.events,
    maxBatchSize: config.jobs.maxBatchSize,
    clock: adapters.clock,
  });

  const parser = new SongListParser();
  const sessions = new SongListSessionService({
    repository: adapters.sessionRepository,
    jobs,
    detectEvent: url => parser.extractEvent(url),
    clock: adapters.clock,
  });

  const sweeper = new StorageLifecycleSweeper({
    blobStore: adapters.blobStore,
    cleanupLog: adapters.cleanupLog,
    jobs: adapters.jobRepository,
    ttlSeconds: config.storage.artifactTtlSeconds,
    clock: adapters.clock,
  });
  const sweepScheduler = new StorageSweepScheduler(sweeper, config.storage.sweepIntervalSeconds);

  return { tracker, pool, jobs, parser, sessions, sweeper, sweepScheduler };
}
