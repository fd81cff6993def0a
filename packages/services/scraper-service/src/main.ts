// Load environment variables first
import { config } from 'dotenv';
import { resolve } from 'path';
config({ path: resolve(process.cwd(), '.env'), override: false });

/**
 * Scraper Service
 * Bootstrap and startup logic
 */

import {
  createLogger,
  registerPhasedShutdownHook,
  serializeError,
  setupGracefulShutdown,
  SchedulerRegistry,
} from '@songharvest/platform-core';
import { loadScraperConfig, SERVICE_NAME } from './config/service-config';
import { createScraperDatabase } from './infrastructure/database';
import {
  DrizzleCleanupLogRepository,
  DrizzleScrapeJobRepository,
  DrizzleSessionRepository,
} from './infrastructure/repositories';
import { LocalBlobStore } from './infrastructure/storage';
import { HttpSongFetcher } from './infrastructure/fetcher';
import { JobCleanupSubscriber, JobEventPublisher } from './infrastructure/events';
import { createScraperServices } from './infrastructure/ServiceFactory';
import { createApp } from './presentation/app';

const logger = createLogger(SERVICE_NAME);

async function main(): Promise<void> {
  const settings = loadScraperConfig();
  if (!settings.database.url) {
    throw new Error('DATABASE_URL environment variable is required for scraper-service');
  }

  const database = createScraperDatabase(settings.database.url);
  const db = database.getDatabase();

  const events = new JobEventPublisher();
  const blobStore = new LocalBlobStore(settings.storage.basePath, settings.storage.publicBaseUrl);

  const services = createScraperServices(settings, {
    jobRepository: new DrizzleScrapeJobRepository(db),
    sessionRepository: new DrizzleSessionRepository(db),
    cleanupLog: new DrizzleCleanupLogRepository(db),
    blobStore,
    fetcher: new HttpSongFetcher(settings.fetcher),
    events,
  });

  events.subscribe('job.completed', payload => {
    logger.info('Job bundle ready', { jobId: payload.jobId, userId: payload.userId, downloadUrl: payload.downloadUrl });
  });
  events.subscribe('job.failed', payload => {
    logger.warn('Job failed', { jobId: payload.jobId, userId: payload.userId, error: payload.error });
  });

  const jobCleanup = new JobCleanupSubscriber(events, services.sweeper);
  jobCleanup.start();

  const schedulers = SchedulerRegistry;
  schedulers.register(services.sweepScheduler);
  schedulers.startAll();

  registerPhasedShutdownHook('drain', () => services.pool.shutdown(), 'worker-pool');
  registerPhasedShutdownHook('drain', () => jobCleanup.stop(), 'job-cleanup');

  const app = createApp({
    jobs: services.jobs,
    sessions: services.sessions,
    parser: services.parser,
    blobStore,
    filesPath: new URL(settings.storage.publicBaseUrl).pathname || '/files',
    health: {
      serviceName: SERVICE_NAME,
      version: settings.server.version,
      schedulers,
      pool: services.pool,
      checkDatabase: async () => {
        await database.getSQLConnection().query('SELECT 1');
      },
    },
  });

  const server = app.listen(settings.server.port, settings.server.host, () => {
    logger.info('Scraper service started', {
      port: settings.server.port,
      workers: settings.jobs.maxConcurrentWorkers,
      artifactTtlSeconds: settings.storage.artifactTtlSeconds,
    });
  });

  setupGracefulShutdown(server, settings.shutdownTimeoutMs);
}

main().catch(error => {
  logger.error('Failed to start scraper service', { error: serializeError(error) });
  process.exit(1);
});
