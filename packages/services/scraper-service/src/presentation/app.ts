/**
 * Scraper Service - Express App Factory
 */

import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { errorHandler, notFoundHandler } from '@songharvest/platform-core';
import type { ScrapeJobManager } from '../application/services/ScrapeJobManager';
import type { SongListSessionService } from '../application/services/SongListSessionService';
import type { SongListParser } from '../application/services/SongListParser';
import type { IBlobStore } from '../application/ports';
import {
  createFileRoutes,
  createHealthRoutes,
  createJobRoutes,
  createSessionRoutes,
  createSongListRoutes,
  type HealthRouteDeps,
} from './routes';

export interface AppDependencies {
  jobs: ScrapeJobManager;
  sessions: SongListSessionService;
  parser: SongListParser;
  blobStore: IBlobStore;
  health: HealthRouteDeps;
  /** Path the blob store's public URLs point at. */
  filesPath?: string;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use(createHealthRoutes(deps.health));
  app.use('/api', createJobRoutes(deps.jobs));
  app.use('/api', createSongListRoutes(deps.parser));
  app.use('/api', createSessionRoutes(deps.sessions));
  app.use(deps.filesPath ?? '/files', createFileRoutes(deps.blobStore));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
