/**
 * SongListSessionService
 *
 * Persists the interactive song-list builder of each user and turns a
 * confirmed queue into a scrape job.
 */

import { getLogger } from '../../config/logger';
import {
  DEFAULT_SESSION_TYPE,
  beginSession,
  cancelSession,
  clearQueue,
  confirmDraft,
  emptySession,
  requestEvent,
  submitField,
  type EventDetector,
  type QueuedSong,
  type SongListSession,
} from '../../domains/sessions/SongListSession';
import type { SongSubmission } from '../../domains/jobs/ScrapedSong';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import type { ISessionRepository } from '../ports';
import type { Clock } from './ProgressTracker';
import type { SubmitResult } from './ScrapeJobManager';

const logger = getLogger('scraper-service:sessions');

export interface JobSubmitter {
  submit(userId: string, songs: readonly SongSubmission[]): Promise<SubmitResult>;
}

export interface SongListSessionServiceDeps {
  repository: ISessionRepository;
  jobs: JobSubmitter;
  detectEvent: EventDetector;
  clock?: Clock;
}

export class SongListSessionService {
  private readonly clock: Clock;

  constructor(private readonly deps: SongListSessionServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async start(userId: string, sessionType: string = DEFAULT_SESSION_TYPE): Promise<SongListSession> {
    const existing =
      (await this.deps.repository.find(userId, sessionType)) ?? emptySession(userId, sessionType, this.clock());
    const started = beginSession(existing, this.clock());

    const activated = await this.deps.repository.activate(started);
    if (!activated) {
      throw new ConflictError(`User ${userId} already has an active ${sessionType} session`);
    }
    logger.debug('Session started', { userId, sessionType, queued: activated.queue.length });
    return activated;
  }

  async submitField(userId: string, value: string, sessionType: string = DEFAULT_SESSION_TYPE): Promise<SongListSession> {
    const session = await this.load(userId, sessionType);
    return this.deps.repository.save(submitField(session, value, this.deps.detectEvent, this.clock()));
  }

  async requestEvent(userId: string, sessionType: string = DEFAULT_SESSION_TYPE): Promise<SongListSession> {
    const session = await this.load(userId, sessionType);
    return this.deps.repository.save(requestEvent(session, this.clock()));
  }

  async confirm(userId: string, sessionType: string = DEFAULT_SESSION_TYPE): Promise<SongListSession> {
    const session = await this.load(userId, sessionType);
    const confirmed = await this.deps.repository.save(confirmDraft(session, this.clock()));
    logger.debug('Song confirmed', { userId, sessionType, queued: confirmed.queue.length });
    return confirmed;
  }

  async cancel(userId: string, sessionType: string = DEFAULT_SESSION_TYPE): Promise<SongListSession> {
    const session = await this.deps.repository.find(userId, sessionType);
    if (!session) {
      throw new ConflictError(`No active session to cancel for user ${userId}`);
    }
    return this.deps.repository.save(cancelSession(session, this.clock()));
  }

  async queue(userId: string, sessionType: string = DEFAULT_SESSION_TYPE): Promise<QueuedSong[]> {
    const session = await this.deps.repository.find(userId, sessionType);
    return session ? session.queue.map(song => ({ ...song })) : [];
  }

  async clear(userId: string, sessionType: string = DEFAULT_SESSION_TYPE): Promise<SongListSession> {
    const session = await this.load(userId, sessionType);
    return this.deps.repository.save(clearQueue(session, this.clock()));
  }

  /**
   * Submits the confirmed queue as one job and empties it. The queue is
   * kept when the submission is rejected.
   */
  async submitQueue(userId: string, sessionType: string = DEFAULT_SESSION_TYPE): Promise<SubmitResult> {
    const session = await this.load(userId, sessionType);
    if (session.queue.length === 0) {
      throw new ValidationError('The song queue is empty');
    }

    const result = await this.deps.jobs.submit(userId, session.queue);
    await this.deps.repository.save(clearQueue(session, this.clock()));
    logger.info('Queued songs submitted', { userId, jobId: result.jobId, totalSongs: result.totalSongs });
    return result;
  }

  private async load(userId: string, sessionType: string): Promise<SongListSession> {
    const session = await this.deps.repository.find(userId, sessionType);
    if (!session) {
      throw new NotFoundError('Session', `${userId}/${sessionType}`);
    }
    return session;
  }
}
