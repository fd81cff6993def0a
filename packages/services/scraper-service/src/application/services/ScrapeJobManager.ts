/**
 * ScrapeJobManager
 *
 * Owns the scrape job lifecycle: validates submissions, persists the job and
 * its songs, hands them to the worker pool and resolves the terminal state
 * once the pool settles (archiving the artifacts on the way to `completed`).
 * Every status change goes through here.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { errorMessage, formatZodIssues, runWithContext, serializeError } from '@songharvest/platform-core';
import { getLogger } from '../../config/logger';
import {
  generateJobId,
  isTerminalStatus,
  canTransition,
  type JobStatus,
  type JobTransitionPatch,
  type ScrapeJob,
} from '../../domains/jobs/ScrapeJob';
import type { NewScrapedSong, SongSubmission } from '../../domains/jobs/ScrapedSong';
import { SCRAPE_PHASES, type PhaseProgress, type PhaseStatus, type ScrapePhase } from '../../domains/jobs/PhaseProgress';
import { isHttpUrl } from '../../domains/sessions/SongListSession';
import { ConflictError, InvalidStateError, NotFoundError, ValidationError } from '../errors';
import type { IJobEventPublisher, IScrapeJobRepository } from '../ports';
import type { ProgressTracker, Clock } from './ProgressTracker';
import type { JobRunSummary, SongWorkerPool } from './SongWorkerPool';
import { songsWithArtifacts, type BundleArchiver } from './BundleArchiver';

const logger = getLogger('scraper-service:job-manager');

const MAX_LISTED_FAILURES = 5;

const UserIdSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9._-]{1,64}$/, 'userId must be 1-64 letters, digits, dots, dashes or underscores');

const SongSubmissionSchema = z.object({
  title: z.string().trim().min(1, 'title is required'),
  artist: z.string().trim().min(1, 'artist is required'),
  url: z.string().trim().refine(isHttpUrl, 'url must be an http(s) URL'),
  event: z
    .string()
    .trim()
    .nullish()
    .transform(value => (value ? value : null)),
});

export type ValidatedSong = z.infer<typeof SongSubmissionSchema>;

export interface ScrapeJobManagerDeps {
  repository: IScrapeJobRepository;
  pool: SongWorkerPool;
  archiver: BundleArchiver;
  tracker: ProgressTracker;
  events: IJobEventPublisher;
  maxBatchSize: number;
  clock?: Clock;
  idSuffix?: () => string;
}

export interface SubmitResult {
  jobId: string;
  totalSongs: number;
}

export interface JobStatusView {
  job: ScrapeJob;
  progress: PhaseProgress[];
}

export interface PublicPhaseStatus {
  phase: ScrapePhase;
  status: PhaseStatus;
  percentage: number;
  current: number;
  total: number;
  currentItem: string | null;
}

export interface PublicJobStatus {
  jobId: string;
  userId: string;
  state: JobStatus;
  totalSongs: number;
  completedSongs: number;
  failedSongs: number;
  lyricsCompleted: number;
  audioCompleted: number;
  phases: PublicPhaseStatus[];
  downloadUrl: string | null;
  error: string | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export interface CancelResult {
  jobId: string;
  inFlight: number;
}

export function aggregateFailureMessage(total: number, failures: JobRunSummary['failures']): string {
  if (failures.length === 0) {
    return `All ${total} songs failed`;
  }
  const listed = failures.slice(0, MAX_LISTED_FAILURES).map(f => `${f.title}: ${f.reason}`);
  const more = failures.length > MAX_LISTED_FAILURES ? ` (+${failures.length - MAX_LISTED_FAILURES} more)` : '';
  return `All ${total} songs failed: ${listed.join('; ')}${more}`;
}

export class ScrapeJobManager {
  private readonly clock: Clock;
  private readonly idSuffix: () => string;
  private readonly jobLocks = new Map<string, Promise<unknown>>();

  constructor(private readonly deps: ScrapeJobManagerDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.idSuffix = deps.idSuffix ?? (() => uuidv4().replace(/-/g, '').slice(0, 8));
  }

  validate(userId: string, songs: readonly SongSubmission[]): { userId: string; songs: ValidatedSong[] } {
    const user = UserIdSchema.safeParse(userId);
    if (!user.success) {
      throw new ValidationError(user.error.errors[0]?.message ?? 'Invalid userId', { field: 'userId' });
    }
    if (songs.length === 0) {
      throw new ValidationError('At least one song is required');
    }
    if (songs.length > this.deps.maxBatchSize) {
      throw new ValidationError(`A job may contain at most ${this.deps.maxBatchSize} songs, got ${songs.length}`);
    }

    const parsed = z.array(SongSubmissionSchema).safeParse(songs);
    if (!parsed.success) {
      throw new ValidationError('Invalid song list', { errors: formatZodIssues(parsed.error) });
    }

    const seen = new Set<string>();
    for (const song of parsed.data) {
      if (seen.has(song.url)) {
        throw new ValidationError(`Duplicate song URL in batch: ${song.url}`, { field: 'url' });
      }
      seen.add(song.url);
    }

    return { userId: user.data, songs: parsed.data };
  }

  /**
   * Persists a queued job and hands it to the worker pool. Returns as soon
   * as the job is stored.
   */
  async submit(userId: string, songs: readonly SongSubmission[]): Promise<SubmitResult> {
    const valid = this.validate(userId, songs);
    const jobId = generateJobId(valid.userId, this.clock(), this.idSuffix());

    const newSongs: NewScrapedSong[] = valid.songs.map((song, index) => ({
      jobId,
      position: index + 1,
      title: song.title,
      artist: song.artist,
      sourceUrl: song.url,
      eventName: song.event,
    }));

    const created = await this.deps.repository.createJob(
      { jobId, userId: valid.userId, totalSongs: newSongs.length },
      newSongs
    );

    logger.info('Scrape job created', { jobId, userId: valid.userId, totalSongs: newSongs.length });
    this.deps.events.publish('job.created', { jobId, userId: valid.userId, totalSongs: newSongs.length });

    runWithContext({ correlationId: jobId, jobId, userId: valid.userId }, () => {
      this.deps.pool.dispatch(created.job, created.songs, {
        onStarted: async id => {
          await this.transition(id, 'running');
        },
        onSettled: summary => this.resolve(summary),
      });
    });

    return { jobId, totalSongs: newSongs.length };
  }

  async status(jobId: string): Promise<JobStatusView> {
    const job = await this.deps.repository.findJob(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    const progress = await this.deps.repository.findProgress(jobId);
    progress.sort((a, b) => SCRAPE_PHASES.indexOf(a.phase) - SCRAPE_PHASES.indexOf(b.phase));
    return { job, progress };
  }

  async publicStatus(jobId: string): Promise<PublicJobStatus> {
    const { job, progress } = await this.status(jobId);
    return {
      jobId: job.jobId,
      userId: job.userId,
      state: job.status,
      totalSongs: job.totalSongs,
      completedSongs: job.completedSongs,
      failedSongs: job.failedSongs,
      lyricsCompleted: job.lyricsCompleted,
      audioCompleted: job.audioCompleted,
      phases: progress.map(p => ({
        phase: p.phase,
        status: p.status,
        percentage: p.percentage,
        current: p.current,
        total: p.total,
        currentItem: p.currentItem,
      })),
      downloadUrl: job.status === 'completed' ? job.bundleUri : null,
      error: job.status === 'failed' ? job.errorMessage : null,
      createdAt: job.createdAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
      completedAt: job.completedAt ? job.completedAt.toISOString() : null,
    };
  }

  listForUser(userId: string): Promise<ScrapeJob[]> {
    return this.deps.repository.findJobsByUser(userId);
  }

  /**
   * Stops the job's remaining songs from starting. The job becomes
   * `cancelled` once no song of it is in flight.
   */
  async cancel(jobId: string): Promise<CancelResult> {
    const job = await this.deps.repository.findJob(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    if (isTerminalStatus(job.status)) {
      throw new InvalidStateError(`Job ${jobId} is already ${job.status}`, { jobId, status: job.status });
    }
    if (job.status === 'archiving') {
      throw new InvalidStateError(`Job ${jobId} is archiving and can no longer be cancelled`, { jobId });
    }

    const ack = this.deps.pool.requestCancel(jobId);
    if (ack.alreadyRequested) {
      throw new ConflictError(`Cancellation already requested for job ${jobId}`);
    }
    if (ack.settling) {
      throw new InvalidStateError(`Job ${jobId} has processed every song and is finishing`, { jobId });
    }

    if (!ack.accepted) {
      // no live run in this process, nothing to wait for
      await this.finishCancelled(jobId);
    }

    logger.info('Job cancellation accepted', { jobId, inFlight: ack.inFlight });
    return { jobId, inFlight: ack.inFlight };
  }

  private async resolve(summary: JobRunSummary): Promise<void> {
    const { jobId } = summary;
    try {
      if (summary.cancelled) {
        await this.finishCancelled(jobId);
        return;
      }

      const job = await this.deps.repository.findJob(jobId);
      if (!job) {
        logger.error('Settled job no longer exists', { jobId });
        return;
      }

      if (job.totalSongs > 0 && job.failedSongs >= job.totalSongs) {
        await this.fail(jobId, aggregateFailureMessage(job.totalSongs, summary.failures));
        return;
      }

      await this.archive(job);
    } catch (error) {
      logger.error('Failed to resolve job', { jobId, error: serializeError(error) });
      await this.fail(jobId, `Internal error while finishing job: ${errorMessage(error)}`).catch(failError => {
        logger.error('Failed to mark job as failed', { jobId, error: serializeError(failError) });
      });
    } finally {
      this.deps.tracker.release(jobId);
    }
  }

  private async archive(job: ScrapeJob): Promise<void> {
    const { jobId } = job;

    if (job.status === 'queued') {
      await this.transition(jobId, 'running');
    }
    const archiving = await this.transition(jobId, 'archiving');
    if (!archiving) {
      return;
    }

    const songs = await this.deps.repository.findSongs(jobId);
    let writes: Promise<void> = Promise.resolve();
    const push = (snapshot: PhaseProgress | null) => {
      if (!snapshot) return;
      this.deps.events.publish('job.progress', snapshot);
      writes = writes.then(() => this.deps.repository.upsertProgress(snapshot));
    };

    push(this.deps.tracker.begin(jobId, 'archiving', songsWithArtifacts(songs).length));

    try {
      const bundle = await this.deps.archiver.archive(jobId, songs, song => {
        push(this.deps.tracker.record(jobId, 'archiving', { item: song.title, succeeded: true }));
      });
      push(this.deps.tracker.finalize(jobId, 'archiving', 'completed'));
      await writes;

      const completed = await this.transition(jobId, 'completed', {
        bundlePath: bundle.path,
        bundleUri: bundle.uri,
        completedAt: this.clock(),
      });
      if (completed) {
        this.deps.events.publish('job.completed', {
          jobId,
          userId: completed.userId,
          downloadUrl: bundle.uri,
          totalSongs: completed.totalSongs,
          completedSongs: completed.completedSongs,
          failedSongs: completed.failedSongs,
        });
      }
    } catch (error) {
      const message = `Archiving failed: ${errorMessage(error)}`;
      logger.error('Archiving failed', { jobId, error: serializeError(error) });
      push(this.deps.tracker.finalize(jobId, 'archiving', 'failed', message));
      await writes.catch(writeError => {
        logger.error('Failed to persist archiving progress', { jobId, error: serializeError(writeError) });
      });
      await this.fail(jobId, message);
    }
  }

  private async fail(jobId: string, message: string): Promise<void> {
    const failed = await this.transition(jobId, 'failed', { errorMessage: message, completedAt: this.clock() });
    if (failed) {
      logger.warn('Scrape job failed', { jobId, error: message });
      this.deps.events.publish('job.failed', { jobId, userId: failed.userId, error: message });
    }
  }

  private async finishCancelled(jobId: string): Promise<void> {
    const cancelled = await this.transition(jobId, 'cancelled', { completedAt: this.clock() });
    if (cancelled) {
      logger.info('Scrape job cancelled', {
        jobId,
        completedSongs: cancelled.completedSongs,
        failedSongs: cancelled.failedSongs,
      });
      this.deps.events.publish('job.cancelled', {
        jobId,
        userId: cancelled.userId,
        completedSongs: cancelled.completedSongs,
        failedSongs: cancelled.failedSongs,
      });
    }
  }

  /**
   * Applies one status change if the state machine allows it from the
   * job's current status. Changes to the same job are serialized.
   */
  private transition(jobId: string, to: JobStatus, patch?: JobTransitionPatch): Promise<ScrapeJob | null> {
    return this.withJobLock(jobId, async () => {
      const current = await this.deps.repository.findJob(jobId);
      if (!current) {
        logger.warn('Transition on missing job', { jobId, to });
        return null;
      }
      if (!canTransition(current.status, to)) {
        logger.warn('Ignoring illegal job transition', { jobId, from: current.status, to });
        return null;
      }

      const updated = await this.deps.repository.transitionStatus(jobId, [current.status], to, {
        ...patch,
      });
      if (!updated) {
        logger.warn('Job status changed concurrently, transition dropped', { jobId, from: current.status, to });
        return null;
      }

      logger.debug('Job transitioned', { jobId, from: current.status, to });
      this.deps.events.publish('job.status', { jobId, userId: updated.userId, from: current.status, to });
      return updated;
    });
  }

  private withJobLock<T>(jobId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.jobLocks.get(jobId) ?? Promise.resolve();
    const next = previous.then(fn, fn);
    const tail = next.catch(() => undefined);
    this.jobLocks.set(jobId, tail);
    void tail.then(() => {
      if (this.jobLocks.get(jobId) === tail) {
        this.jobLocks.delete(jobId);
      }
    });
    return next;
  }
}
