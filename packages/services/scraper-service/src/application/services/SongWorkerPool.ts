/**
 * SongWorkerPool
 *
 * Runs one task per song on a single limiter shared by every job, so the
 * number of songs being fetched at once never exceeds `concurrency` no
 * matter how many jobs are queued. Admission is FIFO.
 *
 * The pool writes song artifact fields, job counters and lyrics/audio
 * progress. Job status belongs to the caller, reached through the hooks.
 */

import pLimit from 'p-limit';
import { errorMessage, runWithContext, serializeError } from '@songharvest/platform-core';
import { getLogger } from '../../config/logger';
import type { ScrapeJob } from '../../domains/jobs/ScrapeJob';
import type { ArtifactResult, ScrapedSong } from '../../domains/jobs/ScrapedSong';
import type { PhaseProgress, ScrapePhase } from '../../domains/jobs/PhaseProgress';
import {
  audioFilename,
  buildArtifactPath,
  formatLyricsDocument,
  lyricsFilename,
} from '../../domains/artifacts/artifact-paths';
import type { IBlobStore, IJobEventPublisher, IScrapeJobRepository, ISongFetcher, SongSource } from '../ports';
import type { ProgressTracker } from './ProgressTracker';

const logger = getLogger('scraper-service:worker-pool');

const SONG_PHASES = ['lyrics', 'audio'] as const;

export interface SongFailureSummary {
  songId: string;
  title: string;
  reason: string;
}

export interface JobRunSummary {
  jobId: string;
  userId: string;
  cancelled: boolean;
  processed: number;
  skipped: number;
  failures: SongFailureSummary[];
}

export interface JobRunHooks {
  /** Called once, when the first song of the job starts. */
  onStarted(jobId: string): Promise<void>;
  /** Called once, when no further song of the job will start and none is in flight. */
  onSettled(summary: JobRunSummary): Promise<void>;
}

export interface CancelAcknowledgement {
  accepted: boolean;
  alreadyRequested: boolean;
  /** Every song has been processed and the run is resolving its job. */
  settling: boolean;
  inFlight: number;
}

export interface SongWorkerPoolDeps {
  fetcher: ISongFetcher;
  blobStore: IBlobStore;
  repository: IScrapeJobRepository;
  tracker: ProgressTracker;
  events: IJobEventPublisher;
  concurrency: number;
}

interface JobRun {
  jobId: string;
  userId: string;
  hooks: JobRunHooks;
  total: number;
  remaining: number;
  inFlight: number;
  processed: number;
  started: boolean;
  cancelRequested: boolean;
  settled: boolean;
  /** Set once `onSettled` has returned. */
  finished: boolean;
  failures: SongFailureSummary[];
  progressWrites: Promise<void>;
  done: Promise<void>;
  markDone: () => void;
}

interface SongOutcome {
  lyricsStored: boolean;
  audioStored: boolean;
  errors: string[];
}

export class SongWorkerPool {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly runs = new Map<string, JobRun>();

  constructor(private readonly deps: SongWorkerPoolDeps) {
    this.limit = pLimit(deps.concurrency);
  }

  get concurrency(): number {
    return this.deps.concurrency;
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  isRunning(jobId: string): boolean {
    const run = this.runs.get(jobId);
    return run !== undefined && !run.settled;
  }

  isCancelRequested(jobId: string): boolean {
    return this.runs.get(jobId)?.cancelRequested ?? false;
  }

  /**
   * Queues every song of `job`. Returns immediately.
   */
  dispatch(job: ScrapeJob, songs: ScrapedSong[], hooks: JobRunHooks): void {
    if (this.runs.has(job.jobId)) {
      logger.warn('Job already dispatched, ignoring', { jobId: job.jobId });
      return;
    }

    let markDone: () => void = () => undefined;
    const done = new Promise<void>(resolve => {
      markDone = resolve;
    });

    const run: JobRun = {
      jobId: job.jobId,
      userId: job.userId,
      hooks,
      total: songs.length,
      remaining: songs.length,
      inFlight: 0,
      processed: 0,
      started: false,
      cancelRequested: false,
      settled: false,
      finished: false,
      failures: [],
      progressWrites: Promise.resolve(),
      done,
      markDone,
    };
    this.runs.set(job.jobId, run);

    for (const phase of SONG_PHASES) {
      this.pushProgress(run, this.deps.tracker.begin(job.jobId, phase, songs.length));
    }

    logger.info('Job dispatched to worker pool', {
      jobId: job.jobId,
      songs: songs.length,
      concurrency: this.concurrency,
      pending: this.pendingCount,
    });

    if (songs.length === 0) {
      void this.settle(run);
      return;
    }

    runWithContext({ correlationId: job.jobId, jobId: job.jobId, userId: job.userId }, () => {
      for (const song of songs) {
        void this.limit(() => this.runSongTask(run, song))
          .catch(error => {
            logger.error('Song task crashed', { jobId: run.jobId, songId: song.id, error: serializeError(error) });
          })
          .finally(() => this.afterTask(run));
      }
    });
  }

  /**
   * Flags the job so none of its queued songs start. Songs already in
   * flight finish normally; the run settles once they have.
   */
  requestCancel(jobId: string): CancelAcknowledgement {
    const run = this.runs.get(jobId);
    if (!run) {
      return { accepted: false, alreadyRequested: false, settling: false, inFlight: 0 };
    }
    if (run.cancelRequested) {
      return { accepted: false, alreadyRequested: true, settling: false, inFlight: run.inFlight };
    }
    if (run.settled) {
      return { accepted: false, alreadyRequested: false, settling: true, inFlight: 0 };
    }

    run.cancelRequested = true;
    logger.info('Cancellation requested', { jobId, inFlight: run.inFlight, remaining: run.remaining });

    if (run.inFlight === 0) {
      void this.settle(run);
    }
    return { accepted: true, alreadyRequested: false, settling: false, inFlight: run.inFlight };
  }

  /**
   * Resolves once the job's run has settled and its `onSettled` hook has
   * returned (immediately for unknown jobs).
   */
  whenSettled(jobId: string): Promise<void> {
    return this.runs.get(jobId)?.done ?? Promise.resolve();
  }

  /**
   * Cancels every run that is still processing songs, then waits for every
   * run, including those already resolving their job, to finish.
   */
  async shutdown(): Promise<void> {
    const runs = Array.from(this.runs.values());
    for (const run of runs) {
      this.requestCancel(run.jobId);
    }
    await Promise.all(runs.map(run => run.done));
    logger.info('Worker pool drained', { jobs: runs.length });
  }

  private async runSongTask(run: JobRun, song: ScrapedSong): Promise<void> {
    if (run.cancelRequested) {
      logger.debug('Skipping song of cancelled job', { jobId: run.jobId, songId: song.id });
      return;
    }

    run.inFlight++;
    try {
      if (!run.started) {
        run.started = true;
        await this.callHook(run, 'onStarted', () => run.hooks.onStarted(run.jobId));
      }
      const outcome = await this.processSong(run, song);
      await this.deps.repository.incrementCounters(run.jobId, {
        completed: outcome.lyricsStored || outcome.audioStored ? 1 : 0,
        failed: outcome.lyricsStored || outcome.audioStored ? 0 : 1,
        lyrics: outcome.lyricsStored ? 1 : 0,
        audio: outcome.audioStored ? 1 : 0,
      });
      if (!outcome.lyricsStored && !outcome.audioStored) {
        run.failures.push({ songId: song.id, title: song.title, reason: outcome.errors.join('; ') });
      }
      run.processed++;
    } finally {
      run.inFlight--;
    }
  }

  private async processSong(run: JobRun, song: ScrapedSong): Promise<SongOutcome> {
    const source: SongSource = { title: song.title, artist: song.artist, sourceUrl: song.sourceUrl };
    const errors: string[] = [];

    const lyrics = await this.storeArtifact(song, 'lyrics', async () => {
      const text = await this.deps.fetcher.fetchLyrics(source);
      const path = buildArtifactPath(run.jobId, 'lyrics', lyricsFilename(song.position, song.title));
      const data = Buffer.from(formatLyricsDocument(song, text), 'utf8');
      await this.deps.blobStore.put(path, data, 'text/plain; charset=utf-8');
      return { path, filename: path.slice(path.lastIndexOf('/') + 1), sizeBytes: data.length };
    });
    if (!lyrics.stored) errors.push(`lyrics: ${lyrics.error}`);
    this.recordProgress(run, 'lyrics', song, lyrics);

    const audio = await this.storeArtifact(song, 'audio', async () => {
      const payload = await this.deps.fetcher.fetchAudio(source);
      const filename = audioFilename(song.position, song.title, payload.extension);
      const path = buildArtifactPath(run.jobId, 'audio', filename);
      await this.deps.blobStore.put(path, payload.data, payload.contentType);
      return { path, filename, sizeBytes: payload.data.length };
    });
    if (!audio.stored) errors.push(`audio: ${audio.error}`);
    this.recordProgress(run, 'audio', song, audio);

    logger.debug('Song processed', {
      jobId: run.jobId,
      songId: song.id,
      hasLyrics: lyrics.stored,
      hasAudio: audio.stored,
    });

    return { lyricsStored: lyrics.stored, audioStored: audio.stored, errors };
  }

  /**
   * Fetches and stores one artifact, then writes the result to the song.
   * Any failure on the way becomes a failed result.
   */
  private async storeArtifact(
    song: ScrapedSong,
    kind: 'lyrics' | 'audio',
    produce: () => Promise<{ path: string; filename: string; sizeBytes: number }>
  ): Promise<ArtifactResult> {
    let result: ArtifactResult;
    try {
      result = { stored: true, ...(await produce()) };
    } catch (error) {
      result = { stored: false, error: errorMessage(error) };
      logger.warn(`Could not obtain ${kind}`, { songId: song.id, sourceUrl: song.sourceUrl, error: result.error });
    }

    try {
      await this.deps.repository.recordArtifactResult(song.id, kind, result);
    } catch (error) {
      logger.error(`Failed to record ${kind} result`, { songId: song.id, error: serializeError(error) });
      if (result.stored) {
        result = { stored: false, error: `could not record ${kind}: ${errorMessage(error)}` };
      }
    }
    return result;
  }

  private recordProgress(run: JobRun, phase: ScrapePhase, song: ScrapedSong, result: ArtifactResult): void {
    const snapshot = this.deps.tracker.record(run.jobId, phase, {
      item: song.title,
      succeeded: result.stored,
      error: result.stored ? undefined : `${song.title}: ${result.error}`,
    });
    if (snapshot) this.pushProgress(run, snapshot);
  }

  /** Publishes now; persists in order behind earlier writes of the same job. */
  private pushProgress(run: JobRun, snapshot: PhaseProgress): void {
    this.deps.events.publish('job.progress', snapshot);
    run.progressWrites = run.progressWrites
      .then(() => this.deps.repository.upsertProgress(snapshot))
      .catch(error => {
        logger.error('Failed to persist progress', {
          jobId: run.jobId,
          phase: snapshot.phase,
          error: serializeError(error),
        });
      });
  }

  private afterTask(run: JobRun): void {
    run.remaining--;
    if (run.inFlight === 0 && (run.remaining === 0 || run.cancelRequested)) {
      void this.settle(run);
    }
    if (run.remaining === 0 && run.finished) {
      this.runs.delete(run.jobId);
    }
  }

  private finalizeSongPhases(run: JobRun): void {
    for (const phase of SONG_PHASES) {
      const progress = this.deps.tracker.get(run.jobId, phase);
      if (!progress) continue;

      let snapshot: PhaseProgress | null;
      if (progress.current < progress.total) {
        snapshot = this.deps.tracker.finalize(run.jobId, phase, 'failed', 'Cancelled before every song was processed');
      } else if (progress.total > 0 && progress.succeeded === 0) {
        snapshot = this.deps.tracker.finalize(run.jobId, phase, 'failed', `No ${phase} could be fetched`);
      } else {
        snapshot = this.deps.tracker.finalize(run.jobId, phase, 'completed');
      }
      if (snapshot) this.pushProgress(run, snapshot);
    }
  }

  private async settle(run: JobRun): Promise<void> {
    if (run.settled) return;
    run.settled = true;

    this.finalizeSongPhases(run);
    await run.progressWrites;

    const summary: JobRunSummary = {
      jobId: run.jobId,
      userId: run.userId,
      cancelled: run.cancelRequested,
      processed: run.processed,
      skipped: run.total - run.processed,
      failures: run.failures,
    };

    logger.info('Job run settled', {
      jobId: run.jobId,
      cancelled: summary.cancelled,
      processed: summary.processed,
      failed: summary.failures.length,
    });

    try {
      await this.callHook(run, 'onSettled', () => run.hooks.onSettled(summary));
    } finally {
      run.finished = true;
      if (run.remaining === 0) {
        this.runs.delete(run.jobId);
      }
      run.markDone();
    }
  }

  private async callHook(run: JobRun, name: keyof JobRunHooks, hook: () => Promise<void>): Promise<void> {
    try {
      await hook();
    } catch (error) {
      logger.error(`Job run hook ${name} failed`, { jobId: run.jobId, error: serializeError(error) });
    }
  }
}
