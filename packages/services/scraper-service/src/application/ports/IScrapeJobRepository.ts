import type { JobCounterDelta, JobStatus, JobTransitionPatch, NewScrapeJob, ScrapeJob } from '../../domains/jobs/ScrapeJob';
import type { ArtifactKind, ArtifactResult, NewScrapedSong, ScrapedSong } from '../../domains/jobs/ScrapedSong';
import type { PhaseProgress } from '../../domains/jobs/PhaseProgress';

export interface CreatedJob {
  job: ScrapeJob;
  songs: ScrapedSong[];
}

export interface IScrapeJobRepository {
  /** Persists the job and its songs atomically. */
  createJob(job: NewScrapeJob, songs: NewScrapedSong[]): Promise<CreatedJob>;
  findJob(jobId: string): Promise<ScrapeJob | null>;
  /** Newest first. */
  findJobsByUser(userId: string): Promise<ScrapeJob[]>;
  /**
   * Moves the job to `to` only if its current status is one of `from`.
   * Returns null when the job is missing or in another status.
   */
  transitionStatus(jobId: string, from: JobStatus[], to: JobStatus, patch?: JobTransitionPatch): Promise<ScrapeJob | null>;
  /** Atomic increments. */
  incrementCounters(jobId: string, delta: JobCounterDelta): Promise<void>;

  /** Ordered by position. */
  findSongs(jobId: string): Promise<ScrapedSong[]>;
  recordArtifactResult(songId: string, kind: ArtifactKind, result: ArtifactResult): Promise<void>;
  /** Clears every song reference to a deleted blob; returns how many songs changed. */
  clearArtifactReference(path: string): Promise<number>;

  upsertProgress(progress: PhaseProgress): Promise<void>;
  findProgress(jobId: string): Promise<PhaseProgress[]>;
}
