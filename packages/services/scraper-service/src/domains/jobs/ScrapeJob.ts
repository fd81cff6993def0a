/**
 * Scrape job lifecycle
 *
 * queued -> running -> archiving -> completed | failed
 * queued | running -> cancelled
 *
 * A job may skip forward (queued -> failed when dispatch fails, running ->
 * failed when every song failed) but never moves backwards.
 */

export const JOB_STATUSES = ['queued', 'running', 'archiving', 'completed', 'failed', 'cancelled'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['running', 'failed', 'cancelled'],
  running: ['archiving', 'failed', 'cancelled'],
  archiving: ['completed', 'failed'],
  completed: [],
  failed: [],
  cancelled: [],
};

export interface ScrapeJob {
  jobId: string;
  userId: string;
  status: JobStatus;
  totalSongs: number;
  completedSongs: number;
  failedSongs: number;
  lyricsCompleted: number;
  audioCompleted: number;
  bundlePath: string | null;
  bundleUri: string | null;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
}

export type NewScrapeJob = Pick<ScrapeJob, 'jobId' | 'userId' | 'totalSongs'>;

export interface JobCounterDelta {
  completed?: number;
  failed?: number;
  lyrics?: number;
  audio?: number;
}

/** Fields the job manager sets together with a status change. */
export interface JobTransitionPatch {
  bundlePath?: string;
  bundleUri?: string;
  errorMessage?: string;
  completedAt?: Date;
}

export function isTerminalStatus(status: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `{userId}_{YYYYMMDD_HHMMSS}_{suffix}` in UTC. The suffix keeps two
 * submissions from the same user within one second apart.
 */
export function generateJobId(userId: string, now: Date, suffix: string): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${userId}_${date}_${time}_${suffix}`;
}

export function countersWithinTotal(job: Pick<ScrapeJob, 'completedSongs' | 'failedSongs' | 'totalSongs'>): boolean {
  return job.completedSongs >= 0 && job.failedSongs >= 0 && job.completedSongs + job.failedSongs <= job.totalSongs;
}
