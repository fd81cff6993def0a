import type { JobStatus } from '../../domains/jobs/ScrapeJob';
import type { PhaseProgress } from '../../domains/jobs/PhaseProgress';

export interface JobEventMap {
  'job.created': { jobId: string; userId: string; totalSongs: number };
  'job.status': { jobId: string; userId: string; from: JobStatus; to: JobStatus };
  'job.progress': PhaseProgress;
  'job.completed': {
    jobId: string;
    userId: string;
    downloadUrl: string;
    totalSongs: number;
    completedSongs: number;
    failedSongs: number;
  };
  'job.failed': { jobId: string; userId: string; error: string };
  'job.cancelled': { jobId: string; userId: string; completedSongs: number; failedSongs: number };
}

export type JobEventName = keyof JobEventMap;

export type JobEventListener<K extends JobEventName> = (payload: JobEventMap[K]) => void | Promise<void>;

export interface IJobEventPublisher {
  publish<K extends JobEventName>(event: K, payload: JobEventMap[K]): void;
  /** Returns an unsubscribe function. */
  subscribe<K extends JobEventName>(event: K, listener: JobEventListener<K>): () => void;
}
