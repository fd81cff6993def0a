export { ProgressTracker, type Clock } from './ProgressTracker';
export { SongWorkerPool, type JobRunSummary, type JobRunHooks, type SongWorkerPoolDeps } from './SongWorkerPool';
export { BundleArchiver, type BundleResult } from './BundleArchiver';
export { SongListParser } from './SongListParser';
export {
  ScrapeJobManager,
  aggregateFailureMessage,
  type ScrapeJobManagerDeps,
  type SubmitResult,
  type JobStatusView,
  type PublicJobStatus,
  type CancelResult,
} from './ScrapeJobManager';
export { SongListSessionService, type JobSubmitter } from './SongListSessionService';
export { StorageLifecycleSweeper, type SweepResult } from './StorageLifecycleSweeper';
