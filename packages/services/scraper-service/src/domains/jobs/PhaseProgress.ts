/**
 * Per-phase progress of a job. Every function returns a new record or
 * `null` when the update does not apply; records are never mutated.
 */

export const SCRAPE_PHASES = ['lyrics', 'audio', 'archiving'] as const;
export type ScrapePhase = (typeof SCRAPE_PHASES)[number];

export type PhaseStatus = 'running' | 'completed' | 'failed';

export interface PhaseProgress {
  jobId: string;
  phase: ScrapePhase;
  current: number;
  total: number;
  succeeded: number;
  failed: number;
  status: PhaseStatus;
  percentage: number;
  currentItem: string | null;
  errorDetail: string | null;
  updatedAt: Date;
}

export interface PhaseOutcome {
  item: string;
  succeeded: boolean;
  error?: string;
}

export function computePercentage(current: number, total: number): number {
  if (total <= 0) return 0;
  return Math.min(100, Math.max(0, (100 * current) / total));
}

export function startPhase(jobId: string, phase: ScrapePhase, total: number, now: Date): PhaseProgress {
  const safeTotal = Math.max(0, Math.floor(total));
  return {
    jobId,
    phase,
    current: 0,
    total: safeTotal,
    succeeded: 0,
    failed: 0,
    status: 'running',
    percentage: 0,
    currentItem: null,
    errorDetail: null,
    updatedAt: now,
  };
}

export function isFinished(progress: PhaseProgress): boolean {
  return progress.status !== 'running';
}

/**
 * Advances the phase by one finished item. A finished phase, or one
 * already at its total, ignores the update.
 */
export function recordOutcome(progress: PhaseProgress, outcome: PhaseOutcome, now: Date): PhaseProgress | null {
  if (isFinished(progress) || progress.current >= progress.total) {
    return null;
  }

  const current = progress.current + 1;
  return {
    ...progress,
    current,
    succeeded: progress.succeeded + (outcome.succeeded ? 1 : 0),
    failed: progress.failed + (outcome.succeeded ? 0 : 1),
    percentage: computePercentage(current, progress.total),
    currentItem: outcome.item,
    errorDetail: outcome.succeeded ? progress.errorDetail : (outcome.error ?? progress.errorDetail),
    updatedAt: now,
  };
}

export function finalizePhase(
  progress: PhaseProgress,
  status: Exclude<PhaseStatus, 'running'>,
  now: Date,
  errorDetail?: string
): PhaseProgress | null {
  if (isFinished(progress)) {
    return null;
  }

  return {
    ...progress,
    status,
    // an empty phase has nothing left to do
    percentage: progress.total === 0 && status === 'completed' ? 100 : progress.percentage,
    errorDetail: errorDetail ?? (status === 'failed' ? progress.errorDetail : null),
    updatedAt: now,
  };
}
