/**
 * ProgressTracker
 *
 * In-memory accumulator for the phase progress of running jobs. It holds no
 * I/O; callers persist and publish the snapshots it returns.
 */

import {
  finalizePhase,
  recordOutcome,
  startPhase,
  SCRAPE_PHASES,
  type PhaseOutcome,
  type PhaseProgress,
  type PhaseStatus,
  type ScrapePhase,
} from '../../domains/jobs/PhaseProgress';

export type Clock = () => Date;

function key(jobId: string, phase: ScrapePhase): string {
  return `${jobId}:${phase}`;
}

export class ProgressTracker {
  private readonly phases = new Map<string, PhaseProgress>();

  constructor(private readonly clock: Clock = () => new Date()) {}

  begin(jobId: string, phase: ScrapePhase, total: number): PhaseProgress {
    const progress = startPhase(jobId, phase, total, this.clock());
    this.phases.set(key(jobId, phase), progress);
    return progress;
  }

  /**
   * Returns the new snapshot, or null when the phase is unknown, finished
   * or already at its total.
   */
  record(jobId: string, phase: ScrapePhase, outcome: PhaseOutcome): PhaseProgress | null {
    const current = this.phases.get(key(jobId, phase));
    if (!current) return null;
    const next = recordOutcome(current, outcome, this.clock());
    if (next) this.phases.set(key(jobId, phase), next);
    return next;
  }

  finalize(
    jobId: string,
    phase: ScrapePhase,
    status: Exclude<PhaseStatus, 'running'>,
    errorDetail?: string
  ): PhaseProgress | null {
    const current = this.phases.get(key(jobId, phase));
    if (!current) return null;
    const next = finalizePhase(current, status, this.clock(), errorDetail);
    if (next) this.phases.set(key(jobId, phase), next);
    return next;
  }

  get(jobId: string, phase: ScrapePhase): PhaseProgress | undefined {
    return this.phases.get(key(jobId, phase));
  }

  release(jobId: string): void {
    for (const phase of SCRAPE_PHASES) {
      this.phases.delete(key(jobId, phase));
    }
  }
}
