import { describe, it, expect } from 'vitest';
import {
  JOB_STATUSES,
  canTransition,
  countersWithinTotal,
  generateJobId,
  isTerminalStatus,
} from '../../domains/jobs/ScrapeJob';

describe('ScrapeJob state machine', () => {
  it('allows the forward path through archiving', () => {
    expect(canTransition('queued', 'running')).toBe(true);
    expect(canTransition('running', 'archiving')).toBe(true);
    expect(canTransition('archiving', 'completed')).toBe(true);
    expect(canTransition('archiving', 'failed')).toBe(true);
  });

  it('reaches cancelled only from queued or running', () => {
    expect(JOB_STATUSES.filter(from => canTransition(from, 'cancelled'))).toEqual(['queued', 'running']);
    expect(canTransition('archiving', 'cancelled')).toBe(false);
  });

  it('never moves backwards or out of a terminal state', () => {
    expect(canTransition('running', 'queued')).toBe(false);
    expect(canTransition('archiving', 'running')).toBe(false);
    for (const to of JOB_STATUSES) {
      expect(canTransition('completed', to)).toBe(false);
      expect(canTransition('failed', to)).toBe(false);
      expect(canTransition('cancelled', to)).toBe(false);
    }
  });

  it('marks only completed, failed and cancelled as terminal', () => {
    expect(JOB_STATUSES.filter(isTerminalStatus)).toEqual(['completed', 'failed', 'cancelled']);
  });
});

describe('generateJobId', () => {
  it('formats user, UTC timestamp and suffix', () => {
    const id = generateJobId('4242', new Date('2024-03-05T07:08:09Z'), 'a1b2c3d4');
    expect(id).toBe('4242_20240305_070809_a1b2c3d4');
  });
});

describe('countersWithinTotal', () => {
  it('accepts counts up to the total and rejects more', () => {
    expect(countersWithinTotal({ completedSongs: 2, failedSongs: 1, totalSongs: 3 })).toBe(true);
    expect(countersWithinTotal({ completedSongs: 3, failedSongs: 1, totalSongs: 3 })).toBe(false);
  });
});
