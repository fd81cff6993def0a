import { describe, it, expect } from 'vitest';
import { DomainError } from '@songharvest/platform-core';
import {
  ArchivingFailure,
  ConflictError,
  FetchFailure,
  InvalidStateError,
  NotFoundError,
  ScraperError,
  ScraperErrorCode,
  ValidationError,
} from '../application/errors';

describe('ScraperError', () => {
  it('defaults to an internal error', () => {
    const error = new ScraperError('Test error');
    expect(error).toBeInstanceOf(DomainError);
    expect(error.statusCode).toBe(500);
    expect(error.code).toBe(ScraperErrorCode.INTERNAL_ERROR);
    expect(error.name).toBe('ScraperError');
  });

  it('maps each resource to its not-found code', () => {
    const job = new NotFoundError('Job', 'u1_20240301_100000_00000001');
    expect(job.message).toBe('Job not found: u1_20240301_100000_00000001');
    expect(job.statusCode).toBe(404);
    expect(job.code).toBe('JOB_NOT_FOUND');
    expect(new NotFoundError('Session', 'u1').code).toBe('SESSION_NOT_FOUND');
    expect(new NotFoundError('Blob', 'a/b').code).toBe('NOT_FOUND');
  });

  it('carries status, code and details for the job taxonomy', () => {
    const validation = new ValidationError('songs must not be empty', { field: 'songs' });
    expect([validation.name, validation.statusCode, validation.code]).toEqual(['ValidationError', 400, 'VALIDATION_ERROR']);
    expect(validation.details).toEqual({ field: 'songs' });

    const conflict = new ConflictError('Cancellation already requested');
    expect([conflict.name, conflict.statusCode, conflict.code]).toEqual(['ConflictError', 409, 'CONFLICT']);

    const invalid = new InvalidStateError('Job j1 is already completed', { jobId: 'j1' });
    expect([invalid.name, invalid.statusCode, invalid.code]).toEqual(['InvalidStateError', 409, 'INVALID_STATE']);
    expect(invalid.details).toEqual({ jobId: 'j1' });
  });

  it('keeps the cause of fetch and archiving failures', () => {
    const cause = new Error('socket hang up');
    const fetch = new FetchFailure('Lyrics request failed', 'https://example.org/song/', cause);
    expect([fetch.name, fetch.statusCode, fetch.code]).toEqual(['FetchFailure', 502, 'FETCH_FAILED']);
    expect(fetch.sourceUrl).toBe('https://example.org/song/');
    expect(fetch.details).toEqual({ sourceUrl: 'https://example.org/song/' });
    expect(fetch.cause).toBe(cause);

    const archiving = new ArchivingFailure('Bundle write failed', cause);
    expect([archiving.name, archiving.statusCode, archiving.code]).toEqual(['ArchivingFailure', 500, 'ARCHIVING_FAILED']);
    expect(archiving.cause).toBe(cause);
  });
});
