import { DomainErrorCode, createDomainServiceError } from '@songharvest/platform-core';

const ScraperDomainCodes = {
  JOB_NOT_FOUND: 'JOB_NOT_FOUND',
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
  FETCH_FAILED: 'FETCH_FAILED',
  ARCHIVING_FAILED: 'ARCHIVING_FAILED',
} as const;

export const ScraperErrorCode = { ...DomainErrorCode, ...ScraperDomainCodes } as const;
export type ScraperErrorCodeType = (typeof ScraperErrorCode)[keyof typeof ScraperErrorCode];

const ScraperErrorBase = createDomainServiceError('Scraper', ScraperErrorCode);

export class ScraperError extends ScraperErrorBase {}

/** Malformed input, rejected before any state is touched. */
export class ValidationError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, ScraperErrorCode.VALIDATION_ERROR, undefined, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ScraperError {
  constructor(resource: 'Job' | 'Session' | 'Blob', id: string) {
    const code =
      resource === 'Job'
        ? ScraperErrorCode.JOB_NOT_FOUND
        : resource === 'Session'
          ? ScraperErrorCode.SESSION_NOT_FOUND
          : ScraperErrorCode.NOT_FOUND;
    super(`${resource} not found: ${id}`, 404, code);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ScraperError {
  constructor(message: string) {
    super(message, 409, ScraperErrorCode.CONFLICT);
    this.name = 'ConflictError';
  }
}

export class InvalidStateError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 409, ScraperErrorCode.INVALID_STATE, undefined, details);
    this.name = 'InvalidStateError';
  }
}

/** One artifact of one song could not be fetched. Recovered by the worker pool. */
export class FetchFailure extends ScraperError {
  constructor(
    message: string,
    public readonly sourceUrl: string,
    cause?: Error
  ) {
    super(message, 502, ScraperErrorCode.FETCH_FAILED, cause, { sourceUrl });
    this.name = 'FetchFailure';
  }
}

export class ArchivingFailure extends ScraperError {
  constructor(message: string, cause?: Error) {
    super(message, 500, ScraperErrorCode.ARCHIVING_FAILED, cause);
    this.name = 'ArchivingFailure';
  }
}
