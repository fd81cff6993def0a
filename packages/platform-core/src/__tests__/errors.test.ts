import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../logging/logger.js', () => {
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { getLogger: () => logger, createLogger: () => logger };
});

import express from 'express';
import request from 'supertest';
import {
  DomainError,
  DomainErrorCode,
  asyncHandler,
  createDomainServiceError,
  errorHandler,
  errorMessage,
  notFoundHandler,
} from '../error-handling/errors.js';
import { getLogger } from '../logging/logger.js';

const CatalogError = createDomainServiceError('Catalog', DomainErrorCode);

describe('domain errors', () => {
  it('serializes status, code and details', () => {
    const error = new DomainError('Song missing', 404, new Error('row absent'), 'NOT_FOUND', { id: 's1' });

    expect(error.toJSON()).toMatchObject({
      name: 'DomainError',
      message: 'Song missing',
      statusCode: 404,
      code: 'NOT_FOUND',
      details: { id: 's1' },
      cause: 'row absent',
    });
  });

  it('builds service errors with shared factories', () => {
    const notFound = CatalogError.notFound('Song', 's1');
    expect(notFound).toBeInstanceOf(DomainError);
    expect(notFound.name).toBe('CatalogError');
    expect(notFound.message).toBe('Song not found: s1');
    expect(notFound.statusCode).toBe(404);
    expect(notFound.code).toBe(DomainErrorCode.NOT_FOUND);

    expect(CatalogError.validationError('title', 'is required').message).toBe('Validation failed for title: is required');
    expect(CatalogError.conflict('taken').statusCode).toBe(409);
  });

  it('defaults to the internal error code', () => {
    const error = new CatalogError('disk full');
    expect(error.statusCode).toBe(500);
    expect(error.code).toBe(DomainErrorCode.INTERNAL_ERROR);
  });

  it('reads messages from anything thrown', () => {
    expect(errorMessage(new TypeError('bad'))).toBe('bad');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage({ toString: () => 'object' })).toBe('object');
  });
});

describe('errorHandler', () => {
  const logger = getLogger('error-handling:middleware');

  beforeEach(() => {
    vi.clearAllMocks();
  });

  function appThrowing(error: unknown) {
    const app = express();
    app.use(express.json());
    app.get(
      '/boom',
      asyncHandler(async () => {
        throw error;
      })
    );
    app.post('/echo', (req, res) => {
      res.json(req.body);
    });
    app.use(notFoundHandler());
    app.use(errorHandler());
    return app;
  }

  it('answers with the status and code of a domain error', async () => {
    const response = await request(appThrowing(CatalogError.conflict('Song already queued')))
      .get('/boom')
      .set('x-correlation-id', 'corr-1');

    expect(response.status).toBe(409);
    expect(response.body).toEqual({
      success: false,
      error: { code: 'CONFLICT', message: 'Song already queued', correlationId: 'corr-1' },
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'DomainError caught',
      expect.objectContaining({ statusCode: 409, code: 'CONFLICT', correlationId: 'corr-1', method: 'GET', url: '/boom' })
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('logs server-side domain errors at error level', async () => {
    const response = await request(appThrowing(CatalogError.internalError('Index rebuild failed'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body.error).toEqual({ code: 'INTERNAL_ERROR', message: 'Index rebuild failed' });
    expect(logger.error).toHaveBeenCalledWith(
      'DomainError caught',
      expect.objectContaining({ statusCode: 500, code: 'INTERNAL_ERROR' })
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('hides the message of an unexpected error', async () => {
    const response = await request(appThrowing(new Error('db password leaked'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body.error).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal Server Error' });
  });

  it('turns a body parser failure into a validation error', async () => {
    const response = await request(appThrowing(null))
      .post('/echo')
      .set('Content-Type', 'application/json')
      .send('{"broken": ');

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('reports unknown routes', async () => {
    const response = await request(appThrowing(null)).get('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route GET /nowhere not found' });
  });
});
