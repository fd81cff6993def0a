import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { getLogger } from '../logging/logger.js';

const middlewareLogger = getLogger('error-handling:middleware');

export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  INVALID_STATE = 'INVALID_STATE',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  TIMEOUT = 'TIMEOUT',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(
    message: string,
    statusCode: number,
    code: T,
    cause?: Error,
    serviceName?: string,
    details?: Record<string, unknown>
  ) {
    super(message, statusCode, cause, code, details);
    if (serviceName) this.name = `${serviceName}Error`;
  }
}

/**
 * `domainErrorCodes` is the service's full code table; it is expected to
 * carry the shared codes (INTERNAL_ERROR, NOT_FOUND, ...) next to its own.
 */
export function createDomainServiceError<T extends string>(serviceName: string, domainErrorCodes: Record<string, T>) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error, details?: Record<string, unknown>) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName, details);
    }

    static notFound(resource: string, id?: string) {
      const msg = id ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new ServiceError(`Validation failed for ${field}: ${message}`, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static conflict(message: string) {
      return new ServiceError(message, 409, domainErrorCodes.CONFLICT);
    }

    static internalError(message: string, cause?: Error) {
      return new ServiceError(message, 500, domainErrorCodes.INTERNAL_ERROR, cause);
    }

    static serviceUnavailable(service: string, cause?: Error) {
      return new ServiceError(`Service unavailable: ${service}`, 503, domainErrorCodes.SERVICE_UNAVAILABLE, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

function resolveCorrelationId(req: Request): string | undefined {
  const header = req.headers['x-correlation-id'] ?? req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}

export interface ErrorResponseBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    correlationId?: string;
  };
}

export function sendErrorResponse(
  res: Response,
  statusCode: number,
  message: string,
  options: { code?: string; details?: Record<string, unknown>; correlationId?: string } = {}
): void {
  const body: ErrorResponseBody = {
    success: false,
    error: {
      code: options.code ?? (statusCode >= 500 ? DomainErrorCode.INTERNAL_ERROR : DomainErrorCode.UNKNOWN),
      message,
      ...(options.details && { details: options.details }),
      ...(options.correlationId && { correlationId: options.correlationId }),
    },
  };
  res.status(statusCode).json(body);
}

/** Errors raised by body parsers carry a 4xx `status`. */
function isClientRequestError(error: unknown): error is Error & { status: number } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

export function errorHandler(): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const correlationId = resolveCorrelationId(req);

    if (error instanceof DomainError) {
      const meta = {
        error: error.message,
        statusCode: error.statusCode,
        code: error.code,
        correlationId,
        url: req.url,
        method: req.method,
      };
      if (error.statusCode >= 500) {
        middlewareLogger.error('DomainError caught', meta);
      } else {
        middlewareLogger.warn('DomainError caught', meta);
      }

      sendErrorResponse(res, error.statusCode, error.message, {
        code: error.code,
        details: error.details,
        correlationId,
      });
      return;
    }

    if (isClientRequestError(error)) {
      middlewareLogger.warn('Malformed request', { error: error.message, correlationId, url: req.url });
      sendErrorResponse(res, error.status, error.message, { code: DomainErrorCode.VALIDATION_ERROR, correlationId });
      return;
    }

    middlewareLogger.error('Unhandled error', {
      error: errorMessage(error),
      stack: errorStack(error),
      correlationId,
      url: req.url,
      method: req.method,
    });

    sendErrorResponse(res, 500, 'Internal Server Error', { correlationId });
  };
}

/**
 * Forwards rejections of an async route handler to the error middleware.
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function notFoundHandler(): RequestHandler {
  return (req, _res, next) => {
    next(new DomainError(`Route ${req.method} ${req.path} not found`, 404, undefined, DomainErrorCode.NOT_FOUND));
  };
}
