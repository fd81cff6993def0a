/**
 * Response helpers
 *
 * Success envelope shared by service routes. Failures go through
 * `errorHandler()` / `sendErrorResponse()` in error-handling.
 */

import type { Response } from 'express';

export interface SuccessResponseBody<T> {
  success: true;
  data: T;
}

export function sendSuccess<T>(res: Response, data: T, statusCode = 200): void {
  const body: SuccessResponseBody<T> = { success: true, data };
  res.status(statusCode).json(body);
}

export function sendCreated<T>(res: Response, data: T): void {
  sendSuccess(res, data, 201);
}

export function sendAccepted<T>(res: Response, data: T): void {
  sendSuccess(res, data, 202);
}
