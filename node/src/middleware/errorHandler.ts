import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/services/logger';
import { errorMessage, ValidationError } from '@/stability/errors';
import { createErrorResponse } from '@/utils/errorResponse';
import { correlationIdOf } from './correlation';

function statusOf(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    // body-parser reports malformed JSON and oversized bodies as 4xx
    if (typeof status === 'number' && status >= 400 && status < 500) return status;
  }
  return 500;
}

/** Last middleware: structured JSON, never a stack trace. */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  const status = statusOf(error);
  const correlationId = correlationIdOf(res);
  if (status >= 500) {
    logger.error('http:unhandled_error', { method: req.method, path: req.path, correlationId, error: errorMessage(error) });
    res.status(status).json(createErrorResponse('Internal server error', undefined, 'INTERNAL_ERROR'));
    return;
  }

  logger.warn('http:client_error', { method: req.method, path: req.path, status, error: errorMessage(error) });
  const errors = error instanceof ValidationError ? error.issues : undefined;
  res.status(status).json(createErrorResponse(errorMessage(error), errors, status === 400 ? 'BAD_REQUEST' : undefined));
}
