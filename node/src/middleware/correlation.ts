// node/src/middleware/correlation.ts: correlation id per request, echoed in the response header
import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';

export const CORRELATION_HEADER = 'x-correlation-id';

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const correlationId = req.header(CORRELATION_HEADER) ?? randomUUID();
  res.locals.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);
  next();
}

/** The id set by attachCorrelationId, if the middleware ran. */
export function correlationIdOf(res: Response): string | undefined {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : undefined;
}
