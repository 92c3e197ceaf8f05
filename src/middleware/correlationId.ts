import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

export const CORRELATION_HEADER = 'X-Correlation-ID';

/**
 * Tags every response with a fresh correlation id
 */
export function correlationId(req: Request, res: Response, next: NextFunction): void {
  const id = randomUUID();
  res.locals.correlationId = id;
  res.setHeader(CORRELATION_HEADER, id);
  next();
}

/**
 * Correlation id assigned to this response, or a new one if the middleware did not run
 */
export function getCorrelationId(res: Response): string {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : randomUUID();
}
