/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps the arrival time on `res.locals`; controllers report the elapsed
 * time as `meta.totalTimeMs`. Registered first so the stamp precedes body
 * parsing and logging.
 */
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(_req: Request, res: Response, next: NextFunction): void {
  res.locals.requestStartTime = Date.now();
  next();
}

/** Milliseconds since requestTimer ran, when it did. */
export function elapsedMs(res: Response): number | undefined {
  const startedAt: unknown = res.locals.requestStartTime;
  return typeof startedAt === 'number' ? Math.round(Date.now() - startedAt) : undefined;
}
