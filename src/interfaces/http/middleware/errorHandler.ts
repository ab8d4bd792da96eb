/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Registered last; Express 5 forwards rejected async handlers here.
 *
 *   - Operational AppError (ValidationError, NotFoundError): logged at `warn`,
 *     answered with the error's status code and message.
 *   - A request body express.json() could not parse: 400.
 *   - Anything else, including an AppError marked non-operational or a thrown
 *     non-Error value: logged at `error`, answered with a generic 500 that
 *     leaks nothing.
 *
 * Express only treats a middleware as an error handler when it declares all
 * four parameters.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed'
  );
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn(
      { statusCode: err.statusCode, message: err.message, path: req.path },
      'Operational error',
    );
    res.status(err.statusCode).json({ status: 'error', message: err.message });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ status: 'error', message: 'Request body is not valid JSON' });
    return;
  }

  logger.error({ err, path: req.path }, 'Unhandled error');
  res.status(500).json({ status: 'error', message: 'Internal server error' });
}
