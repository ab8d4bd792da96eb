/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of errors reach the HTTP boundary:
 *
 *   1. Operational errors — a bad target count, an unknown run id, a download
 *      requested before the phase produced it. They carry a status code and a
 *      message the client may see.
 *
 *   2. Programmer errors — anything else. The global error handler answers
 *      these with a generic 500 and logs the details.
 *
 * Upstream failures are not in this hierarchy: the registry client returns
 * them as values (see IRegistryClient) because they never abort a phase.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses of Error across compilation targets.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}
