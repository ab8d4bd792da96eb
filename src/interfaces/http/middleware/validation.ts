/**
 * Request Validation Wrapper
 * Layer: Interfaces (HTTP)
 *
 * `withValidated(schema, source, handler)` parses one part of the request
 * (body or route params) with a Zod schema before the handler runs, and hands
 * the handler the parsed, coerced value with its inferred type:
 *
 *   router.post('/runs', withValidated(scrapeRequestSchema, 'body', controller.start));
 *
 * A failed parse throws a ValidationError (400) joining every issue message;
 * Express 5 forwards the rejection to the global error handler and the
 * handler is never reached.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { Request, RequestHandler, Response } from 'express';
import type { z } from 'zod';

export type ValidatedHandler<T> = (input: T, req: Request, res: Response) => Promise<void>;

export function withValidated<S extends z.ZodType>(
  schema: S,
  source: 'body' | 'params',
  handler: ValidatedHandler<z.infer<S>>,
): RequestHandler {
  return async (req, res) => {
    const result = schema.safeParse(req[source] ?? {});

    if (!result.success) {
      const messages = result.error.issues.map((issue) => issue.message).join('; ');
      throw new ValidationError(messages);
    }

    await handler(result.data, req, res);
  };
}
