import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodTypeAny } from 'zod';
import { ValidationException } from '../utils/exceptions';

type RequestSource = 'body' | 'query' | 'params';

function firstIssueMessage(error: ZodError): string {
  return error.issues[0]?.message ?? 'Validation failed';
}

/**
 * Parse one part of the request and replace it with the parsed value, so
 * handlers see normalized identifiers and defaults. A failed parse reaches the
 * error handler as a ValidationException carrying the first issue's message.
 */
export function validateRequest(schema: ZodTypeAny, source: RequestSource = 'body') {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      const parsed = await schema.safeParseAsync(req[source]);
      if (!parsed.success) {
        next(new ValidationException(firstIssueMessage(parsed.error)));
        return;
      }

      if (source === 'query') {
        for (const key of Object.keys(req.query)) delete req.query[key];
        Object.assign(req.query, parsed.data);
      } else {
        req[source] = parsed.data;
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}
