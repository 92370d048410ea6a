import { Request, Response, NextFunction } from 'express';
import { ZodSchema } from 'zod';
import { logger } from './logging.js';

/**
 * Validation Middleware
 *
 * Centralized request validation using Zod schemas.
 */

export type ValidationTarget = 'body' | 'query' | 'params';

/**
 * Create validation middleware for a Zod schema
 *
 * A validated body replaces `req.body`, so defaults and transforms
 * declared on the schema reach the controller. Query and params are
 * checked only; controllers read them as strings.
 *
 * @example
 * ```typescript
 * router.post('/cover',
 *   validateRequest(coverRequestSchema, 'body'),
 *   coverController.fetch
 * );
 * ```
 */
export function validateRequest(schema: ZodSchema, target: ValidationTarget = 'body') {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[target]);

    if (result.success) {
      if (target === 'body') {
        req.body = result.data;
      }
      next();
      return;
    }

    const formattedErrors = result.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));

    logger.warn('Request validation failed', {
      target,
      errors: formattedErrors,
      path: req.path,
      method: req.method,
    });

    res.status(400).json({
      error: 'Validation failed',
      details: formattedErrors,
    });
  };
}
