import type { Request, Response, NextFunction } from 'express';
import type { ZodTypeAny } from 'zod';
import { logger } from '../../config/logger';
import { ErrorCodes, HttpStatus } from '../../utils/error-codes';
import { formatZodIssues } from './error-handler.middleware';

type ValidationTarget = 'body' | 'query' | 'params';

type ValidationSchemas = Partial<Record<ValidationTarget, ZodTypeAny>>;

/**
 * Validate request parts against Zod schemas.
 * The parsed body replaces `req.body`; query and params are only checked,
 * handlers parse them again for typed values.
 */
export function validate(schemas: ValidationSchemas) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const errors: Array<{ field: string; message: string }> = [];

    try {
      for (const target of ['params', 'query', 'body'] as const) {
        const schema = schemas[target];
        if (!schema) continue;

        const result = await schema.safeParseAsync(req[target]);
        if (!result.success) {
          errors.push(...formatZodIssues(result.error, target));
        } else if (target === 'body') {
          req.body = result.data;
        }
      }
    } catch (error) {
      logger.error({ error }, 'Validation middleware error');
      next(error);
      return;
    }

    if (errors.length > 0) {
      logger.warn({ errors, path: req.path }, 'Validation failed');
      res.status(HttpStatus.UNPROCESSABLE_ENTITY).json({
        success: false,
        error: 'Validation failed',
        code: ErrorCodes.VALIDATION_ERROR,
        details: errors,
      });
      return;
    }

    next();
  };
}
