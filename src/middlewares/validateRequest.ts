import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodSchema } from 'zod';
import { AppError } from '../utils';

/**
 * Validates the JSON body with Zod and replaces it with the parsed value
 * (defaults applied, unknown keys dropped unless the schema is strict).
 */
export const validateRequest =
  (schemas: { body: ZodSchema }): RequestHandler =>
  (req: Request, _res: Response, next: NextFunction): void => {
    const result = schemas.body.safeParse(req.body);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }));
      next(AppError.badRequest(`Validation failed: ${JSON.stringify(issues)}`));
      return;
    }

    req.body = result.data;
    next();
  };

export default validateRequest;
