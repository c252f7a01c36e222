import { Request, Response, NextFunction } from 'express';
import { AnyZodObject, ZodError } from 'zod';
import { createValidationErrorResponse } from '../utils/response-factory';

/**
 * Validation middleware factory
 *
 * Checks `{ body, params, query }` against a request schema before the
 * controller runs, answering 400 with one entry per failed field.
 *
 * Usage:
 * ```typescript
 * router.post('/:itemId/checkout', validate(checkoutSchema), controller.checkout);
 * ```
 */
export const validate = (schema: AnyZodObject) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await schema.parseAsync({
        body: req.body,
        params: req.params,
        query: req.query,
      });
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json(createValidationErrorResponse(error));
        return;
      }
      next(error);
    }
  };
};
