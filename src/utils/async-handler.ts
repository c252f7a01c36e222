import { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/**
 * Adapt an async controller method to Express
 *
 * Rejections (an AppError from a service, a ZodError from `schema.parse(req)`)
 * go to the error middleware.
 *
 * Usage:
 * ```typescript
 * checkout = asyncHandler(async (req, res) => {
 *   const { params, body } = checkoutSchema.parse(req);
 *   const result = await this.transactionService.performCheckout({ ... });
 *   res.status(200).json(createSuccessResponse(result));
 * });
 * ```
 */
export const asyncHandler = (route: AsyncRoute): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    route(req, res).catch(next);
  };
};
