import type { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncHandler<TReq extends Request = Request, TRes extends Response = Response> = (
  req: TReq,
  res: TRes,
  next: NextFunction
) => unknown | Promise<unknown>;

/**
 * Route rejections and synchronous throws go to the error middleware.
 */
export function wrap(handler: AsyncHandler): RequestHandler {
  const wrapped: RequestHandler = (req, res, next) => {
    let result: unknown;
    try {
      result = handler(req, res, next);
    } catch (err) {
      next(err);
      return;
    }

    if (result instanceof Promise) {
      result.catch(next);
    }
  };

  return wrapped;
}
