import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Forward rejections of an async handler to the Express error middleware
 */
export function asyncRoute(handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
