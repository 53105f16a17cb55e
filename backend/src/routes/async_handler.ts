import type { NextFunction, Request, RequestHandler, Response } from "express";

// express 4 does not forward rejected promises to the error handler on its own
export const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
