import { NextFunction, RequestHandler, Response } from "express";
import { AuthenticatedRequest } from "./authMiddleware";

export type AsyncHandler = (
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction
) => Promise<void>;

/** Routes a rejected handler promise to the error middleware. */
export const asyncHandler =
  (handler: AsyncHandler): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };
