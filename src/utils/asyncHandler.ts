import { NextFunction, Request, RequestHandler, Response } from "express";

/** Forwards a rejected handler promise to the error middleware. */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
};
