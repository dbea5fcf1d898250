import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { AppError } from "../../utils/errors";

export function notFound(req: Request, res: Response) {
  res.status(404).json({ error: { code: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` } });
}

// Express recognizes error middleware by its four parameters.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ZodError) {
    res.status(422).json({ error: "validation_failed", details: err.flatten() });
    return;
  }
  if (err instanceof AppError) {
    if (err.statusCode >= 500) req.log.error({ err }, err.message);
    else req.log.warn({ code: err.code, err: err.message }, "request rejected");
    res.status(err.statusCode).json({ error: { code: err.code, message: err.message } });
    return;
  }
  req.log.error({ err }, "unhandled error");
  res.status(500).json({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
}
