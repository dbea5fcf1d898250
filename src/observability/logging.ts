import type { NextFunction, Request, Response } from "express";
import pino from "pino";
import pinoHttp from "pino-http";
import { v4 as uuid } from "uuid";
import { config } from "../config";

export const logger = pino({
  level: config.logging.level,
  base: { service: "daily-metabolic-ledger" },
});

export function withRequestId(req: Request, res: Response, next: NextFunction) {
  const incoming = req.header("x-request-id");
  req.id = incoming && incoming.length <= 128 ? incoming : uuid();
  res.setHeader("X-Request-ID", String(req.id));
  next();
}

export const httpLogger = pinoHttp({
  logger,
  genReqId: (req) => req.id ?? uuid(),
  autoLogging: { ignore: (req) => req.url?.startsWith("/health") ?? false },
});
