import rateLimit from 'express-rate-limit';
import type { Request } from 'express';

/** One bucket per (user in path, client ip). */
export function perUserIpLimiter(options?: { windowMs?: number; max?: number; }) {
  return rateLimit({
    windowMs: options?.windowMs ?? 60_000,
    limit: options?.max ?? 120,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request) => `${req.params.userId ?? ''}::${req.ip ?? ''}`,
  });
}
