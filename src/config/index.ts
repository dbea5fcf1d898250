import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  DB_URL: z.string().trim().optional(),
  STORAGE_DRIVER: z.enum(["mongo", "memory"]).default("mongo"),
  SLEEP_BOUNDARY_HOUR: z.coerce.number().int().min(0).max(23).default(2),
  CORS_ALLOW_ORIGINS: z.string().default("http://localhost:3002"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  SENTRY_DSN: z.string().trim().optional(),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("[config] Invalid environment:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  db: {
    url: env.DB_URL || undefined,
    driver: env.STORAGE_DRIVER,
  },
  sleep: {
    boundaryHour: env.SLEEP_BOUNDARY_HOUR,
  },
  cors: {
    origins: env.CORS_ALLOW_ORIGINS.split(",").map((s) => s.trim()).filter(Boolean),
  },
  logging: {
    level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
  },
  sentryDsn: env.SENTRY_DSN || undefined,
  rateLimit: {
    windowMs: 60_000,
    max: env.RATE_LIMIT_MAX,
  },
} as const;

export type Config = typeof config;
