import * as Sentry from "@sentry/node";
import type { Application } from "express";
import { config } from "../config";
import { logger } from "./logging";

let enabled = false;

export function initSentry() {
  if (!config.sentryDsn) return;
  Sentry.init({ dsn: config.sentryDsn, environment: config.nodeEnv, tracesSampleRate: 0.1 });
  enabled = true;
  logger.info("Sentry error reporting enabled");
}

// Must be registered after the routes and before our own error handler.
export function attachSentryErrorHandler(app: Application) {
  if (!enabled) return;
  Sentry.setupExpressErrorHandler(app);
}
