import { Router } from "express";
import { perUserIpLimiter } from "../app/Middlewares";
import type { Services } from "../services/container";
import bodyMeasurementRoutes from "./bodyMeasurements.routes";
import exerciseRoutes from "./exercises.routes";
import ledgerRoutes from "./ledger.routes";
import mealRoutes from "./meals.routes";
import metabolicRoutes from "./metabolic.routes";
import profileRoutes from "./profile.routes";
import sleepRoutes from "./sleep.routes";

export interface ApiRouteOptions {
  rateLimit?: { windowMs: number; max: number };
}

/** Everything under /api/v1/users/:userId. */
export function apiRoutes(services: Services, options: ApiRouteOptions = {}): Router {
  const r = Router();
  const user = Router({ mergeParams: true });

  if (options.rateLimit) user.use(perUserIpLimiter(options.rateLimit));
  user.use("/profile", profileRoutes(services));
  user.use("/body-measurements", bodyMeasurementRoutes(services));
  user.use("/exercises", exerciseRoutes(services));
  user.use("/sleep", sleepRoutes(services));
  user.use("/meals", mealRoutes(services));
  user.use("/ledger", ledgerRoutes(services));
  user.use("/metabolic", metabolicRoutes());

  r.use("/users/:userId", user);
  return r;
}
