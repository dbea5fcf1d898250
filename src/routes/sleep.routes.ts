import { Router } from "express";
import { validateZod } from "../app/Middlewares";
import { rangeQuery, sleepBody, sleepStatsQuery, userItemParams, userParams } from "../app/Validation/requestSchemas";
import type { Services } from "../services/container";
import { asyncHandler } from "../utils/asyncHandler";

export default function sleepRoutes(services: Services): Router {
  const r = Router({ mergeParams: true });

  r.get(
    "/",
    validateZod({ params: userParams, query: rangeQuery }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      const { from, to } = rangeQuery.parse(req.query);
      res.json({ items: await services.sleep.list(userId, from, to) });
    }),
  );

  r.get(
    "/stats",
    validateZod({ params: userParams, query: sleepStatsQuery }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      const { period, end } = sleepStatsQuery.parse(req.query);
      res.json(await services.sleep.stats(userId, period, end));
    }),
  );

  // The ledger day is derived from recordedAt, so clients never send one.
  r.post(
    "/",
    validateZod({ params: userParams, body: sleepBody }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      res.status(201).json(await services.sleep.record(userId, sleepBody.parse(req.body)));
    }),
  );

  r.put(
    "/:id",
    validateZod({ params: userItemParams, body: sleepBody }),
    asyncHandler(async (req, res) => {
      const { userId, id } = userItemParams.parse(req.params);
      res.json(await services.sleep.update(userId, id, sleepBody.parse(req.body)));
    }),
  );

  r.delete(
    "/:id",
    validateZod({ params: userItemParams }),
    asyncHandler(async (req, res) => {
      const { userId, id } = userItemParams.parse(req.params);
      await services.sleep.remove(userId, id);
      res.status(204).end();
    }),
  );

  return r;
}
