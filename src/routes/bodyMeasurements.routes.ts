import { Router } from "express";
import { validateZod } from "../app/Middlewares";
import { bodyMeasurementBody, bodyTrendsQuery, rangeQuery, userItemParams, userParams } from "../app/Validation/requestSchemas";
import type { Services } from "../services/container";
import { asyncHandler } from "../utils/asyncHandler";

export default function bodyMeasurementRoutes(services: Services): Router {
  const r = Router({ mergeParams: true });

  // GET /body-measurements?from=YYYY-MM-DD&to=YYYY-MM-DD
  r.get(
    "/",
    validateZod({ params: userParams, query: rangeQuery }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      const { from, to } = rangeQuery.parse(req.query);
      res.json({ items: await services.bodyMeasurements.list(userId, from, to) });
    }),
  );

  // GET /body-measurements/trends?period=30|60|120&end=YYYY-MM-DD
  r.get(
    "/trends",
    validateZod({ params: userParams, query: bodyTrendsQuery }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      const { period, end } = bodyTrendsQuery.parse(req.query);
      res.json(await services.bodyMeasurements.trends(userId, period, end));
    }),
  );

  r.post(
    "/",
    validateZod({ params: userParams, body: bodyMeasurementBody }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      res.status(201).json(await services.bodyMeasurements.record(userId, bodyMeasurementBody.parse(req.body)));
    }),
  );

  r.put(
    "/:id",
    validateZod({ params: userItemParams, body: bodyMeasurementBody }),
    asyncHandler(async (req, res) => {
      const { userId, id } = userItemParams.parse(req.params);
      res.json(await services.bodyMeasurements.edit(userId, id, bodyMeasurementBody.parse(req.body)));
    }),
  );

  r.delete(
    "/:id",
    validateZod({ params: userItemParams }),
    asyncHandler(async (req, res) => {
      const { userId, id } = userItemParams.parse(req.params);
      await services.bodyMeasurements.remove(userId, id);
      res.status(204).end();
    }),
  );

  return r;
}
