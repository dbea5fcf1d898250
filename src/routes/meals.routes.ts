import { Router } from "express";
import { validateZod } from "../app/Middlewares";
import { dayQuery, mealBody, userItemParams, userParams } from "../app/Validation/requestSchemas";
import type { Services } from "../services/container";
import { asyncHandler } from "../utils/asyncHandler";

export default function mealRoutes(services: Services): Router {
  const r = Router({ mergeParams: true });

  // GET /meals?date=YYYY-MM-DD
  r.get(
    "/",
    validateZod({ params: userParams, query: dayQuery }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      const { date } = dayQuery.parse(req.query);
      res.json({ items: await services.meals.list(userId, date) });
    }),
  );

  r.post(
    "/",
    validateZod({ params: userParams, body: mealBody }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      res.status(201).json(await services.meals.add(userId, mealBody.parse(req.body)));
    }),
  );

  r.put(
    "/:id",
    validateZod({ params: userItemParams, body: mealBody }),
    asyncHandler(async (req, res) => {
      const { userId, id } = userItemParams.parse(req.params);
      res.json(await services.meals.update(userId, id, mealBody.parse(req.body)));
    }),
  );

  r.delete(
    "/:id",
    validateZod({ params: userItemParams }),
    asyncHandler(async (req, res) => {
      const { userId, id } = userItemParams.parse(req.params);
      await services.meals.remove(userId, id);
      res.status(204).end();
    }),
  );

  return r;
}
