import { Router } from "express";
import { validateZod } from "../app/Middlewares";
import { dayQuery, exerciseBody, userItemParams, userParams } from "../app/Validation/requestSchemas";
import type { Services } from "../services/container";
import { asyncHandler } from "../utils/asyncHandler";

export default function exerciseRoutes(services: Services): Router {
  const r = Router({ mergeParams: true });

  r.get(
    "/",
    validateZod({ params: userParams, query: dayQuery }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      const { date } = dayQuery.parse(req.query);
      res.json({ items: await services.exercises.list(userId, date) });
    }),
  );

  r.post(
    "/",
    validateZod({ params: userParams, body: exerciseBody }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      res.status(201).json(await services.exercises.add(userId, exerciseBody.parse(req.body)));
    }),
  );

  r.put(
    "/:id",
    validateZod({ params: userItemParams, body: exerciseBody }),
    asyncHandler(async (req, res) => {
      const { userId, id } = userItemParams.parse(req.params);
      res.json(await services.exercises.update(userId, id, exerciseBody.parse(req.body)));
    }),
  );

  r.delete(
    "/:id",
    validateZod({ params: userItemParams }),
    asyncHandler(async (req, res) => {
      const { userId, id } = userItemParams.parse(req.params);
      await services.exercises.remove(userId, id);
      res.status(204).end();
    }),
  );

  return r;
}
