import { Router } from "express";
import { validateZod } from "../app/Middlewares";
import { profileBody, userParams } from "../app/Validation/requestSchemas";
import type { Services } from "../services/container";
import { asyncHandler } from "../utils/asyncHandler";

export default function profileRoutes(services: Services): Router {
  const r = Router({ mergeParams: true });

  r.get(
    "/",
    validateZod({ params: userParams }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      res.json(await services.profiles.get(userId));
    }),
  );

  r.put(
    "/",
    validateZod({ params: userParams, body: profileBody }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      res.json(await services.profiles.upsert(userId, profileBody.parse(req.body)));
    }),
  );

  return r;
}
