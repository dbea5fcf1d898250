import { Router } from "express";
import { validateZod } from "../app/Middlewares";
import { metabolicPreviewBody, userParams } from "../app/Validation/requestSchemas";
import { activityMultiplier, computeBMR, computeTDEE } from "../services/metabolic/calculator";
import { asyncHandler } from "../utils/asyncHandler";

export default function metabolicRoutes(): Router {
  const r = Router({ mergeParams: true });

  // Computes without saving anything.
  r.post(
    "/preview",
    validateZod({ params: userParams, body: metabolicPreviewBody }),
    asyncHandler(async (req, res) => {
      const input = metabolicPreviewBody.parse(req.body);
      const multiplier = activityMultiplier(input.activityLevel);
      const { bmr, formulaUsed } = computeBMR({
        weight: input.weight,
        height: input.heightCm,
        age: input.age,
        sex: input.sex,
        bodyFatPercent: input.bodyFatPercent,
      });
      const tdee = computeTDEE(bmr, multiplier);
      res.json({ bmr: bmr.toNumber(), tdee: tdee.toNumber(), formulaUsed, activityMultiplier: multiplier });
    }),
  );

  return r;
}
