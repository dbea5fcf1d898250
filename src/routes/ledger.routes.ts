import { Router } from "express";
import { validateZod } from "../app/Middlewares";
import { rangeQuery, userDayParams, userParams } from "../app/Validation/requestSchemas";
import type { Services } from "../services/container";
import { asyncHandler } from "../utils/asyncHandler";
import { NotFoundError } from "../utils/errors";

export default function ledgerRoutes(services: Services): Router {
  const r = Router({ mergeParams: true });

  r.get(
    "/",
    validateZod({ params: userParams, query: rangeQuery }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      const { from, to } = rangeQuery.parse(req.query);
      res.json({ items: await services.ledger.listLedgers(userId, from, to) });
    }),
  );

  r.get(
    "/:date",
    validateZod({ params: userDayParams }),
    asyncHandler(async (req, res) => {
      const { userId, date } = userDayParams.parse(req.params);
      const ledger = await services.ledger.getLedger({ user: userId, day: date });
      if (!ledger) throw new NotFoundError(`No ledger for ${date}`);
      res.json(ledger);
    }),
  );

  // Bulk reset. Logged events are kept; only the aggregates go.
  r.delete(
    "/",
    validateZod({ params: userParams }),
    asyncHandler(async (req, res) => {
      const { userId } = userParams.parse(req.params);
      await services.ledger.resetAll(userId);
      res.status(204).end();
    }),
  );

  return r;
}
