import type { NextFunction, Request, Response } from "express";
import { Router } from "express";
import { formatResult } from "../calculator/format.js";
import type { HistoryStore } from "../history/types.js";
import { parseCalculateRequest } from "../schemas/calculate.js";
import { calculateAndRecord } from "../services/calculation.js";

export type CalculateRouterOptions = {
  history: HistoryStore;
  currency: string;
  now?: () => Date;
};

export function createCalculateRouter(options: CalculateRouterOptions): Router {
  const router = Router();
  const now = options.now ?? (() => new Date());

  router.post("/api/calculate", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseCalculateRequest(req.body);
      const run = await calculateAndRecord(options.history, body, now());
      if (!run.outcome.ok) {
        res.status(422).json({ error: run.outcome.error.code, message: run.outcome.error.message });
        return;
      }
      res.json({
        result: run.outcome.result,
        text: formatResult(run.outcome.result, body.currency ?? options.currency),
        record: run.record,
        saved: run.saved
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
