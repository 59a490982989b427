import type { NextFunction, Request, Response } from "express";
import { Router } from "express";
import { HttpError } from "../http/errors.js";
import type { HistoryStore } from "../history/types.js";
import { requireApiKey } from "../middleware/apiKey.js";

export type HistoryRouterOptions = {
  history: HistoryStore;
  apiKeys: string[];
};

function parseIndex(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new HttpError("invalid_index", 400);
  }
  return Number.parseInt(raw, 10);
}

export function createHistoryRouter(options: HistoryRouterOptions): Router {
  const router = Router();
  const { history } = options;

  router.get("/api/history", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ history: await history.loadAll() });
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/history/:index", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await history.select(parseIndex(req.params.index));
      if (!record) {
        throw new HttpError("not_found", 404);
      }
      res.json({ record });
    } catch (error) {
      next(error);
    }
  });

  router.delete(
    "/api/history",
    requireApiKey(options.apiKeys),
    async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const cleared = await history.clear();
        if (!cleared.ok) {
          console.warn("[history] failed to clear history", cleared.error.message);
          throw new HttpError("history_unavailable", 503);
        }
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
