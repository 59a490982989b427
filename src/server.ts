import cors from "cors";
import express, { type Express } from "express";
import process from "node:process";
import type { AppConfig } from "./config.js";
import type { HistoryStore } from "./history/types.js";
import { errorHandler } from "./http/errors.js";
import { renderMetrics } from "./metrics.js";
import { createCalculateRouter } from "./routes/calculate.js";
import { createHistoryRouter } from "./routes/history.js";

export type AppDependencies = {
  config: Pick<AppConfig, "currency" | "apiKeys">;
  history: HistoryStore;
  now?: () => Date;
};

export function createApp(deps: AppDependencies): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "64kb" }));

  app.get(["/health", "/healthz"], (_req, res) => {
    res.status(200).type("text/plain").send("ok");
  });

  app.get("/_version", (_req, res) => {
    res.json({
      version: process.env.npm_package_version ?? null,
      commit: process.env.GITHUB_SHA ?? process.env.COMMIT_SHA ?? "local"
    });
  });

  app.get("/metrics", async (_req, res, next) => {
    try {
      res.type("text/plain").send(await renderMetrics(deps.history));
    } catch (error) {
      next(error);
    }
  });

  app.use(createCalculateRouter({ history: deps.history, currency: deps.config.currency, now: deps.now }));
  app.use(createHistoryRouter({ history: deps.history, apiKeys: deps.config.apiKeys }));

  app.use((_req, res) => {
    res.status(404).json({ error: "not_found" });
  });
  app.use(errorHandler);

  return app;
}
