import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import { captureServerException } from "../lib/telemetry.js";

export class HttpError extends Error {
  status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (error instanceof ZodError) {
    res.status(400).json({
      error: "invalid_request",
      issues: error.issues.map((issue) => ({ path: issue.path.join("."), msg: issue.message }))
    });
    return;
  }
  if (error instanceof HttpError) {
    res.status(error.status).json({ error: error.message });
    return;
  }
  if (error instanceof SyntaxError) {
    res.status(400).json({ error: "invalid_json" });
    return;
  }
  console.error("[server] unhandled error", error);
  captureServerException(error, { method: req.method, path: req.path });
  res.status(500).json({ error: "internal_error" });
};
