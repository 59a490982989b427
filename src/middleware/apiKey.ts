import { timingSafeEqual } from "node:crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";

const KEY_HEADERS = ["x-api-key", "authorization"] as const;

function constantTimeEquals(expected: string, provided: string): boolean {
  const expectedBuffer = Buffer.from(expected);
  const providedBuffer = Buffer.from(provided);
  if (expectedBuffer.length !== providedBuffer.length) {
    return false;
  }
  return timingSafeEqual(expectedBuffer, providedBuffer);
}

const extractToken = (req: Request): string | null => {
  for (const header of KEY_HEADERS) {
    const value = req.header(header)?.trim();
    if (!value) {
      continue;
    }
    if (header === "authorization") {
      if (!value.toLowerCase().startsWith("bearer ")) {
        continue;
      }
      const bearer = value.slice(7).trim();
      return bearer.length > 0 ? bearer : null;
    }
    return value;
  }
  return null;
};

/**
 * Guards destructive routes. With no keys configured the route stays open,
 * which is the normal single-user setup.
 */
export function requireApiKey(allowedKeys: string[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (allowedKeys.length === 0) {
      next();
      return;
    }
    const token = extractToken(req);
    if (!token || !allowedKeys.some((key) => constantTimeEquals(key, token))) {
      res.status(401).json({ error: "unauthorized" });
      return;
    }
    next();
  };
}
