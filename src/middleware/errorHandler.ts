import type { NextFunction, Request, Response } from "express";
import { errorMessage, logError } from "../utils/logger";

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  // body-parser rejects invalid JSON with a SyntaxError carrying the raw body
  if (err instanceof SyntaxError && "body" in err) {
    return res.status(400).json({ ok: false, error: "invalid json" });
  }
  const message = errorMessage(err);
  logError("unhandled error", { method: req.method, url: req.originalUrl || req.url, message });
  return res.status(500).json({ ok: false, error: message });
}
