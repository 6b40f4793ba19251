import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { AUTH_FAILED_BODY } from "../auth/middleware.js";
import { AuthenticationError, isAppError } from "../domain/errors.js";
import { describeError, logError } from "../observability/logger.js";

/**
 * Turns anything a handler throws into a response. Authentication failures
 * stay generic and a foreign tenant answers exactly like a missing resource.
 */
export function sendError(req: Request, res: Response, error: unknown): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: "Validation failed", code: "VALIDATION_FAILED", issues: error.issues });
    return;
  }
  if (error instanceof AuthenticationError) {
    res.status(401).json(AUTH_FAILED_BODY);
    return;
  }
  if (isAppError(error)) {
    if (error.code === "TENANT_MISMATCH") {
      res.status(404).json({ error: "Not found", code: "NOT_FOUND" });
      return;
    }
    const issues = error.code === "VALIDATION_FAILED" ? error.details?.issues : undefined;
    res.status(error.status).json({ error: error.message, code: error.code, ...(issues ? { issues } : {}) });
    return;
  }

  logError("http.request.unhandled_error", {
    context: req.context,
    data: { method: req.method, path: req.path, status_code: 500, error: describeError(error) }
  });
  res.status(500).json({ error: "Internal server error" });
}

/** Malformed JSON from `express.json()` is a client error, not a crash. */
export function handleBodyParseError(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (err instanceof SyntaxError && "body" in err) {
    res.status(400).json({ error: "Malformed JSON body", code: "VALIDATION_FAILED" });
    return;
  }
  next(err);
}
