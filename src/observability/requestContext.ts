import { nanoid } from "nanoid";
import type { NextFunction, Request, Response } from "express";
import type { LogContext } from "./logger.js";
import { logError, logInfo, logWarn } from "./logger.js";
import { recordHttpRequest } from "./metrics.js";

function pickString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/** The matched route pattern, e.g. `/tasks/:id/execute`; unrouted requests have none. */
function routePattern(req: Request): string | undefined {
  const route: unknown = req.route;
  if (!route || typeof route !== "object") return undefined;
  return pickString(Reflect.get(route, "path"));
}

function extractFromObject(source: unknown, key: string): string | undefined {
  if (!source || typeof source !== "object" || !(key in source)) return undefined;
  return pickString(Reflect.get(source, key));
}

/**
 * Log correlation fields for one request. The tenant comes only from the
 * authenticated session; headers and bodies never name it.
 */
export function resolveRequestContext(req: Request): LogContext & { request_id: string } {
  const request_id = req.context?.request_id ?? pickString(req.header("x-request-id")) ?? nanoid(10);
  const context: LogContext & { request_id: string } = { request_id };

  const tenant_id = req.tenant?.tenant_id;
  const pattern = routePattern(req);
  const agent_id =
    extractFromObject(req.params, "agent_id") ??
    extractFromObject(req.body, "agent_id") ??
    extractFromObject(req.query, "agent_id") ??
    (pattern?.startsWith("/agents/:id") ? extractFromObject(req.params, "id") : undefined);
  const task_id =
    extractFromObject(req.params, "task_id") ??
    (pattern?.startsWith("/tasks/:id") ? extractFromObject(req.params, "id") : undefined);

  if (tenant_id) context.tenant_id = tenant_id;
  if (agent_id) context.agent_id = agent_id;
  if (task_id) context.task_id = task_id;
  return context;
}

export function attachRequestContext(req: Request, res: Response, next: NextFunction): void {
  req.context = resolveRequestContext(req);
  res.setHeader("x-request-id", req.context.request_id);
  next();
}

/** One completion log line and one metrics sample per request. */
export function observeRequests(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();

  res.on("finish", () => {
    const duration_ms = Date.now() - startedAt;
    const context = resolveRequestContext(req);
    recordHttpRequest({
      method: req.method,
      endpoint: routePattern(req) ?? "unmatched",
      statusCode: res.statusCode,
      durationMs: duration_ms
    });

    const data: Record<string, unknown> = {
      method: req.method,
      path: req.originalUrl.split("?")[0],
      status_code: res.statusCode,
      duration_ms
    };
    if (res.statusCode >= 500) {
      logError("http.request.completed", { context, data });
    } else if (res.statusCode >= 400) {
      logWarn("http.request.completed", { context, data });
    } else {
      logInfo("http.request.completed", { context, data });
    }
  });

  next();
}

export function logUnhandledError(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  void _next;
  logError("http.request.unhandled_error", {
    context: req.context,
    data: {
      method: req.method,
      path: req.path,
      status_code: 500,
      error: err instanceof Error ? err.message : "Unknown error"
    }
  });
  if (res.headersSent) return;
  res.status(500).json({ error: "Internal server error" });
}
