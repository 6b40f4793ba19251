import type { NextFunction, Request, Response } from "express";
import { AuthenticationError, AuthorizationError, NotFoundError } from "../domain/errors.js";
import { logWarn } from "../observability/logger.js";
import type { AuthorizationGuard } from "../tenancy/guard.js";
import { resolveTenantContext, type TenantContext } from "../tenancy/context.js";
import type { Capability } from "./permissions.js";
import type { SessionIssuer } from "./sessionIssuer.js";

export type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

export const AUTH_FAILED_BODY = { error: "Authentication failed", code: "AUTH_FAILED" } as const;

export function parseBearerToken(headerValue: string | undefined): string | null {
  if (!headerValue) return null;
  const match = headerValue.match(/^Bearer\s+(.+)$/i);
  return match?.[1]?.trim() || null;
}

function deny(res: Response, status: 401 | 403 | 404, code: string, message: string): void {
  res.status(status).json({ error: message, code });
}

/**
 * Verifies the bearer token and attaches the principal and its frozen
 * tenant context. Every failure answers the same generic 401; the precise
 * cause only reaches the log.
 */
export function createAuthenticate(issuer: Pick<SessionIssuer, "verifyAccessToken">): AsyncHandler {
  return async (req, res, next) => {
    if (req.method === "OPTIONS") {
      next();
      return;
    }

    const token = parseBearerToken(req.header("authorization"));
    if (!token) {
      logWarn("auth.rejected", { context: req.context, data: { code: "MISSING_BEARER", path: req.path } });
      res.status(401).json(AUTH_FAILED_BODY);
      return;
    }

    try {
      const principal = await issuer.verifyAccessToken(token);
      req.auth = principal;
      req.tenant = resolveTenantContext(principal);
      if (req.context) req.context.tenant_id = principal.tenant_id;
    } catch (error) {
      if (error instanceof AuthenticationError) {
        logWarn("auth.rejected", { context: req.context, data: { code: error.code, path: req.path } });
        res.status(401).json(AUTH_FAILED_BODY);
        return;
      }
      next(error);
      return;
    }
    next();
  };
}

/** The tenant scope attached by `createAuthenticate`. */
export function currentTenant(req: Request): TenantContext {
  if (!req.tenant) {
    throw new AuthenticationError("MISSING_BEARER", "Request reached a tenant route without authentication");
  }
  return req.tenant;
}

/** How a `:id` route finds the tenant that owns the addressed resource. */
export interface ResourceScope {
  type: string;
  ownerOf: (id: string) => Promise<string | null>;
  notFoundMessage: string;
}

/**
 * Route-level capability gate. With a `ResourceScope`, the decision is made
 * against the tenant that owns `req.params.id`, so a foreign id is audited
 * as TENANT_MISMATCH and answered exactly like a missing one. Ids that do
 * not exist are checked against the caller's own tenant.
 */
export function requireCapability(
  guard: AuthorizationGuard,
  capability: Capability,
  scope: string | ResourceScope = "tenant"
): AsyncHandler {
  return async (req, res, next) => {
    const context = req.tenant;
    if (!context) {
      res.status(401).json(AUTH_FAILED_BODY);
      return;
    }

    const id = typeof req.params?.id === "string" ? req.params.id : null;
    const type = typeof scope === "string" ? scope : scope.type;
    try {
      const owner = typeof scope !== "string" && id ? await scope.ownerOf(id) : null;
      await guard.authorize(context, capability, owner ?? context.tenant_id, { type, id });
    } catch (error) {
      if (error instanceof NotFoundError && typeof scope !== "string") {
        deny(res, 404, "NOT_FOUND", scope.notFoundMessage);
        return;
      }
      if (error instanceof AuthorizationError) {
        deny(res, 403, "PERMISSION_DENIED", `Missing capability ${capability}`);
        return;
      }
      next(error);
      return;
    }
    next();
  };
}
