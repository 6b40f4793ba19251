import type { AuthPrincipal } from "./types.js";
import type { LogContext } from "../observability/logger.js";
import type { TenantContext } from "../tenancy/context.js";

declare global {
  namespace Express {
    interface Request {
      auth?: AuthPrincipal;
      tenant?: TenantContext;
      context?: LogContext & { request_id: string };
    }
  }
}

export {};
