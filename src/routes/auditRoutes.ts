import { Router } from "express";
import { z } from "zod";
import type { AuditLog } from "../audit/store.js";
import { currentTenant, requireCapability } from "../auth/middleware.js";
import type { AuthorizationGuard } from "../tenancy/guard.js";
import { sendError } from "./httpErrors.js";

const auditQuerySchema = z.object({
  event: z.string().optional(),
  outcome: z.enum(["allowed", "denied", "transition"]).optional(),
  target_type: z.string().optional(),
  target_id: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional()
});

export function createAuditRouter(deps: { audit: AuditLog; guard: AuthorizationGuard }): Router {
  const router = Router();

  router.get("/audit-logs", requireCapability(deps.guard, "VIEW_AUDIT_LOGS", "audit_log"), async (req, res) => {
    try {
      const filter = auditQuerySchema.parse(req.query);
      res.json({ entries: await deps.audit.list(currentTenant(req), filter) });
    } catch (error) {
      sendError(req, res, error);
    }
  });

  return router;
}
