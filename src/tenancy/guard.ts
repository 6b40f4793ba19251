import { hasCapability, type Capability } from "../auth/permissions.js";
import type { AuditLog } from "../audit/store.js";
import { AuthorizationError, NotFoundError } from "../domain/errors.js";
import { logWarn } from "../observability/logger.js";
import { recordAuthzDecision } from "../observability/metrics.js";
import { isSameTenant, type TenantContext } from "./context.js";

export type GuardDecision =
  | { allowed: true }
  | { allowed: false; reason: "TENANT_MISMATCH" | "PERMISSION_DENIED" };

export interface GuardTarget {
  type: string;
  id?: string | null;
}

export class AuthorizationGuard {
  constructor(private readonly audit: AuditLog) {}

  /**
   * Decides whether the caller may use `capability` on a resource owned by
   * `resourceTenantId`. Cross-tenant access is refused whatever the role.
   * Every decision lands in the audit log under the caller's tenant.
   */
  async check(
    context: TenantContext,
    capability: Capability,
    resourceTenantId: string,
    target: GuardTarget = { type: "tenant" }
  ): Promise<GuardDecision> {
    let decision: GuardDecision;
    if (!isSameTenant(context, resourceTenantId)) {
      decision = { allowed: false, reason: "TENANT_MISMATCH" };
    } else if (!hasCapability(context.role, capability)) {
      decision = { allowed: false, reason: "PERMISSION_DENIED" };
    } else {
      decision = { allowed: true };
    }

    recordAuthzDecision(decision.allowed ? "allowed" : "denied");
    await this.audit.append({
      tenant_id: context.tenant_id,
      actor_id: context.actor_id,
      event: "authz.check",
      target_type: target.type,
      target_id: target.id ?? null,
      outcome: decision.allowed ? "allowed" : "denied",
      capability,
      ...(decision.allowed ? {} : { reason: decision.reason })
    });

    if (!decision.allowed) {
      logWarn("authz.denied", {
        context: { tenant_id: context.tenant_id },
        data: { actor_id: context.actor_id, role: context.role, capability, reason: decision.reason, target_type: target.type }
      });
    }
    return decision;
  }

  /** Throwing form of `check`: a foreign tenant reads as "not found". */
  async authorize(
    context: TenantContext,
    capability: Capability,
    resourceTenantId: string,
    target?: GuardTarget
  ): Promise<void> {
    const decision = await this.check(context, capability, resourceTenantId, target);
    if (decision.allowed) return;
    if (decision.reason === "TENANT_MISMATCH") {
      throw new NotFoundError();
    }
    throw new AuthorizationError("PERMISSION_DENIED", `Missing capability ${capability}`, { capability });
  }
}
