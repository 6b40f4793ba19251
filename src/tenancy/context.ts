import type { AuthPrincipal, ContextRole } from "../auth/types.js";

/**
 * The tenant scope of one request. Every store and service call on tenant
 * data takes one of these as its first argument.
 */
export type TenantContext = Readonly<{
  tenant_id: string;
  actor_id: string;
  role: ContextRole;
  session_id: string | null;
}>;

export function resolveTenantContext(principal: AuthPrincipal): TenantContext {
  return Object.freeze({
    tenant_id: principal.tenant_id,
    actor_id: principal.subject,
    role: principal.role,
    session_id: principal.session_id
  });
}

/** Scope used by scheduler workers acting on a tenant's tasks. */
export function createSystemContext(tenant_id: string, worker_id: string): TenantContext {
  return Object.freeze({
    tenant_id,
    actor_id: `system:${worker_id}`,
    role: "system",
    session_id: null
  });
}

export function isSameTenant(context: TenantContext, resourceTenantId: string | null | undefined): boolean {
  return typeof resourceTenantId === "string" && resourceTenantId === context.tenant_id;
}
