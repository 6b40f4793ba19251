import type { AuthRole } from "../auth/types.js";

export const TENANT_TIERS = ["free", "basic", "professional", "enterprise"] as const;
export type TenantTier = (typeof TENANT_TIERS)[number];

export interface TenantLimits {
  max_agents: number;
  max_tasks_per_hour: number;
}

export interface Tenant {
  id: string;
  name: string;
  slug: string;
  tier: TenantTier;
  limits: TenantLimits;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export interface User {
  id: string;
  tenant_id: string;
  email: string;
  password_hash: string;
  role: AuthRole;
  first_name?: string;
  last_name?: string;
  is_active: boolean;
  last_login_at: string | null;
  created_at: string;
  updated_at: string;
}

export type PublicUser = Omit<User, "password_hash">;

export const AGENT_STATUSES = ["idle", "running", "paused", "error", "terminated"] as const;
export type AgentStatus = (typeof AGENT_STATUSES)[number];

export interface Agent {
  id: string;
  tenant_id: string;
  name: string;
  agent_type: string;
  description?: string;
  status: AgentStatus;
  config: Record<string, unknown>;
  created_by: string;
  created_at: string;
  updated_at: string;
}

export interface Invitation {
  id: string;
  token: string;
  tenant_id: string;
  email: string;
  role: AuthRole;
  invited_by: string;
  expires_at: string;
  consumed_at: string | null;
  consumed_by: string | null;
  created_at: string;
}

export type AuditOutcome = "allowed" | "denied" | "transition";

export interface AuditLogEntry {
  id: string;
  tenant_id: string;
  actor_id: string;
  event: string;
  target_type: string;
  target_id: string | null;
  outcome: AuditOutcome;
  capability?: string;
  reason?: string;
  from_status?: string | null;
  to_status?: string;
  detail?: Record<string, unknown>;
  created_at: string;
}

export interface SessionFamily {
  id: string;
  tenant_id: string;
  user_id: string;
  current_rotation_id: string;
  consumed_rotation_ids: string[];
  created_at: string;
  rotated_at: string;
  revoked_at: string | null;
  revoked_reason: string | null;
}

export function toPublicUser(user: User): PublicUser {
  const { password_hash: _hash, ...rest } = user;
  void _hash;
  return rest;
}
