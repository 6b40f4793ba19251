import { readPositiveInt } from "../auth/config.js";
import type { TenantLimits, TenantTier } from "../domain/types.js";

const DEFAULT_TIER_LIMITS: Record<TenantTier, TenantLimits> = {
  free: { max_agents: 3, max_tasks_per_hour: 100 },
  basic: { max_agents: 10, max_tasks_per_hour: 1000 },
  professional: { max_agents: 50, max_tasks_per_hour: 10_000 },
  enterprise: { max_agents: 500, max_tasks_per_hour: 100_000 }
};

/** Tier defaults, overridable through TIER_<TIER>_MAX_AGENTS / TIER_<TIER>_MAX_TASKS_PER_HOUR. */
export function limitsForTier(tier: TenantTier): TenantLimits {
  const defaults = DEFAULT_TIER_LIMITS[tier];
  const prefix = `TIER_${tier.toUpperCase()}`;
  return {
    max_agents: readPositiveInt(process.env[`${prefix}_MAX_AGENTS`], defaults.max_agents),
    max_tasks_per_hour: readPositiveInt(process.env[`${prefix}_MAX_TASKS_PER_HOUR`], defaults.max_tasks_per_hour)
  };
}
