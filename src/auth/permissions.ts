import type { ContextRole } from "./types.js";

export const CAPABILITIES = [
  "VIEW_AGENTS",
  "CREATE_AGENTS",
  "EDIT_AGENTS",
  "DELETE_AGENTS",
  "VIEW_TASKS",
  "CREATE_TASKS",
  "EXECUTE_TASKS",
  "CANCEL_TASKS",
  "VIEW_USERS",
  "INVITE_USERS",
  "MANAGE_USERS",
  "VIEW_AUDIT_LOGS",
  "VIEW_ORG_SETTINGS",
  "MANAGE_ORG_SETTINGS"
] as const;

export type Capability = (typeof CAPABILITIES)[number];

const GUEST: readonly Capability[] = ["VIEW_AGENTS", "VIEW_TASKS"];

const VIEWER: readonly Capability[] = [...GUEST, "VIEW_ORG_SETTINGS"];

const ANALYST: readonly Capability[] = [...VIEWER, "VIEW_AUDIT_LOGS"];

const OPERATOR: readonly Capability[] = [...VIEWER, "EXECUTE_TASKS", "CANCEL_TASKS", "VIEW_AUDIT_LOGS"];

const DEVELOPER: readonly Capability[] = [
  ...VIEWER,
  "CREATE_AGENTS",
  "EDIT_AGENTS",
  "CREATE_TASKS",
  "EXECUTE_TASKS",
  "CANCEL_TASKS"
];

const MANAGER: readonly Capability[] = [...DEVELOPER, "VIEW_USERS", "INVITE_USERS", "VIEW_AUDIT_LOGS"];

const ADMIN: readonly Capability[] = [...MANAGER, "DELETE_AGENTS", "MANAGE_USERS"];

/**
 * Role to capability table. This is the only place capabilities are granted;
 * the HTTP layer and any UI affordances read from it.
 */
export const ROLE_CAPABILITIES: Readonly<Partial<Record<ContextRole, ReadonlySet<Capability>>>> = {
  owner: new Set(CAPABILITIES),
  admin: new Set(ADMIN),
  manager: new Set(MANAGER),
  developer: new Set(DEVELOPER),
  analyst: new Set(ANALYST),
  operator: new Set(OPERATOR),
  viewer: new Set(VIEWER),
  guest: new Set(GUEST)
};

const NO_CAPABILITIES: ReadonlySet<Capability> = new Set();

export function capabilitiesFor(role: ContextRole): ReadonlySet<Capability> {
  return ROLE_CAPABILITIES[role] ?? NO_CAPABILITIES;
}

export function hasCapability(role: ContextRole, capability: Capability): boolean {
  return capabilitiesFor(role).has(capability);
}

export function isCapabilitySubset(lesser: ContextRole, greater: ContextRole): boolean {
  const granted = capabilitiesFor(greater);
  return [...capabilitiesFor(lesser)].every((capability) => granted.has(capability));
}

/** An actor may hand out a role only if it already holds everything that role holds. */
export function canGrantRole(actor: ContextRole, target: ContextRole): boolean {
  if (target === "owner") return actor === "owner";
  return isCapabilitySubset(target, actor);
}

export function toCapability(value: unknown): Capability | null {
  if (typeof value !== "string") return null;
  return CAPABILITIES.find((capability) => capability === value) ?? null;
}

export function describePermissionTable(): Record<string, Capability[]> {
  return Object.fromEntries(
    Object.entries(ROLE_CAPABILITIES).map(([role, capabilities]) => [role, [...(capabilities ?? [])]])
  );
}
