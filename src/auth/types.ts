export const AUTH_ROLES = ["owner", "admin", "manager", "developer", "analyst", "operator", "viewer", "guest"] as const;

export type AuthRole = (typeof AUTH_ROLES)[number];

/** Role carried by scheduler-internal contexts; it holds no capabilities. */
export type ContextRole = AuthRole | "system";

export interface AuthPrincipal {
  subject: string;
  role: AuthRole;
  tenant_id: string;
  session_id: string;
}

export interface AccessTokenClaims {
  sub: string;
  tenant_id: string;
  role: AuthRole;
  sid: string;
  typ: "access";
}

export interface RefreshTokenClaims {
  sub: string;
  tenant_id: string;
  sid: string;
  jti: string;
  typ: "refresh";
}

export interface TokenPair {
  access_token: string;
  refresh_token: string;
  token_type: "Bearer";
  expires_in: number;
}

export function toRole(value: unknown): AuthRole | null {
  if (typeof value !== "string") return null;
  return AUTH_ROLES.find((role) => role === value) ?? null;
}
