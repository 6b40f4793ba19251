const WEAK_SECRETS = new Set(["changeme", "secret", "dev-secret", "123456", "password"]);
const MIN_SECRET_LENGTH = 32;

const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 15 * 60;
const DEFAULT_REFRESH_TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60;
const DEFAULT_INVITATION_TTL_DAYS = 7;

export interface AuthConfig {
  signingKey: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  invitationTtlDays: number;
}

export function readPositiveInt(value: string | undefined, fallback: number): number {
  if (!value?.trim()) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function validateSecurityConfig(): void {
  const secret = process.env.AUTH_JWT_SECRET?.trim();
  if (!secret) {
    throw new Error("Missing AUTH_JWT_SECRET. Set a strong secret (>= 32 chars).");
  }

  if (secret.length < MIN_SECRET_LENGTH) {
    throw new Error(`AUTH_JWT_SECRET is too short. Minimum length is ${MIN_SECRET_LENGTH} characters.`);
  }

  if (WEAK_SECRETS.has(secret.toLowerCase())) {
    throw new Error("AUTH_JWT_SECRET is weak. Use a high-entropy value.");
  }
}

export function getAuthConfig(): AuthConfig {
  validateSecurityConfig();
  return {
    signingKey: process.env.AUTH_JWT_SECRET?.trim() ?? "",
    accessTokenTtlSeconds: readPositiveInt(process.env.AUTH_ACCESS_TOKEN_TTL_SECONDS, DEFAULT_ACCESS_TOKEN_TTL_SECONDS),
    refreshTokenTtlSeconds: readPositiveInt(process.env.AUTH_REFRESH_TOKEN_TTL_SECONDS, DEFAULT_REFRESH_TOKEN_TTL_SECONDS),
    invitationTtlDays: readPositiveInt(process.env.AUTH_INVITATION_TTL_DAYS, DEFAULT_INVITATION_TTL_DAYS)
  };
}
