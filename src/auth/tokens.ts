import jwt from "jsonwebtoken";
import { AuthenticationError } from "../domain/errors.js";
import type { AuthConfig } from "./config.js";
import { toRole, type AccessTokenClaims, type RefreshTokenClaims } from "./types.js";

const AUTH_ALGORITHMS: jwt.Algorithm[] = ["HS256"];

type SignerConfig = Pick<AuthConfig, "signingKey" | "accessTokenTtlSeconds" | "refreshTokenTtlSeconds">;

function seconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function readString(payload: jwt.JwtPayload, key: string): string | null {
  const value = payload[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

export class TokenSigner {
  constructor(
    private readonly config: SignerConfig,
    private readonly now: () => Date = () => new Date()
  ) {}

  get accessTokenTtlSeconds(): number {
    return this.config.accessTokenTtlSeconds;
  }

  signAccess(claims: Omit<AccessTokenClaims, "typ">): string {
    return jwt.sign(
      { tenant_id: claims.tenant_id, role: claims.role, sid: claims.sid, typ: "access", iat: seconds(this.now()) },
      this.config.signingKey,
      { algorithm: "HS256", subject: claims.sub, expiresIn: this.config.accessTokenTtlSeconds }
    );
  }

  signRefresh(claims: Omit<RefreshTokenClaims, "typ">): string {
    return jwt.sign(
      { tenant_id: claims.tenant_id, sid: claims.sid, typ: "refresh", iat: seconds(this.now()) },
      this.config.signingKey,
      { algorithm: "HS256", subject: claims.sub, jwtid: claims.jti, expiresIn: this.config.refreshTokenTtlSeconds }
    );
  }

  private decode(token: string): jwt.JwtPayload {
    let decoded: jwt.JwtPayload | string;
    try {
      decoded = jwt.verify(token, this.config.signingKey, {
        algorithms: AUTH_ALGORITHMS,
        clockTimestamp: seconds(this.now())
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new AuthenticationError("EXPIRED_TOKEN", "Token has expired");
      }
      throw new AuthenticationError("INVALID_TOKEN", "Token signature or format is invalid");
    }
    if (typeof decoded !== "object" || decoded === null) {
      throw new AuthenticationError("INVALID_TOKEN", "Token payload is not an object");
    }
    return decoded;
  }

  verifyAccess(token: string): AccessTokenClaims {
    const payload = this.decode(token);
    const sub = readString(payload, "sub");
    const tenant_id = readString(payload, "tenant_id");
    const sid = readString(payload, "sid");
    const role = toRole(payload.role);
    if (payload.typ !== "access" || !sub || !tenant_id || !sid || !role) {
      throw new AuthenticationError("INVALID_TOKEN", "Access token is missing required claims");
    }
    return { sub, tenant_id, role, sid, typ: "access" };
  }

  verifyRefresh(token: string): RefreshTokenClaims {
    const payload = this.decode(token);
    const sub = readString(payload, "sub");
    const tenant_id = readString(payload, "tenant_id");
    const sid = readString(payload, "sid");
    const jti = readString(payload, "jti");
    if (payload.typ !== "refresh" || !sub || !tenant_id || !sid || !jti) {
      throw new AuthenticationError("INVALID_TOKEN", "Refresh token is missing required claims");
    }
    return { sub, tenant_id, sid, jti, typ: "refresh" };
  }
}
