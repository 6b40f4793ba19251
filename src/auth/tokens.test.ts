import assert from "node:assert/strict";
import test from "node:test";
import jwt from "jsonwebtoken";
import { AuthenticationError } from "../domain/errors.js";
import { TokenSigner } from "./tokens.js";

const SIGNING_KEY = "test-secret-that-is-long-enough-for-hs256-use";

function createSigner(clock: { now: Date }): TokenSigner {
  return new TokenSigner(
    { signingKey: SIGNING_KEY, accessTokenTtlSeconds: 60, refreshTokenTtlSeconds: 3600 },
    () => clock.now
  );
}

test("access tokens round-trip their claims", () => {
  const clock = { now: new Date("2026-01-01T00:00:00Z") };
  const signer = createSigner(clock);
  const token = signer.signAccess({ sub: "user-1", tenant_id: "tenant-a", role: "admin", sid: "family-1" });

  assert.deepEqual(signer.verifyAccess(token), {
    sub: "user-1",
    tenant_id: "tenant-a",
    role: "admin",
    sid: "family-1",
    typ: "access"
  });
});

test("expired access tokens report EXPIRED_TOKEN", () => {
  const clock = { now: new Date("2026-01-01T00:00:00Z") };
  const signer = createSigner(clock);
  const token = signer.signAccess({ sub: "user-1", tenant_id: "tenant-a", role: "admin", sid: "family-1" });

  clock.now = new Date("2026-01-01T00:02:00Z");
  assert.throws(
    () => signer.verifyAccess(token),
    (error: unknown) => error instanceof AuthenticationError && error.code === "EXPIRED_TOKEN"
  );
});

test("refresh tokens are not accepted as access tokens", () => {
  const clock = { now: new Date("2026-01-01T00:00:00Z") };
  const signer = createSigner(clock);
  const refresh = signer.signRefresh({ sub: "user-1", tenant_id: "tenant-a", sid: "family-1", jti: "rot-1" });

  assert.equal(signer.verifyRefresh(refresh).jti, "rot-1");
  assert.throws(
    () => signer.verifyAccess(refresh),
    (error: unknown) => error instanceof AuthenticationError && error.code === "INVALID_TOKEN"
  );
});

test("tokens signed with another key are INVALID_TOKEN", () => {
  const clock = { now: new Date() };
  const signer = createSigner(clock);
  const forged = jwt.sign(
    { tenant_id: "tenant-a", role: "owner", sid: "family-1", typ: "access" },
    "another-secret-that-is-also-long-enough-here",
    { algorithm: "HS256", subject: "user-1", expiresIn: 60 }
  );

  assert.throws(
    () => signer.verifyAccess(forged),
    (error: unknown) => error instanceof AuthenticationError && error.code === "INVALID_TOKEN"
  );
});
