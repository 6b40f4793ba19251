import assert from "node:assert/strict";
import test from "node:test";
import { createSystemContext, isSameTenant, resolveTenantContext } from "./context.js";

test("resolveTenantContext copies the principal into a frozen scope", () => {
  const context = resolveTenantContext({
    subject: "user-1",
    role: "developer",
    tenant_id: "tenant-a",
    session_id: "session-1"
  });

  assert.deepEqual(context, {
    tenant_id: "tenant-a",
    actor_id: "user-1",
    role: "developer",
    session_id: "session-1"
  });
  assert.equal(Object.isFrozen(context), true);
});

test("createSystemContext marks worker actors", () => {
  const context = createSystemContext("tenant-b", "worker-2");
  assert.equal(context.actor_id, "system:worker-2");
  assert.equal(context.role, "system");
  assert.equal(context.session_id, null);
});

test("isSameTenant only matches the exact tenant id", () => {
  const context = createSystemContext("tenant-a", "w");
  assert.equal(isSameTenant(context, "tenant-a"), true);
  assert.equal(isSameTenant(context, "tenant-b"), false);
  assert.equal(isSameTenant(context, undefined), false);
});
