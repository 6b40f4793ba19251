import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { AuditLog } from "../audit/store.js";
import { AuthorizationError, NotFoundError } from "../domain/errors.js";
import { resolveTenantContext } from "./context.js";
import { AuthorizationGuard } from "./guard.js";

const dataRoot = await mkdtemp(path.join(tmpdir(), "taskgate-guard-test-"));
const audit = new AuditLog(dataRoot);
const guard = new AuthorizationGuard(audit);

test.after(async () => {
  await rm(dataRoot, { recursive: true, force: true });
});

const owner = resolveTenantContext({ subject: "owner-a", role: "owner", tenant_id: "tenant-a", session_id: "s1" });
const viewer = resolveTenantContext({ subject: "viewer-a", role: "viewer", tenant_id: "tenant-a", session_id: "s2" });

test("allows a held capability inside the caller's tenant", async () => {
  assert.deepEqual(await guard.check(viewer, "VIEW_AGENTS", "tenant-a"), { allowed: true });
});

test("denies a missing capability with PERMISSION_DENIED", async () => {
  assert.deepEqual(await guard.check(viewer, "CREATE_AGENTS", "tenant-a"), {
    allowed: false,
    reason: "PERMISSION_DENIED"
  });
});

test("denies cross-tenant access even for owners", async () => {
  assert.deepEqual(await guard.check(owner, "VIEW_AGENTS", "tenant-b"), {
    allowed: false,
    reason: "TENANT_MISMATCH"
  });
});

test("authorize maps tenant mismatch to not found and missing capability to 403", async () => {
  await assert.rejects(() => guard.authorize(owner, "VIEW_TASKS", "tenant-b"), NotFoundError);
  await assert.rejects(
    () => guard.authorize(viewer, "DELETE_AGENTS", "tenant-a", { type: "agent", id: "agt-1" }),
    (error: unknown) => error instanceof AuthorizationError && error.code === "PERMISSION_DENIED" && error.status === 403
  );
});

test("every decision is audit-logged with its outcome", async () => {
  await guard.check(viewer, "VIEW_AUDIT_LOGS", "tenant-a", { type: "audit_log" });
  const rows = await audit.list(owner, { target_type: "audit_log" });

  assert.equal(rows.length, 1);
  assert.equal(rows[0]?.outcome, "denied");
  assert.equal(rows[0]?.capability, "VIEW_AUDIT_LOGS");
  assert.equal(rows[0]?.reason, "PERMISSION_DENIED");
  assert.equal(rows[0]?.actor_id, "viewer-a");
});
