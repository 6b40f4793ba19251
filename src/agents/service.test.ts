import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { AuditLog } from "../audit/store.js";
import { AppError, NotFoundError } from "../domain/errors.js";
import { resolveTenantContext } from "../tenancy/context.js";
import { TenantStore } from "../tenants/store.js";
import { AgentService } from "./service.js";

const dataRoot = await mkdtemp(path.join(tmpdir(), "taskgate-agents-test-"));
const tenants = new TenantStore(dataRoot);
const audit = new AuditLog(dataRoot);
const agents = new AgentService({ tenants, audit }, dataRoot);

test.after(async () => {
  await rm(dataRoot, { recursive: true, force: true });
});

const tenantA = await tenants.create({ name: "Tenant A", tier: "free" });
const tenantB = await tenants.create({ name: "Tenant B", tier: "basic" });
const ctxA = resolveTenantContext({ subject: "usr_a", role: "developer", tenant_id: tenantA.id, session_id: "ses_a" });
const ctxB = resolveTenantContext({ subject: "usr_b", role: "owner", tenant_id: tenantB.id, session_id: "ses_b" });

function hasCode(code: string) {
  return (error: unknown) => error instanceof AppError && error.code === code;
}

test("agents are created idle in the caller's tenant and audited", async () => {
  const agent = await agents.create(ctxA, { name: "Summarizer", agent_type: "nlp" });
  assert.equal(agent.tenant_id, tenantA.id);
  assert.equal(agent.status, "idle");
  assert.equal(agent.created_by, "usr_a");
  assert.deepEqual(agent.config, {});

  const [entry] = await audit.list(ctxA, { event: "agent.created" });
  assert.equal(entry?.target_id, agent.id);
});

test("names are unique per tenant regardless of case", async () => {
  await assert.rejects(() => agents.create(ctxA, { name: "summarizer" }), hasCode("DUPLICATE_AGENT"));
  const other = await agents.create(ctxB, { name: "Summarizer" });
  assert.equal(other.tenant_id, tenantB.id);
});

test("another tenant's agent reads as not found", async () => {
  const [agent] = await agents.list(ctxA);
  assert.ok(agent);
  await assert.rejects(() => agents.get(ctxB, agent.id), NotFoundError);
  await assert.rejects(() => agents.update(ctxB, agent.id, { name: "Hijacked" }), NotFoundError);
  await assert.rejects(() => agents.terminate(ctxB, agent.id), NotFoundError);
  assert.equal((await agents.get(ctxA, agent.id)).name, "Summarizer");
});

test("a body tenant_id naming another tenant is rejected", async () => {
  await assert.rejects(
    () => agents.create(ctxA, { name: "Smuggled", tenant_id: tenantB.id }),
    hasCode("TENANT_NOT_FOUND")
  );
});

test("the free tier stops at three live agents and terminated ones do not count", async () => {
  await agents.create(ctxA, { name: "Second" });
  const third = await agents.create(ctxA, { name: "Third" });
  await assert.rejects(() => agents.create(ctxA, { name: "Fourth" }), hasCode("AGENT_LIMIT_REACHED"));

  const terminated = await agents.terminate(ctxA, third.id);
  assert.equal(terminated.status, "terminated");
  const fourth = await agents.create(ctxA, { name: "Fourth" });
  assert.equal(fourth.status, "idle");
});

test("terminated agents stay readable but cannot be modified", async () => {
  const terminated = await agents.list(ctxA, { status: "terminated" });
  assert.equal(terminated.length, 1);
  const [agent] = terminated;
  assert.ok(agent);
  await assert.rejects(() => agents.update(ctxA, agent.id, { status: "paused" }), hasCode("VALIDATION_FAILED"));
});

test("update renames and changes status", async () => {
  const created = await agents.list(ctxA, { status: "idle" });
  const second = created.find((agent) => agent.name === "Second");
  assert.ok(second);
  const updated = await agents.update(ctxA, second.id, { name: "Renamed", status: "paused" });
  assert.equal(updated.name, "Renamed");
  assert.equal(updated.status, "paused");
  await assert.rejects(() => agents.update(ctxA, second.id, { name: "FOURTH" }), hasCode("DUPLICATE_AGENT"));
});
