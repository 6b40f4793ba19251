import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { AgentService } from "../agents/service.js";
import { AuditLog } from "../audit/store.js";
import { AppError, NotFoundError } from "../domain/errors.js";
import { resolveTenantContext } from "../tenancy/context.js";
import { TenantStore } from "../tenants/store.js";
import { TaskDispatcher } from "./dispatcher.js";
import { TaskLifecycleManager } from "./lifecycle.js";
import { QuotaTracker } from "./quota.js";
import { TaskStore } from "./store.js";

process.env.LOG_LEVEL = "silent";

const root = await mkdtemp(path.join(tmpdir(), "taskgate-lifecycle-test-"));
let harnessCount = 0;

test.after(async () => {
  await rm(root, { recursive: true, force: true });
});

function hasCode(code: string) {
  return (error: unknown) => error instanceof AppError && error.code === code;
}

/** Sleeps until the signal aborts, like a dispatch that never finishes on its own. */
function blockUntilAborted(_ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")));
  });
}

async function harness() {
  harnessCount += 1;
  const dataRoot = path.join(root, `h${harnessCount}`);
  const clock = { now: new Date("2026-05-01T12:00:00.000Z") };
  const tenants = new TenantStore(dataRoot);
  const audit = new AuditLog(dataRoot);
  const agents = new AgentService({ tenants, audit }, dataRoot);
  const quota = new QuotaTracker(60 * 60 * 1000);
  const lifecycle = new TaskLifecycleManager({
    store: new TaskStore(dataRoot),
    agents,
    tenants,
    audit,
    dispatcher: new TaskDispatcher({ sleep: blockUntilAborted }),
    quota,
    retryPolicy: { baseDelayMs: 1000, maxDelayMs: 300_000 },
    now: () => clock.now
  });

  const tenant = await tenants.create({ name: `Tenant ${harnessCount}`, tier: "free" });
  const other = await tenants.create({ name: `Other ${harnessCount}`, tier: "free" });
  const ctx = resolveTenantContext({ subject: "usr_dev", role: "developer", tenant_id: tenant.id, session_id: "ses_1" });
  const otherCtx = resolveTenantContext({ subject: "usr_other", role: "owner", tenant_id: other.id, session_id: "ses_2" });
  const agent = await agents.create(ctx, { name: "Worker agent" });

  const advance = (ms: number) => {
    clock.now = new Date(clock.now.getTime() + ms);
  };
  return { lifecycle, audit, agents, quota, tenant, ctx, otherCtx, agent, clock, advance };
}

test("a claimed task runs to completed with every transition recorded", async () => {
  const h = await harness();
  const task = await h.lifecycle.createTask(h.ctx, {
    agent_id: h.agent.id,
    task_type: "text_processing",
    input: { operation: "uppercase", text: "ship it" }
  });
  assert.equal(task.status, "pending");
  assert.equal(task.priority, 5);
  assert.equal(task.max_retries, 3);
  assert.equal(task.timeout_seconds, 300);

  const claim = await h.lifecycle.claimNext("w1");
  assert.ok(claim);
  assert.equal(claim.task.id, task.id);
  assert.equal(claim.lease.worker_id, "w1");
  assert.equal(claim.lease.expires_at, "2026-05-01T12:05:00.000Z");

  const done = await h.lifecycle.execute(claim);
  assert.equal(done.status, "completed");
  assert.deepEqual(done.output, { operation: "uppercase", result: "SHIP IT" });
  assert.equal(done.lease, null);
  assert.deepEqual(
    done.history.map((step) => step.to),
    ["pending", "running", "completed"]
  );

  const audited = await h.audit.list(h.ctx, { event: "task.transition", target_id: task.id });
  assert.deepEqual(
    audited.map((entry) => `${entry.from_status ?? "-"}>${entry.to_status ?? "-"}`),
    ["running>completed", "pending>running", "->pending"]
  );
});

test("max_retries=3 dispatches three times and the third failure is terminal", async () => {
  const h = await harness();
  const task = await h.lifecycle.createTask(h.ctx, {
    agent_id: h.agent.id,
    task_type: "text_processing",
    input: { operation: "reverse", text: "abc" },
    max_retries: 3
  });

  const statuses: string[] = [];
  const retryCounts: number[] = [];
  for (let attempt = 1; attempt <= 3; attempt += 1) {
    const claim = await h.lifecycle.claimNext("w1");
    assert.ok(claim, `attempt ${attempt} should be claimable`);
    const settled = await h.lifecycle.execute(claim);
    statuses.push(settled.status);
    retryCounts.push(settled.retry_count);
    if (attempt === 1) {
      assert.equal(settled.ready_at, new Date(h.clock.now.getTime() + 1000).toISOString());
      assert.equal(await h.lifecycle.claimNext("w1"), null);
    }
    h.advance(10 * 60 * 1000);
  }

  assert.deepEqual(statuses, ["pending", "pending", "failed"]);
  assert.deepEqual(retryCounts, [1, 2, 3]);

  const final = await h.lifecycle.getTask(h.ctx, task.id);
  assert.equal(final.status, "failed");
  assert.notEqual(final.completed_at, null);
  const error = { code: "UNSUPPORTED_OPERATION", message: "Unsupported text operation: reverse" };
  assert.deepEqual(final.last_error, error);
  assert.deepEqual(final.output, { error });
  assert.equal(await h.lifecycle.claimNext("w1"), null);
  assert.deepEqual(
    final.history.map((step) => step.to),
    ["pending", "running", "failed", "pending", "running", "failed", "pending", "running", "failed"]
  );
  assert.deepEqual(
    final.history.filter((step) => step.to === "pending" && step.from === "failed").map((step) => step.reason),
    ["retry 1/3", "retry 2/3"]
  );
});

test("concurrent execution requests on one task have exactly one winner", async () => {
  const h = await harness();
  const task = await h.lifecycle.createTask(h.ctx, {
    agent_id: h.agent.id,
    task_type: "text_processing",
    input: { operation: "echo", text: "once" }
  });

  const attempts = await Promise.allSettled(
    ["w1", "w2", "w3", "w4", "w5"].map((worker) => h.lifecycle.requestExecution(h.ctx, task.id, worker))
  );
  const winners = attempts.filter((attempt) => attempt.status === "fulfilled");
  const losers = attempts.filter((attempt) => attempt.status === "rejected");
  assert.equal(winners.length, 1);
  assert.equal(losers.length, 4);
  for (const loser of losers) {
    assert.ok(loser.status === "rejected" && hasCode("INVALID_TRANSITION")(loser.reason));
  }

  const rejected = await h.audit.list(h.ctx, { event: "task.transition_rejected", target_id: task.id });
  assert.equal(rejected.length, 4);
  assert.equal(rejected[0]?.from_status, "running");
  assert.equal(rejected[0]?.to_status, "running");
});

test("concurrent scheduler claims hand one task to one worker", async () => {
  const h = await harness();
  await h.lifecycle.createTask(h.ctx, {
    agent_id: h.agent.id,
    task_type: "text_processing",
    input: { operation: "echo", text: "once" }
  });

  const claims = await Promise.all(["w1", "w2", "w3"].map((worker) => h.lifecycle.claimNext(worker)));
  assert.equal(claims.filter((claim) => claim !== null).length, 1);
});

test("the scheduler takes higher priority first, then the oldest", async () => {
  const h = await harness();
  const input = { operation: "echo", text: "x" };
  const low = await h.lifecycle.createTask(h.ctx, { agent_id: h.agent.id, task_type: "text_processing", input, priority: 2 });
  h.advance(1);
  const highOld = await h.lifecycle.createTask(h.ctx, { agent_id: h.agent.id, task_type: "text_processing", input, priority: 9 });
  h.advance(1);
  const highNew = await h.lifecycle.createTask(h.ctx, { agent_id: h.agent.id, task_type: "text_processing", input, priority: 9 });

  const order: string[] = [];
  for (let i = 0; i < 3; i += 1) {
    const claim = await h.lifecycle.claimNext("w1");
    assert.ok(claim);
    order.push(claim.task.id);
  }
  assert.deepEqual(order, [highOld.id, highNew.id, low.id]);
});

test("a dispatch that outlives its timeout fails through lease expiry", async () => {
  const h = await harness();
  const task = await h.lifecycle.createTask(h.ctx, {
    agent_id: h.agent.id,
    task_type: "workflow",
    input: { steps: [{ type: "delay", ms: 10_000 }] },
    timeout_seconds: 5,
    max_retries: 0
  });

  const claim = await h.lifecycle.claimNext("w1");
  assert.ok(claim);
  const execution = h.lifecycle.execute(claim);
  assert.equal(h.lifecycle.isExecuting(task.id), true);

  h.advance(4_000);
  assert.deepEqual(await h.lifecycle.reclaimExpiredLeases(), []);

  h.advance(2_000);
  const reclaimed = await h.lifecycle.reclaimExpiredLeases();
  assert.deepEqual(
    reclaimed.map((row) => row.id),
    [task.id]
  );

  const settled = await execution;
  assert.equal(settled.status, "failed");
  assert.equal(settled.last_error?.code, "LEASE_EXPIRED");
  assert.equal(settled.lease, null);
  assert.equal(h.lifecycle.isExecuting(task.id), false);
  const last = settled.history[settled.history.length - 1];
  assert.deepEqual(last && { from: last.from, to: last.to, reason: last.reason }, {
    from: "running",
    to: "failed",
    reason: "LEASE_EXPIRED"
  });
});

test("a result reported after the lease ran out is rejected", async () => {
  const h = await harness();
  await h.lifecycle.createTask(h.ctx, {
    agent_id: h.agent.id,
    task_type: "text_processing",
    input: { operation: "echo", text: "late" },
    timeout_seconds: 1
  });
  const claim = await h.lifecycle.claimNext("w1");
  assert.ok(claim);

  h.advance(1_500);
  await assert.rejects(() => h.lifecycle.complete(claim, { late: true }), hasCode("LEASE_EXPIRED"));
});

test("cancelling a pending task is immediate and final", async () => {
  const h = await harness();
  const task = await h.lifecycle.createTask(h.ctx, {
    agent_id: h.agent.id,
    task_type: "text_processing",
    input: { operation: "echo", text: "never" }
  });

  const cancelled = await h.lifecycle.cancel(h.ctx, task.id);
  assert.equal(cancelled.status, "cancelled");
  assert.notEqual(cancelled.completed_at, null);

  await assert.rejects(() => h.lifecycle.cancel(h.ctx, task.id), hasCode("INVALID_TRANSITION"));
  await assert.rejects(() => h.lifecycle.requestExecution(h.ctx, task.id, "w1"), hasCode("INVALID_TRANSITION"));
  assert.equal(await h.lifecycle.claimNext("w1"), null);
});

test("cancelling a running task aborts the dispatch and settles it as cancelled", async () => {
  const h = await harness();
  const task = await h.lifecycle.createTask(h.ctx, {
    agent_id: h.agent.id,
    task_type: "workflow",
    input: { steps: [{ type: "log", message: "start" }, { type: "delay", ms: 30_000 }] }
  });
  const request = await h.lifecycle.requestExecution(h.ctx, task.id, "w1");
  assert.equal(request.status, "started");
  assert.ok(request.status === "started");
  const execution = h.lifecycle.execute(request.claim);

  const marked = await h.lifecycle.cancel(h.ctx, task.id);
  assert.equal(marked.status, "running");
  assert.equal(marked.cancel_requested_at, h.clock.now.toISOString());

  const settled = await execution;
  assert.equal(settled.status, "cancelled");
  assert.equal(settled.retry_count, 0);

  const [requested] = await h.audit.list(h.ctx, { event: "task.cancel_requested" });
  assert.equal(requested?.target_id, task.id);
});

test("an exhausted quota defers the task instead of rejecting it", async () => {
  const h = await harness();
  for (let i = 0; i < h.tenant.limits.max_tasks_per_hour; i += 1) {
    h.quota.tryAcquire(h.tenant.id, h.tenant.limits.max_tasks_per_hour, h.clock.now);
  }
  const task = await h.lifecycle.createTask(h.ctx, {
    agent_id: h.agent.id,
    task_type: "text_processing",
    input: { operation: "echo", text: "later" }
  });

  const request = await h.lifecycle.requestExecution(h.ctx, task.id, "w1");
  assert.equal(request.status, "deferred");
  assert.equal(request.task.status, "pending");
  assert.equal(request.task.ready_at, "2026-05-01T13:00:00.000Z");
  assert.equal(await h.lifecycle.claimNext("w1"), null);

  const [entry] = await h.audit.list(h.ctx, { event: "task.quota_deferred" });
  assert.equal(entry?.reason, "QUOTA_EXCEEDED");

  h.advance(60 * 60 * 1000);
  const claim = await h.lifecycle.claimNext("w1");
  assert.equal(claim?.task.id, task.id);
});

test("another tenant's task reads as not found", async () => {
  const h = await harness();
  const task = await h.lifecycle.createTask(h.ctx, {
    agent_id: h.agent.id,
    task_type: "text_processing",
    input: { operation: "echo", text: "mine" }
  });

  await assert.rejects(() => h.lifecycle.getTask(h.otherCtx, task.id), NotFoundError);
  await assert.rejects(() => h.lifecycle.cancel(h.otherCtx, task.id), NotFoundError);
  await assert.rejects(() => h.lifecycle.requestExecution(h.otherCtx, task.id, "w1"), NotFoundError);
  assert.deepEqual(await h.lifecycle.listTasks(h.otherCtx), []);
  await assert.rejects(
    () =>
      h.lifecycle.createTask(h.otherCtx, {
        agent_id: h.agent.id,
        task_type: "text_processing",
        input: { operation: "echo", text: "borrowed agent" }
      }),
    NotFoundError
  );
});

test("tasks cannot target a terminated agent", async () => {
  const h = await harness();
  await h.agents.terminate(h.ctx, h.agent.id);
  await assert.rejects(
    () =>
      h.lifecycle.createTask(h.ctx, {
        agent_id: h.agent.id,
        task_type: "text_processing",
        input: { operation: "echo", text: "x" }
      }),
    hasCode("VALIDATION_FAILED")
  );
});
