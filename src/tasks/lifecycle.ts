import { nanoid } from "nanoid";
import type { AgentService } from "../agents/service.js";
import type { AuditLog } from "../audit/store.js";
import { LifecycleError, NotFoundError, ValidationError } from "../domain/errors.js";
import { logInfo, logWarn } from "../observability/logger.js";
import { recordLeaseReclaim, recordQuotaDeferral, recordTaskDispatch, recordTaskTransition } from "../observability/metrics.js";
import { publishEvent } from "../services/eventBus.js";
import { createSystemContext, type TenantContext } from "../tenancy/context.js";
import type { TenantStore } from "../tenants/store.js";
import { retryDelayMs, type RetryPolicy } from "./backoff.js";
import { ABORT_CANCELLED, ABORT_TIMEOUT, type DispatchResult, type TaskDispatcher } from "./dispatcher.js";
import type { QuotaTracker } from "./quota.js";
import { createTaskSchema, type CreateTaskInput, type TaskSpec } from "./schemas.js";
import { applyTransition, assertTransition, hasRetriesLeft, type TransitionRecord } from "./stateMachine.js";
import type { TaskFilter, TaskStore } from "./store.js";
import type { Task, TaskClaim, TaskError, TaskStatus } from "./types.js";

export interface LifecycleDeps {
  store: TaskStore;
  agents: AgentService;
  tenants: TenantStore;
  audit: AuditLog;
  dispatcher: TaskDispatcher;
  quota: QuotaTracker;
  retryPolicy: RetryPolicy;
  now?: () => Date;
}

export type ExecutionRequest =
  | { status: "started"; task: Task; claim: TaskClaim }
  | { status: "deferred"; task: Task; retry_at: string };

type Admission =
  | { kind: "claimed"; claim: TaskClaim; transition: TransitionRecord }
  | { kind: "deferred"; task: Task; retry_at: string };

const MAX_LIST_LIMIT = 1000;
const REAPER_ID = "lease-reaper";

function specOf(spec: TaskSpec): TaskSpec {
  switch (spec.task_type) {
    case "text_processing":
      return { task_type: spec.task_type, input: spec.input };
    case "api_call":
      return { task_type: spec.task_type, input: spec.input };
    case "workflow":
      return { task_type: spec.task_type, input: spec.input };
  }
}

function systemActor(worker_id: string): string {
  return `system:${worker_id}`;
}

/**
 * Sole writer of task status. Every transition goes through the state
 * machine inside the task store's lock and is then audited, counted and
 * published.
 */
export class TaskLifecycleManager {
  private readonly now: () => Date;
  private readonly executions = new Map<string, AbortController>();

  constructor(private readonly deps: LifecycleDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async createTask(context: TenantContext, input: CreateTaskInput): Promise<Task> {
    const parsed = createTaskSchema.parse(input);
    if (parsed.tenant_id !== undefined && parsed.tenant_id !== context.tenant_id) {
      throw new NotFoundError("Agent not found");
    }
    const agent = await this.deps.agents.get(context, parsed.agent_id);
    if (agent.status === "terminated") {
      throw new ValidationError("Agent is terminated", [{ path: ["agent_id"], message: "Agent is terminated" }]);
    }

    const at = this.now().toISOString();
    const task: Task = {
      id: `tsk_${nanoid(12)}`,
      tenant_id: context.tenant_id,
      agent_id: agent.id,
      priority: parsed.priority,
      output: null,
      status: "pending",
      retry_count: 0,
      max_retries: parsed.max_retries,
      timeout_seconds: parsed.timeout_seconds,
      ready_at: at,
      lease: null,
      cancel_requested_at: null,
      last_error: null,
      history: [{ from: null, to: "pending", at, actor_id: context.actor_id }],
      created_by: context.actor_id,
      created_at: at,
      started_at: null,
      completed_at: null,
      updated_at: at,
      ...specOf(parsed)
    };

    await this.deps.store.insert(task);
    await this.publish([{ task_id: task.id, tenant_id: task.tenant_id, from: null, to: "pending", at, actor_id: context.actor_id }]);
    return task;
  }

  ownerOf(task_id: string): Promise<string | null> {
    return this.deps.store.ownerOf(task_id);
  }

  async getTask(context: TenantContext, task_id: string): Promise<Task> {
    const task = await this.deps.store.get(context, task_id);
    if (!task) throw new NotFoundError("Task not found");
    return task;
  }

  async listTasks(context: TenantContext, filter: TaskFilter = {}): Promise<Task[]> {
    const limit = Math.min(Math.max(filter.limit ?? 100, 1), MAX_LIST_LIMIT);
    return this.deps.store.list(context, { ...filter, limit });
  }

  /**
   * Explicit claim of one pending task. Retry backoff does not apply here,
   * the tenant quota does: an exhausted quota leaves the task pending with
   * `ready_at` moved to when a slot frees.
   */
  async requestExecution(context: TenantContext, task_id: string, worker_id: string): Promise<ExecutionRequest> {
    const tenant = await this.deps.tenants.get(context);
    const now = this.now();
    const admission = await this.guardTransition(context, task_id, "running", () =>
      this.deps.store.mutate(context, task_id, (task) =>
        this.admit(task, tenant.limits.max_tasks_per_hour, worker_id, now, context.actor_id)
      )
    );

    if (admission.kind === "deferred") {
      await this.recordDeferral(admission.task, admission.retry_at, context.actor_id);
      return { status: "deferred", task: admission.task, retry_at: admission.retry_at };
    }
    await this.publish([admission.transition]);
    return { status: "started", task: admission.claim.task, claim: admission.claim };
  }

  /** Scheduler claim: highest priority, then oldest, among ready tasks of active tenants. */
  async claimNext(worker_id: string): Promise<TaskClaim | null> {
    const now = this.now();
    const tenants = await this.deps.tenants.listActive();
    const limits = new Map(tenants.map((tenant) => [tenant.id, tenant.limits.max_tasks_per_hour]));
    const actor = systemActor(worker_id);

    const { claimed, deferred } = await this.deps.store.mutateAll((rows) => {
      const skipped: Array<{ task: Task; retry_at: string }> = [];
      const eligible = rows
        .filter(
          (row) =>
            row.status === "pending" &&
            row.lease === null &&
            row.cancel_requested_at === null &&
            Date.parse(row.ready_at) <= now.getTime() &&
            limits.has(row.tenant_id)
        )
        .sort((a, b) => b.priority - a.priority || a.created_at.localeCompare(b.created_at));

      for (const task of eligible) {
        const admission = this.admit(task, limits.get(task.tenant_id) ?? 0, worker_id, now, actor);
        if (admission.kind === "claimed") return { claimed: admission, deferred: skipped };
        skipped.push({ task: admission.task, retry_at: admission.retry_at });
      }
      return { claimed: null, deferred: skipped };
    });

    for (const entry of deferred) {
      await this.recordDeferral(entry.task, entry.retry_at, actor);
    }
    if (!claimed) return null;
    await this.publish([claimed.transition]);
    return claimed.claim;
  }

  /**
   * Dispatches a claimed task and settles it. The dispatch is aborted when
   * the lease runs out or a cancel arrives; a result that arrives after the
   * lease was lost is discarded.
   */
  async execute(claim: TaskClaim): Promise<Task> {
    const { task } = claim;
    const context = { tenant_id: task.tenant_id, agent_id: task.agent_id, task_id: task.id };
    const controller = new AbortController();
    this.executions.set(task.id, controller);
    const timer = setTimeout(() => controller.abort(ABORT_TIMEOUT), task.timeout_seconds * 1000);
    timer.unref();

    let result: DispatchResult;
    try {
      result = await this.deps.dispatcher.dispatch(task, { signal: controller.signal, context });
    } finally {
      clearTimeout(timer);
      this.executions.delete(task.id);
    }
    recordTaskDispatch(task.task_type, result.ok ? "ok" : "error");

    try {
      if (controller.signal.aborted && controller.signal.reason === ABORT_TIMEOUT) {
        return await this.expireLease(claim);
      }
      return result.ok ? await this.complete(claim, result.output) : await this.fail(claim, result.error);
    } catch (error) {
      if (error instanceof LifecycleError && error.code === "LEASE_EXPIRED") {
        logWarn("task.result_discarded", { context, data: { lease_id: claim.lease.id, ok: result.ok } });
        return this.getTask(createSystemContext(task.tenant_id, claim.lease.worker_id), task.id);
      }
      throw error;
    }
  }

  async complete(claim: TaskClaim, output: unknown): Promise<Task> {
    return this.settle(claim, true, (task, at, actor_id) => {
      task.output = output;
      task.last_error = null;
      return [applyTransition(task, "completed", { at, actor_id })];
    });
  }

  async fail(claim: TaskClaim, error: TaskError): Promise<Task> {
    return this.settle(claim, true, (task, at, actor_id) => this.recordFailure(task, error, at, actor_id));
  }

  /**
   * Pending tasks are cancelled at once. For a running task the request is
   * recorded, the local dispatch is aborted and the lease holder settles it.
   */
  async cancel(context: TenantContext, task_id: string): Promise<Task> {
    const now = this.now();
    const outcome = await this.guardTransition(context, task_id, "cancelled", () =>
      this.deps.store.mutate(context, task_id, (task) => {
        if (task.status === "running") {
          if (task.cancel_requested_at === null) {
            task.cancel_requested_at = now.toISOString();
            task.updated_at = now.toISOString();
          }
          return { task, transitions: [], requested: true };
        }
        const transition = applyTransition(task, "cancelled", { at: now, actor_id: context.actor_id, reason: "cancelled_by_user" });
        return { task, transitions: [transition], requested: false };
      })
    );

    if (outcome.requested) {
      this.executions.get(task_id)?.abort(ABORT_CANCELLED);
      await this.deps.audit.append({
        tenant_id: context.tenant_id,
        actor_id: context.actor_id,
        event: "task.cancel_requested",
        target_type: "task",
        target_id: task_id,
        outcome: "allowed"
      });
      logInfo("task.cancel_requested", { context: { tenant_id: context.tenant_id, task_id } });
    }
    await this.publish(outcome.transitions);
    return outcome.task;
  }

  /** Fails (or cancels) every running task whose lease has run out. */
  async reclaimExpiredLeases(): Promise<Task[]> {
    const now = this.now();
    const actor = systemActor(REAPER_ID);
    const { reclaimed, transitions } = await this.deps.store.mutateAll((rows) => {
      const reclaimed: Task[] = [];
      const transitions: TransitionRecord[] = [];
      for (const task of rows) {
        const lease = task.lease;
        if (task.status !== "running" || !lease || Date.parse(lease.expires_at) > now.getTime()) continue;
        transitions.push(...this.releaseExpired(task, now, actor));
        reclaimed.push(task);
      }
      return { reclaimed, transitions };
    });

    for (const task of reclaimed) {
      this.executions.get(task.id)?.abort(ABORT_TIMEOUT);
      await this.recordReclaim(task, actor);
    }
    await this.publish(transitions);
    return reclaimed;
  }

  /** Whether this process is currently dispatching the task. */
  isExecuting(task_id: string): boolean {
    return this.executions.has(task_id);
  }

  private async expireLease(claim: TaskClaim): Promise<Task> {
    const actor = systemActor(claim.lease.worker_id);
    const task = await this.settle(claim, false, (task, at) => this.releaseExpired(task, at, actor, false));
    await this.recordReclaim(task, actor);
    return task;
  }

  private releaseExpired(task: Task, at: Date, actor_id: string, clearLease = true): TransitionRecord[] {
    if (clearLease) task.lease = null;
    if (task.cancel_requested_at !== null) {
      return [applyTransition(task, "cancelled", { at, actor_id, reason: "cancel_requested" })];
    }
    const error: TaskError = {
      code: "LEASE_EXPIRED",
      message: `Lease expired after ${task.timeout_seconds}s without a result`
    };
    return this.recordFailure(task, error, at, actor_id);
  }

  private admit(task: Task, limit: number, worker_id: string, now: Date, actor_id: string): Admission {
    assertTransition(task, "running");
    if (task.lease !== null) {
      throw new LifecycleError("INVALID_TRANSITION", "Task is already leased", { task_id: task.id, from: task.status, to: "running" });
    }

    const decision = this.deps.quota.tryAcquire(task.tenant_id, limit, now);
    if (!decision.granted) {
      const retry_at = decision.retry_at.toISOString();
      task.ready_at = retry_at;
      task.updated_at = now.toISOString();
      return { kind: "deferred", task, retry_at };
    }

    const lease = {
      id: nanoid(16),
      worker_id,
      acquired_at: now.toISOString(),
      expires_at: new Date(now.getTime() + task.timeout_seconds * 1000).toISOString()
    };
    task.lease = lease;
    const transition = applyTransition(task, "running", { at: now, actor_id });
    return { kind: "claimed", claim: { task, lease }, transition };
  }

  private recordFailure(task: Task, error: TaskError, at: Date, actor_id: string): TransitionRecord[] {
    task.last_error = error;
    task.retry_count = Math.min(task.retry_count + 1, task.max_retries);
    const retry = hasRetriesLeft(task);
    const records = [applyTransition(task, "failed", { at, actor_id, reason: error.code })];
    if (!retry) {
      task.output = { error };
      return records;
    }
    task.ready_at = new Date(at.getTime() + retryDelayMs(task.retry_count, this.deps.retryPolicy)).toISOString();
    records.push(applyTransition(task, "pending", { at, actor_id, reason: `retry ${task.retry_count}/${task.max_retries}` }));
    return records;
  }

  /**
   * Applies a result for `claim` if its lease still holds. `requireLive`
   * also checks the lease expiry against the clock.
   */
  private async settle(
    claim: TaskClaim,
    requireLive: boolean,
    apply: (task: Task, at: Date, actor_id: string) => TransitionRecord[]
  ): Promise<Task> {
    const now = this.now();
    const actor_id = systemActor(claim.lease.worker_id);
    const context = createSystemContext(claim.task.tenant_id, claim.lease.worker_id);

    const { task, transitions } = await this.deps.store.mutate(context, claim.task.id, (task) => {
      const lease = task.lease;
      if (
        task.status !== "running" ||
        !lease ||
        lease.id !== claim.lease.id ||
        (requireLive && Date.parse(lease.expires_at) <= now.getTime())
      ) {
        throw new LifecycleError("LEASE_EXPIRED", "Lease is no longer held", { task_id: task.id, lease_id: claim.lease.id });
      }
      task.lease = null;
      if (task.cancel_requested_at !== null) {
        return { task, transitions: [applyTransition(task, "cancelled", { at: now, actor_id, reason: "cancel_requested" })] };
      }
      return { task, transitions: apply(task, now, actor_id) };
    });

    await this.publish(transitions);
    return task;
  }

  private async guardTransition<R>(
    context: TenantContext,
    task_id: string,
    attempted: TaskStatus,
    operation: () => Promise<R>
  ): Promise<R> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof LifecycleError && error.code === "INVALID_TRANSITION") {
        const from = error.details?.from;
        await this.deps.audit.append({
          tenant_id: context.tenant_id,
          actor_id: context.actor_id,
          event: "task.transition_rejected",
          target_type: "task",
          target_id: task_id,
          outcome: "denied",
          reason: "INVALID_TRANSITION",
          from_status: typeof from === "string" ? from : null,
          to_status: attempted
        });
        logWarn("task.transition_rejected", {
          context: { tenant_id: context.tenant_id, task_id },
          data: { from, to: attempted, actor_id: context.actor_id }
        });
      }
      throw error;
    }
  }

  private async publish(transitions: TransitionRecord[]): Promise<void> {
    for (const transition of transitions) {
      await this.deps.audit.append({
        tenant_id: transition.tenant_id,
        actor_id: transition.actor_id,
        event: "task.transition",
        target_type: "task",
        target_id: transition.task_id,
        outcome: "transition",
        from_status: transition.from,
        to_status: transition.to,
        ...(transition.reason ? { reason: transition.reason } : {})
      });
      recordTaskTransition(transition.to);
      publishEvent({
        type: "task.transition",
        tenant_id: transition.tenant_id,
        timestamp: transition.at,
        payload: { task_id: transition.task_id, from: transition.from, to: transition.to, reason: transition.reason ?? null }
      });
      logInfo("task.transition", {
        context: { tenant_id: transition.tenant_id, task_id: transition.task_id },
        data: { from: transition.from, to: transition.to, actor_id: transition.actor_id, reason: transition.reason }
      });
    }
  }

  private async recordDeferral(task: Task, retry_at: string, actor_id: string): Promise<void> {
    recordQuotaDeferral();
    await this.deps.audit.append({
      tenant_id: task.tenant_id,
      actor_id,
      event: "task.quota_deferred",
      target_type: "task",
      target_id: task.id,
      outcome: "denied",
      reason: "QUOTA_EXCEEDED",
      detail: { retry_at }
    });
    logInfo("task.quota_deferred", { context: { tenant_id: task.tenant_id, task_id: task.id }, data: { retry_at } });
  }

  private async recordReclaim(task: Task, actor_id: string): Promise<void> {
    recordLeaseReclaim();
    await this.deps.audit.append({
      tenant_id: task.tenant_id,
      actor_id,
      event: "task.lease_reclaimed",
      target_type: "task",
      target_id: task.id,
      outcome: "transition",
      reason: "LEASE_EXPIRED",
      to_status: task.status
    });
    logWarn("task.lease_reclaimed", {
      context: { tenant_id: task.tenant_id, task_id: task.id },
      data: { status: task.status, retry_count: task.retry_count }
    });
  }
}
