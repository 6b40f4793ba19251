import { LifecycleError } from "../domain/errors.js";
import type { Task, TaskStatus } from "./types.js";

const TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  pending: ["running", "cancelled"],
  running: ["completed", "failed", "cancelled"],
  failed: ["pending"],
  completed: [],
  cancelled: []
};

export interface TransitionRecord {
  task_id: string;
  tenant_id: string;
  from: TaskStatus | null;
  to: TaskStatus;
  at: string;
  actor_id: string;
  reason?: string;
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === "completed" || status === "failed" || status === "cancelled";
}

/**
 * Whether a failed task may go back to pending. `retry_count` already
 * includes the failure being recorded, so the attempt that brings it to
 * `max_retries` is the last one.
 */
export function hasRetriesLeft(task: Pick<Task, "retry_count" | "max_retries">): boolean {
  return task.retry_count < task.max_retries;
}

export function assertTransition(task: Task, to: TaskStatus): void {
  const from = task.status;
  if (!canTransition(from, to) || (from === "failed" && task.completed_at !== null)) {
    throw new LifecycleError("INVALID_TRANSITION", `Task cannot move from ${from} to ${to}`, {
      task_id: task.id,
      from,
      to
    });
  }
}

/**
 * Moves `task` to `to` in place and appends the history step. Throws
 * INVALID_TRANSITION without touching the task when the edge does not exist.
 * A failure with retries left is not terminal: it keeps `completed_at` null
 * and may still move back to pending.
 */
export function applyTransition(
  task: Task,
  to: TaskStatus,
  meta: { at: Date; actor_id: string; reason?: string }
): TransitionRecord {
  const from = task.status;
  assertTransition(task, to);

  const at = meta.at.toISOString();
  task.status = to;
  task.updated_at = at;
  if (to === "running" && task.started_at === null) task.started_at = at;
  if (to === "completed" || to === "cancelled") task.completed_at = at;
  if (to === "failed" && !hasRetriesLeft(task)) task.completed_at = at;
  task.history.push({ from, to, at, actor_id: meta.actor_id, ...(meta.reason ? { reason: meta.reason } : {}) });

  return {
    task_id: task.id,
    tenant_id: task.tenant_id,
    from,
    to,
    at,
    actor_id: meta.actor_id,
    ...(meta.reason ? { reason: meta.reason } : {})
  };
}
