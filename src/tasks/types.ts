import type { TASK_STATUSES, TaskSpec } from "./schemas.js";

export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface TaskLease {
  id: string;
  worker_id: string;
  acquired_at: string;
  expires_at: string;
}

export type TaskErrorCode = "UNSUPPORTED_OPERATION" | "EXECUTION_ERROR" | "TIMEOUT" | "LEASE_EXPIRED";

export interface TaskError {
  code: TaskErrorCode;
  message: string;
  upstream_status?: number;
  partial_results?: unknown[];
}

export interface TaskHistoryStep {
  from: TaskStatus | null;
  to: TaskStatus;
  at: string;
  actor_id: string;
  reason?: string;
}

interface TaskFields {
  id: string;
  tenant_id: string;
  agent_id: string;
  priority: number;
  output: unknown;
  status: TaskStatus;
  retry_count: number;
  max_retries: number;
  timeout_seconds: number;
  ready_at: string;
  lease: TaskLease | null;
  cancel_requested_at: string | null;
  last_error: TaskError | null;
  history: TaskHistoryStep[];
  created_by: string;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  updated_at: string;
}

export type Task = TaskFields & TaskSpec;

/** A task this process holds a lease on. */
export interface TaskClaim {
  task: Task;
  lease: TaskLease;
}
