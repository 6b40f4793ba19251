import { NotFoundError } from "../domain/errors.js";
import { JsonCollection } from "../persistence/jsonStore.js";
import { resolveDataRoot } from "../persistence/paths.js";
import type { TenantContext } from "../tenancy/context.js";
import type { Task, TaskStatus } from "./types.js";

export interface TaskFilter {
  status?: TaskStatus;
  agent_id?: string;
  limit?: number;
}

const DEFAULT_LIMIT = 100;

/**
 * Task records. Tenant-facing reads and writes take a TenantContext; the
 * scheduler-facing `mutateAll` is only reached through the lifecycle
 * manager. Every write runs under the collection lock.
 */
export class TaskStore {
  private readonly tasks: JsonCollection<Task>;

  constructor(dataRoot = resolveDataRoot()) {
    this.tasks = new JsonCollection<Task>(dataRoot, "tasks");
  }

  async insert(task: Task): Promise<Task> {
    return this.tasks.mutate((rows) => {
      rows.push(task);
      return task;
    });
  }

  async get(context: TenantContext, task_id: string): Promise<Task | null> {
    const rows = await this.tasks.readAll();
    return rows.find((row) => row.id === task_id && row.tenant_id === context.tenant_id) ?? null;
  }

  async ownerOf(task_id: string): Promise<string | null> {
    const rows = await this.tasks.readAll();
    return rows.find((row) => row.id === task_id)?.tenant_id ?? null;
  }

  /** Newest first. */
  async list(context: TenantContext, filter: TaskFilter = {}): Promise<Task[]> {
    const rows = await this.tasks.readAll();
    return rows
      .filter((row) => row.tenant_id === context.tenant_id)
      .filter((row) => (filter.status ? row.status === filter.status : true))
      .filter((row) => (filter.agent_id ? row.agent_id === filter.agent_id : true))
      .reverse()
      .slice(0, filter.limit ?? DEFAULT_LIMIT);
  }

  /** Changes one of the caller's tasks in place. A foreign or missing id is not found. */
  async mutate<R>(context: TenantContext, task_id: string, fn: (task: Task) => R): Promise<R> {
    return this.tasks.mutate((rows) => {
      const task = rows.find((row) => row.id === task_id && row.tenant_id === context.tenant_id);
      if (!task) throw new NotFoundError("Task not found");
      return fn(task);
    });
  }

  async mutateAll<R>(fn: (rows: Task[]) => R): Promise<R> {
    return this.tasks.mutate(fn);
  }
}
