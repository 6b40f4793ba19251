import { nanoid } from "nanoid";
import { readPositiveInt } from "../auth/config.js";
import { describeError, logError, logInfo } from "../observability/logger.js";
import type { TaskLifecycleManager } from "./lifecycle.js";
import type { TaskClaim } from "./types.js";

export interface WorkerPoolOptions {
  concurrency: number;
  pollIntervalMs: number;
  id?: string;
}

export function readWorkerPoolOptions(): WorkerPoolOptions {
  return {
    concurrency: readPositiveInt(process.env.WORKER_CONCURRENCY, 4),
    pollIntervalMs: readPositiveInt(process.env.WORKER_POLL_INTERVAL_MS, 1000)
  };
}

/**
 * Fixed number of execution slots fed by a polling tick. Each tick reclaims
 * expired leases first, then claims work until the slots are full.
 */
export class TaskWorkerPool {
  readonly id: string;
  private readonly inFlight = new Set<Promise<void>>();
  private timer: NodeJS.Timeout | null = null;
  private ticking: Promise<void> | null = null;
  private stopping = false;

  constructor(
    private readonly lifecycle: TaskLifecycleManager,
    private readonly options: WorkerPoolOptions
  ) {
    this.id = options.id ?? `worker-${nanoid(6)}`;
  }

  get activeCount(): number {
    return this.inFlight.size;
  }

  start(): void {
    if (this.timer) return;
    this.stopping = false;
    this.timer = setInterval(() => this.scheduleTick(), this.options.pollIntervalMs);
    this.timer.unref();
    logInfo("worker_pool.started", { data: { id: this.id, concurrency: this.options.concurrency } });
  }

  /** Runs one scheduling round; returns how many tasks it started. */
  async tick(): Promise<number> {
    await this.lifecycle.reclaimExpiredLeases();
    let started = 0;
    while (!this.stopping && this.inFlight.size < this.options.concurrency) {
      const claim = await this.lifecycle.claimNext(this.id);
      if (!claim) break;
      this.submit(claim);
      started += 1;
    }
    return started;
  }

  /** Executes a claim obtained elsewhere, e.g. an explicit execution request. */
  submit(claim: TaskClaim): void {
    const run = this.lifecycle.execute(claim).then(
      () => undefined,
      (error: unknown) => {
        logError("task.execution_failed", {
          context: { tenant_id: claim.task.tenant_id, task_id: claim.task.id },
          data: { error: describeError(error) }
        });
      }
    );
    const tracked: Promise<void> = run.finally(() => {
      this.inFlight.delete(tracked);
    });
    this.inFlight.add(tracked);
  }

  /** Resolves once everything submitted so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  async stop(): Promise<void> {
    this.stopping = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.ticking) await this.ticking;
    await this.drain();
    logInfo("worker_pool.stopped", { data: { id: this.id } });
  }

  private scheduleTick(): void {
    if (this.ticking || this.stopping) return;
    this.ticking = this.tick()
      .then(
        () => undefined,
        (error: unknown) => {
          logError("worker_pool.tick_failed", { data: { id: this.id, error: describeError(error) } });
        }
      )
      .finally(() => {
        this.ticking = null;
      });
  }
}
