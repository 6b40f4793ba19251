export type QuotaDecision = { granted: true } | { granted: false; retry_at: Date };

/**
 * Sliding-window count of tasks entering `running`, per tenant. Callers
 * invoke `tryAcquire` inside the task store's critical section so the
 * check and the increment cannot interleave with another claim.
 */
export class QuotaTracker {
  private readonly admissions = new Map<string, number[]>();

  constructor(private readonly windowMs = 60 * 60 * 1000) {}

  tryAcquire(tenant_id: string, limit: number, now: Date): QuotaDecision {
    const at = now.getTime();
    const recent = this.prune(tenant_id, at);
    if (recent.length >= limit) {
      const oldest = recent[0] ?? at;
      return { granted: false, retry_at: new Date(oldest + this.windowMs) };
    }
    recent.push(at);
    this.admissions.set(tenant_id, recent);
    return { granted: true };
  }

  used(tenant_id: string, now: Date): number {
    return this.prune(tenant_id, now.getTime()).length;
  }

  private prune(tenant_id: string, at: number): number[] {
    const kept = (this.admissions.get(tenant_id) ?? []).filter((stamp) => stamp > at - this.windowMs);
    this.admissions.set(tenant_id, kept);
    return kept;
  }
}
