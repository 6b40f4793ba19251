type Labels = Record<string, string>;

const LATENCY_BUCKETS_MS = [10, 25, 50, 100, 250, 500, 1000, 2500, 5000];

function sortedLabels(labels: Labels): Labels {
  return Object.fromEntries(Object.entries(labels).sort(([a], [b]) => a.localeCompare(b)));
}

function formatLabels(labels: Labels): string {
  const parts = Object.entries(labels).map(([k, v]) => `${k}="${v.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`);
  return parts.length > 0 ? `{${parts.join(",")}}` : "";
}

interface Family {
  render(): string[];
  reset(): void;
}

/** Counter keyed by its label set. An unlabeled counter always renders, starting at 0. */
class Counter implements Family {
  private readonly series = new Map<string, { labels: Labels; value: number }>();

  constructor(
    private readonly name: string,
    private readonly help: string
  ) {}

  inc(labels: Labels = {}, by = 1): void {
    const ordered = sortedLabels(labels);
    const id = formatLabels(ordered);
    const current = this.series.get(id);
    this.series.set(id, { labels: ordered, value: (current?.value ?? 0) + by });
  }

  render(): string[] {
    const rows = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    if (this.series.size === 0) {
      rows.push(`${this.name} 0`);
      return rows;
    }
    for (const { labels, value } of this.series.values()) {
      rows.push(`${this.name}${formatLabels(labels)} ${value}`);
    }
    return rows;
  }

  reset(): void {
    this.series.clear();
  }
}

class Histogram implements Family {
  private readonly series = new Map<string, { labels: Labels; counts: number[]; count: number; sum: number }>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly buckets: readonly number[]
  ) {}

  observe(labels: Labels, value: number): void {
    const ordered = sortedLabels(labels);
    const id = formatLabels(ordered);
    const entry = this.series.get(id) ?? { labels: ordered, counts: this.buckets.map(() => 0), count: 0, sum: 0 };
    entry.count += 1;
    entry.sum += value;
    this.buckets.forEach((bucket, index) => {
      if (value <= bucket) entry.counts[index] = (entry.counts[index] ?? 0) + 1;
    });
    this.series.set(id, entry);
  }

  render(): string[] {
    const rows = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const { labels, counts, count, sum } of this.series.values()) {
      this.buckets.forEach((bucket, index) => {
        rows.push(`${this.name}_bucket${formatLabels({ ...labels, le: String(bucket) })} ${counts[index] ?? 0}`);
      });
      rows.push(`${this.name}_bucket${formatLabels({ ...labels, le: "+Inf" })} ${count}`);
      rows.push(`${this.name}_sum${formatLabels(labels)} ${sum}`);
      rows.push(`${this.name}_count${formatLabels(labels)} ${count}`);
    }
    return rows;
  }

  reset(): void {
    this.series.clear();
  }
}

const taskTransitions = new Counter("taskgate_task_transitions_total", "Task state transitions by target status");
const taskDispatches = new Counter("taskgate_task_dispatch_total", "Task dispatches by type and outcome");
const quotaDeferrals = new Counter("taskgate_task_quota_deferrals_total", "Claims deferred by the hourly tenant quota");
const leaseReclaims = new Counter("taskgate_task_lease_reclaims_total", "Expired task leases reclaimed");
const authFailures = new Counter("taskgate_auth_failures_total", "Authentication failures by cause");
const authzDecisions = new Counter("taskgate_authz_decisions_total", "Authorization decisions by outcome");
const httpRequests = new Counter("taskgate_http_requests_total", "Total HTTP requests by endpoint");
const httpFailures = new Counter("taskgate_http_requests_failed_total", "Total failed HTTP requests by endpoint");
const httpLatency = new Histogram(
  "taskgate_http_request_duration_ms",
  "HTTP request latency in milliseconds",
  LATENCY_BUCKETS_MS
);

const FAMILIES: readonly Family[] = [
  taskTransitions,
  taskDispatches,
  quotaDeferrals,
  leaseReclaims,
  authFailures,
  authzDecisions,
  httpRequests,
  httpFailures,
  httpLatency
];

export function recordTaskTransition(toStatus: string): void {
  taskTransitions.inc({ to_status: toStatus });
}

export function recordTaskDispatch(taskType: string, outcome: "ok" | "error"): void {
  taskDispatches.inc({ task_type: taskType, outcome });
}

export function recordQuotaDeferral(): void {
  quotaDeferrals.inc();
}

export function recordLeaseReclaim(): void {
  leaseReclaims.inc();
}

export function recordAuthFailure(code: string): void {
  authFailures.inc({ code });
}

export function recordAuthzDecision(outcome: "allowed" | "denied"): void {
  authzDecisions.inc({ outcome });
}

export function recordHttpRequest(input: {
  method: string;
  endpoint: string;
  statusCode: number;
  durationMs: number;
}): void {
  const labels = { method: input.method.toUpperCase(), endpoint: input.endpoint };
  httpRequests.inc(labels);
  if (input.statusCode >= 400) httpFailures.inc(labels);
  httpLatency.observe(labels, input.durationMs);
}

export function renderPrometheusMetrics(): string {
  return `${FAMILIES.flatMap((family) => family.render()).join("\n")}\n`;
}

export function resetMetricsForTests(): void {
  for (const family of FAMILIES) family.reset();
}
