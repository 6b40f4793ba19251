import assert from "node:assert/strict";
import test from "node:test";
import {
  recordAuthFailure,
  recordAuthzDecision,
  recordHttpRequest,
  recordLeaseReclaim,
  recordQuotaDeferral,
  recordTaskDispatch,
  recordTaskTransition,
  renderPrometheusMetrics,
  resetMetricsForTests
} from "./metrics.js";

test.beforeEach(() => {
  resetMetricsForTests();
});

test("metrics counters include task transitions, dispatches and scheduler events", () => {
  recordTaskTransition("running");
  recordTaskTransition("running");
  recordTaskTransition("completed");
  recordTaskDispatch("api_call", "error");
  recordQuotaDeferral();
  recordLeaseReclaim();

  const text = renderPrometheusMetrics();
  assert.match(text, /taskgate_task_transitions_total\{to_status="running"\} 2/);
  assert.match(text, /taskgate_task_transitions_total\{to_status="completed"\} 1/);
  assert.match(text, /taskgate_task_dispatch_total\{outcome="error",task_type="api_call"\} 1/);
  assert.match(text, /taskgate_task_quota_deferrals_total 1/);
  assert.match(text, /taskgate_task_lease_reclaims_total 1/);
});

test("metrics include auth counters and http latency histogram", () => {
  recordAuthFailure("INVALID_CREDENTIALS");
  recordAuthzDecision("denied");
  recordHttpRequest({ method: "post", endpoint: "/tasks/:id/execute", statusCode: 202, durationMs: 87 });
  recordHttpRequest({ method: "POST", endpoint: "/tasks/:id/execute", statusCode: 409, durationMs: 210 });

  const text = renderPrometheusMetrics();
  assert.match(text, /taskgate_auth_failures_total\{code="INVALID_CREDENTIALS"\} 1/);
  assert.match(text, /taskgate_authz_decisions_total\{outcome="denied"\} 1/);
  assert.match(text, /taskgate_http_requests_total\{endpoint="\/tasks\/:id\/execute",method="POST"\} 2/);
  assert.match(text, /taskgate_http_requests_failed_total\{endpoint="\/tasks\/:id\/execute",method="POST"\} 1/);
  assert.match(text, /taskgate_http_request_duration_ms_bucket\{endpoint="\/tasks\/:id\/execute",method="POST",le="100"\} 1/);
  assert.match(text, /taskgate_http_request_duration_ms_count\{endpoint="\/tasks\/:id\/execute",method="POST"\} 2/);
});
