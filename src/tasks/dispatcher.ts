import { setTimeout as delay } from "node:timers/promises";
import { describeError, logInfo, type LogContext } from "../observability/logger.js";
import type { ApiCallInput, TaskSpec, TextProcessingInput, WorkflowStep } from "./schemas.js";
import type { TaskError } from "./types.js";

export type DispatchError = TaskError & { code: "UNSUPPORTED_OPERATION" | "EXECUTION_ERROR" | "TIMEOUT" };

export type DispatchResult = { ok: true; output: unknown } | { ok: false; error: DispatchError };

/** Abort reasons the lifecycle manager uses. */
export const ABORT_TIMEOUT = "timeout";
export const ABORT_CANCELLED = "cancelled";

export interface DispatcherOptions {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface DispatchRun {
  signal: AbortSignal;
  context?: LogContext;
}

function failure(code: DispatchError["code"], message: string, extra: Partial<DispatchError> = {}): DispatchResult {
  return { ok: false, error: { code, message, ...extra } };
}

function abortedResult(signal: AbortSignal): DispatchResult {
  const reason: unknown = signal.reason;
  if (reason === ABORT_TIMEOUT) return failure("TIMEOUT", "Task exceeded its timeout");
  return failure("EXECUTION_ERROR", "Task dispatch was cancelled");
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some((key) => key.toLowerCase() === name);
}

async function sleepWithSignal(ms: number, signal: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

/**
 * Runs a task's input by its type. Never persists anything and never throws:
 * every outcome comes back as a DispatchResult.
 */
export class TaskDispatcher {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(options: DispatcherOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleepWithSignal;
  }

  async dispatch(spec: TaskSpec, run: DispatchRun): Promise<DispatchResult> {
    if (run.signal.aborted) return abortedResult(run.signal);
    switch (spec.task_type) {
      case "text_processing":
        return this.textProcessing(spec.input);
      case "api_call":
        return this.apiCall(spec.input, run.signal);
      case "workflow":
        return this.workflow(spec.input.steps, run);
    }
  }

  textProcessing(input: TextProcessingInput): DispatchResult {
    switch (input.operation) {
      case "uppercase":
        return { ok: true, output: { operation: input.operation, result: input.text.toUpperCase() } };
      case "lowercase":
        return { ok: true, output: { operation: input.operation, result: input.text.toLowerCase() } };
      case "word_count": {
        const trimmed = input.text.trim();
        return { ok: true, output: { operation: input.operation, result: trimmed ? trimmed.split(/\s+/).length : 0 } };
      }
      case "echo":
        return { ok: true, output: { operation: input.operation, result: input.text } };
      default:
        return failure("UNSUPPORTED_OPERATION", `Unsupported text operation: ${input.operation}`);
    }
  }

  async apiCall(input: ApiCallInput, signal: AbortSignal): Promise<DispatchResult> {
    const method = input.method;
    const headers: Record<string, string> = { ...(input.headers ?? {}) };
    let body: string | undefined;
    if (input.body !== undefined && method !== "GET") {
      body = typeof input.body === "string" ? input.body : JSON.stringify(input.body);
      if (typeof input.body !== "string" && !hasHeader(headers, "content-type")) {
        headers["content-type"] = "application/json";
      }
    }

    let response: Response;
    try {
      response = await this.fetchImpl(input.url, { method, headers, body, signal });
    } catch (error) {
      if (signal.aborted) return abortedResult(signal);
      return failure("EXECUTION_ERROR", `Request failed: ${describeError(error)}`);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (signal.aborted) return abortedResult(signal);
      return failure("EXECUTION_ERROR", `Reading response failed: ${describeError(error)}`);
    }

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      responseHeaders[key] = value;
    });

    let parsed: unknown = text;
    if ((response.headers.get("content-type") ?? "").includes("application/json") && text.length > 0) {
      try {
        parsed = JSON.parse(text);
      } catch {
        parsed = text;
      }
    }

    if (!response.ok) {
      return failure("EXECUTION_ERROR", `Upstream responded with ${response.status}`, {
        upstream_status: response.status
      });
    }
    return { ok: true, output: { status: response.status, headers: responseHeaders, body: parsed } };
  }

  async workflow(steps: WorkflowStep[], run: DispatchRun): Promise<DispatchResult> {
    const results: unknown[] = [];
    for (const [index, step] of steps.entries()) {
      if (run.signal.aborted) return this.withPartials(abortedResult(run.signal), results);

      const outcome = await this.runStep(step, index, run);
      if (!outcome.ok) return this.withPartials(outcome, results);
      results.push({ step: index, type: step.type, output: outcome.output });
    }
    return { ok: true, output: { steps: results } };
  }

  private async runStep(step: WorkflowStep, index: number, run: DispatchRun): Promise<DispatchResult> {
    switch (step.type) {
      case "delay":
        try {
          await this.sleep(step.ms, run.signal);
        } catch (error) {
          if (run.signal.aborted) return abortedResult(run.signal);
          return failure("EXECUTION_ERROR", `Delay step failed: ${describeError(error)}`);
        }
        return { ok: true, output: { waited_ms: step.ms } };
      case "log":
        logInfo("workflow.step.log", { context: run.context, data: { step: index, message: step.message } });
        return { ok: true, output: { message: step.message } };
      case "text_processing":
        return this.textProcessing(step.input);
      case "api_call":
        return this.apiCall(step.input, run.signal);
    }
  }

  private withPartials(result: DispatchResult, partial_results: unknown[]): DispatchResult {
    if (result.ok) return result;
    return { ok: false, error: { ...result.error, partial_results } };
  }
}
