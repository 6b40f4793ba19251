import assert from "node:assert/strict";
import test from "node:test";
import { ABORT_CANCELLED, ABORT_TIMEOUT, TaskDispatcher } from "./dispatcher.js";
import { taskSpecSchema } from "./schemas.js";

process.env.LOG_LEVEL = "silent";

type FetchCall = { url: string; init: RequestInit | undefined };

function recordingFetch(respond: (url: string) => Response): { fetchImpl: typeof fetch; calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    calls.push({ url, init });
    return respond(url);
  };
  return { fetchImpl, calls };
}

/** A fetch that only settles when its signal aborts. */
const hangingFetch: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
  });

const idle = new AbortController().signal;

test("text_processing applies each operation", async () => {
  const dispatcher = new TaskDispatcher();
  const run = (operation: string, text: string) =>
    dispatcher.dispatch({ task_type: "text_processing", input: { operation, text } }, { signal: idle });

  assert.deepEqual(await run("uppercase", "Hello"), { ok: true, output: { operation: "uppercase", result: "HELLO" } });
  assert.deepEqual(await run("lowercase", "Hello"), { ok: true, output: { operation: "lowercase", result: "hello" } });
  assert.deepEqual(await run("word_count", "  one two\tthree\n"), {
    ok: true,
    output: { operation: "word_count", result: 3 }
  });
  assert.deepEqual(await run("word_count", "   "), { ok: true, output: { operation: "word_count", result: 0 } });
  assert.deepEqual(await run("echo", "same"), { ok: true, output: { operation: "echo", result: "same" } });
});

test("an unknown text operation is UNSUPPORTED_OPERATION", async () => {
  const result = await new TaskDispatcher().dispatch(
    { task_type: "text_processing", input: { operation: "reverse", text: "abc" } },
    { signal: idle }
  );
  assert.deepEqual(result, {
    ok: false,
    error: { code: "UNSUPPORTED_OPERATION", message: "Unsupported text operation: reverse" }
  });
});

test("api_call serializes JSON bodies and parses JSON responses", async () => {
  const { fetchImpl, calls } = recordingFetch(
    () => new Response(JSON.stringify({ accepted: true }), { status: 201, headers: { "content-type": "application/json" } })
  );
  const result = await new TaskDispatcher({ fetchImpl }).dispatch(
    { task_type: "api_call", input: { method: "POST", url: "http://upstream.test/items", body: { name: "x" } } },
    { signal: idle }
  );

  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url, "http://upstream.test/items");
  assert.equal(calls[0]?.init?.method, "POST");
  assert.equal(calls[0]?.init?.body, '{"name":"x"}');
  assert.deepEqual(calls[0]?.init?.headers, { "content-type": "application/json" });

  assert.equal(result.ok, true);
  if (result.ok) {
    assert.deepEqual(result.output, {
      status: 201,
      headers: { "content-type": "application/json" },
      body: { accepted: true }
    });
  }
});

test("api_call maps a non-2xx answer to EXECUTION_ERROR with the upstream status", async () => {
  const { fetchImpl } = recordingFetch(() => new Response("nope", { status: 503 }));
  const result = await new TaskDispatcher({ fetchImpl }).dispatch(
    taskSpecSchema.parse({ task_type: "api_call", input: { url: "http://upstream.test/down" } }),
    { signal: idle }
  );
  assert.deepEqual(result, {
    ok: false,
    error: { code: "EXECUTION_ERROR", message: "Upstream responded with 503", upstream_status: 503 }
  });
});

test("api_call maps a network failure to EXECUTION_ERROR", async () => {
  const fetchImpl: typeof fetch = async () => {
    throw new Error("connect ECONNREFUSED");
  };
  const result = await new TaskDispatcher({ fetchImpl }).dispatch(
    { task_type: "api_call", input: { method: "GET", url: "http://upstream.test/" } },
    { signal: idle }
  );
  assert.deepEqual(result, {
    ok: false,
    error: { code: "EXECUTION_ERROR", message: "Request failed: connect ECONNREFUSED" }
  });
});

test("an abort for timeout reports TIMEOUT and a cancel reports EXECUTION_ERROR", async () => {
  const dispatcher = new TaskDispatcher({ fetchImpl: hangingFetch });
  const spec = { task_type: "api_call", input: { method: "GET", url: "http://upstream.test/slow" } } as const;

  const timeout = new AbortController();
  const timedOut = dispatcher.dispatch(spec, { signal: timeout.signal });
  timeout.abort(ABORT_TIMEOUT);
  assert.deepEqual(await timedOut, { ok: false, error: { code: "TIMEOUT", message: "Task exceeded its timeout" } });

  const cancel = new AbortController();
  const cancelled = dispatcher.dispatch(spec, { signal: cancel.signal });
  cancel.abort(ABORT_CANCELLED);
  assert.deepEqual(await cancelled, {
    ok: false,
    error: { code: "EXECUTION_ERROR", message: "Task dispatch was cancelled" }
  });
});

test("workflow runs steps in order and returns every step output", async () => {
  const slept: number[] = [];
  const dispatcher = new TaskDispatcher({
    sleep: async (ms) => {
      slept.push(ms);
    }
  });
  const result = await dispatcher.dispatch(
    {
      task_type: "workflow",
      input: {
        steps: [
          { type: "delay", ms: 250 },
          { type: "log", message: "halfway" },
          { type: "text_processing", input: { operation: "uppercase", text: "done" } }
        ]
      }
    },
    { signal: idle }
  );

  assert.deepEqual(slept, [250]);
  assert.deepEqual(result, {
    ok: true,
    output: {
      steps: [
        { step: 0, type: "delay", output: { waited_ms: 250 } },
        { step: 1, type: "log", output: { message: "halfway" } },
        { step: 2, type: "text_processing", output: { operation: "uppercase", result: "DONE" } }
      ]
    }
  });
});

test("workflow stops at the first failing step and carries partial results", async () => {
  const { fetchImpl, calls } = recordingFetch(() => new Response("", { status: 200 }));
  const result = await new TaskDispatcher({ fetchImpl }).dispatch(
    {
      task_type: "workflow",
      input: {
        steps: [
          { type: "text_processing", input: { operation: "echo", text: "first" } },
          { type: "text_processing", input: { operation: "shout", text: "second" } },
          { type: "api_call", input: { method: "GET", url: "http://upstream.test/never" } }
        ]
      }
    },
    { signal: idle }
  );

  assert.equal(calls.length, 0);
  assert.deepEqual(result, {
    ok: false,
    error: {
      code: "UNSUPPORTED_OPERATION",
      message: "Unsupported text operation: shout",
      partial_results: [{ step: 0, type: "text_processing", output: { operation: "echo", result: "first" } }]
    }
  });
});
