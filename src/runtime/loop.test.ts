import { describe, test, mock, beforeEach, type Mock } from "node:test";
import assert from "node:assert";
import { setImmediate as nextTurn } from "node:timers/promises";

import { RuntimeEventLoop, LoopState } from "./loop.js";
import { FunctionRegistry } from "./registry.js";
import { jsonCodec } from "./codec.js";
import type { FetchFn } from "./transport.js";
import { EnvironmentManager } from "../utils/env.js";
import type { FatalRuntimeFailure } from "../utils/errors.js";

const BASE = "http://127.0.0.1:9001/2018-06-01/runtime/invocation";

interface ScriptedEvent {
  requestId: string;
  body: string;
  headers?: Record<string, string>;
}

interface RecordedCall {
  method: string;
  url: string;
  body?: string;
}

type PollStep = ScriptedEvent | Response | Error;

function socketFailure(code = "ECONNREFUSED"): TypeError {
  return new TypeError("fetch failed", {
    cause: Object.assign(new Error("connect failed"), { code }),
  });
}

/**
 * Plays back poll results in order. Once the script runs out the runtime API
 * "goes away" with a socket failure, which ends the loop.
 */
function scriptedFetch(
  steps: PollStep[],
  postStatus: (url: string) => number = () => 202,
) {
  const calls: RecordedCall[] = [];
  const fetchFn = mock.fn<FetchFn>(async (input, init) => {
    const method = init?.method ?? "GET";
    const url = String(input);

    if (method === "GET") {
      calls.push({ method, url });
      const step = steps.shift() ?? socketFailure();
      if (step instanceof Error) {
        throw step;
      }
      if (step instanceof Response) {
        return step;
      }
      return new Response(step.body, {
        headers: {
          "Lambda-Runtime-Aws-Request-Id": step.requestId,
          "Content-Type": "application/json",
          ...step.headers,
        },
      });
    }

    const body =
      init?.body instanceof Uint8Array
        ? new TextDecoder().decode(init.body)
        : String(init?.body);
    calls.push({ method, url, body });
    return new Response(null, { status: postStatus(url) });
  });

  return { calls, fetchFn };
}

describe("RuntimeEventLoop", () => {
  let registry: FunctionRegistry;
  let onFatalError: Mock<(failure: FatalRuntimeFailure) => void>;

  beforeEach(() => {
    registry = new FunctionRegistry();
    onFatalError = mock.fn<(failure: FatalRuntimeFailure) => void>();
  });

  function createLoop(fetchFn: FetchFn, env: NodeJS.ProcessEnv = {}) {
    return new RuntimeEventLoop({
      registry,
      codec: jsonCodec,
      environment: new EnvironmentManager({
        AWS_LAMBDA_RUNTIME_API: "127.0.0.1:9001",
        ...env,
      }),
      fetch: fetchFn,
      traceSink: () => {},
      onFatalError,
    });
  }

  async function runToCompletion(loop: RuntimeEventLoop) {
    loop.start();
    await loop.whenStopped();
  }

  test("responds to the scenario event through _HANDLER", async () => {
    registry.register("myFunc", async (input) => ({ received: input }), {});
    registry.register("otherFunc", async () => null, {});
    const { calls, fetchFn } = scriptedFetch([
      { requestId: "abc123", body: '{"x":1}' },
    ]);

    await runToCompletion(createLoop(fetchFn, { _HANDLER: "myFunc" }));

    assert.deepStrictEqual(
      calls.filter((call) => call.method === "POST"),
      [
        {
          method: "POST",
          url: `${BASE}/abc123/response`,
          body: '{"received":{"x":1}}',
        },
      ],
    );
  });

  test("reports a resolution failure and sends no response", async () => {
    registry.register("uppercase", async () => null, {});
    registry.register("reverse", async () => null, {});
    const { calls, fetchFn } = scriptedFetch([
      { requestId: "abc123", body: '{"x":1}' },
    ]);
    const loop = createLoop(fetchFn, { _HANDLER: "myFunc" });

    await runToCompletion(loop);

    const posts = calls.filter((call) => call.method === "POST");
    assert.strictEqual(posts.length, 1);
    assert.strictEqual(posts[0]?.url, `${BASE}/abc123/error`);

    const report = JSON.parse(posts[0]?.body ?? "{}");
    assert.strictEqual(report.errorType, "FunctionResolutionError");
    assert.strictEqual(
      report.errorMessage,
      "Failed to locate function. Tried [DEFAULT_HANDLER=<unset>, _HANDLER=myFunc, " +
        "default=<unset>, function.definition=<unset>, function.definition header=<unset>]. " +
        "Functions available in registry: [uppercase, reverse]",
    );
    assert.strictEqual(typeof report.stackTrace, "string");
  });

  test("submits one result per event, in poll order", async () => {
    registry.register("echo", async (input) => input, {});
    const { calls, fetchFn } = scriptedFetch([
      { requestId: "r-1", body: '{"n":1}' },
      { requestId: "r-2", body: '{"n":2}' },
      { requestId: "r-3", body: '{"n":3}' },
    ]);

    await runToCompletion(createLoop(fetchFn));

    assert.deepStrictEqual(
      calls.map(({ method, url }) => `${method} ${url.slice(BASE.length)}`),
      [
        "GET /next",
        "POST /r-1/response",
        "GET /next",
        "POST /r-2/response",
        "GET /next",
        "POST /r-3/response",
        "GET /next",
      ],
    );
    assert.deepStrictEqual(
      calls.filter((call) => call.method === "POST").map((call) => call.body),
      ['{"n":1}', '{"n":2}', '{"n":3}'],
    );
  });

  test("keeps running after a function fails", async () => {
    let attempt = 0;
    registry.register("flaky", async () => {
      attempt += 1;
      if (attempt === 1) {
        throw new Error();
      }
      return { ok: true };
    }, {});
    const { calls, fetchFn } = scriptedFetch([
      { requestId: "r-1", body: "{}" },
      { requestId: "r-2", body: "{}" },
    ]);

    await runToCompletion(createLoop(fetchFn));

    const posts = calls.filter((call) => call.method === "POST");
    assert.deepStrictEqual(
      posts.map((call) => call.url),
      [`${BASE}/r-1/error`, `${BASE}/r-2/response`],
    );

    const report = JSON.parse(posts[0]?.body ?? "{}");
    assert.deepStrictEqual(Object.keys(report).sort(), [
      "errorMessage",
      "errorType",
      "stackTrace",
    ]);
    assert.strictEqual(report.errorMessage, "");
    assert.strictEqual(report.errorType, "Error");
    assert.match(report.stackTrace, /^Error\n/);
  });

  test("reports an Error with a non-string message and keeps running", async () => {
    let attempt = 0;
    registry.register("odd", async () => {
      attempt += 1;
      if (attempt === 1) {
        throw Object.assign(new Error("x"), { message: 42 });
      }
      return { ok: true };
    }, {});
    const { calls, fetchFn } = scriptedFetch([
      { requestId: "r-1", body: "{}" },
      { requestId: "r-2", body: "{}" },
    ]);

    await runToCompletion(createLoop(fetchFn));

    const posts = calls.filter((call) => call.method === "POST");
    assert.deepStrictEqual(
      posts.map((call) => call.url),
      [`${BASE}/r-1/error`, `${BASE}/r-2/response`],
    );
    assert.strictEqual(JSON.parse(posts[0]?.body ?? "{}").errorMessage, "42");
    assert.deepStrictEqual(
      onFatalError.mock.calls.map((call) => call.arguments[0].scope),
      ["transport"],
    );
  });

  test("re-polls after a non-socket poll failure", async () => {
    registry.register("echo", async (input) => input, {});
    const { calls, fetchFn } = scriptedFetch([
      new Response("unavailable", { status: 503 }),
      new Error("unexpected end of data"),
      { requestId: "r-1", body: "{}" },
    ]);

    await runToCompletion(createLoop(fetchFn));

    assert.deepStrictEqual(
      calls.map(({ method, url }) => `${method} ${url.slice(BASE.length)}`),
      ["GET /next", "GET /next", "GET /next", "POST /r-1/response", "GET /next"],
    );
  });

  test("stops for good on a socket failure during poll", async () => {
    const { calls, fetchFn } = scriptedFetch([socketFailure("ECONNRESET")]);
    const loop = createLoop(fetchFn);

    await runToCompletion(loop);

    assert.strictEqual(loop.isRunning(), false);
    assert.strictEqual(calls.length, 1);
    assert.strictEqual(onFatalError.mock.callCount(), 1);
    assert.strictEqual(onFatalError.mock.calls[0]?.arguments[0].scope, "transport");
  });

  test("stops when the error report itself is rejected", async () => {
    registry.register("fail", async () => {
      throw new Error("User error");
    }, {});
    const { calls, fetchFn } = scriptedFetch(
      [
        { requestId: "r-1", body: "{}" },
        { requestId: "r-2", body: "{}" },
      ],
      (url) => (url.endsWith("/error") ? 500 : 202),
    );
    const loop = createLoop(fetchFn);

    await runToCompletion(loop);

    assert.strictEqual(loop.isRunning(), false);
    assert.deepStrictEqual(
      calls.map(({ method, url }) => `${method} ${url.slice(BASE.length)}`),
      ["GET /next", "POST /r-1/error"],
    );
    assert.strictEqual(onFatalError.mock.callCount(), 1);
    const failure = onFatalError.mock.calls[0]?.arguments[0];
    assert.strictEqual(failure?.scope, "reporting");
    assert.strictEqual(
      failure?.scope === "reporting" ? failure.requestId : undefined,
      "r-1",
    );
  });

  test("hands the trace id to the trace sink", async () => {
    registry.register("echo", async (input) => input, {});
    const traceSink = mock.fn<(traceId: string) => void>();
    const { fetchFn } = scriptedFetch([
      {
        requestId: "r-1",
        body: "{}",
        headers: { "Lambda-Runtime-Trace-Id": "Root=1-test;Sampled=1" },
      },
      { requestId: "r-2", body: "{}" },
    ]);
    const loop = new RuntimeEventLoop({
      registry,
      codec: jsonCodec,
      environment: new EnvironmentManager({}),
      fetch: fetchFn,
      traceSink,
    });

    await runToCompletion(loop);

    assert.deepStrictEqual(
      traceSink.mock.calls.map((call) => call.arguments[0]),
      ["Root=1-test;Sampled=1"],
    );
  });

  describe("lifecycle", () => {
    function hangingFetch() {
      return mock.fn<FetchFn>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () =>
              reject(new DOMException("This operation was aborted", "AbortError")),
            );
          }),
      );
    }

    test("is not running before start", () => {
      const loop = createLoop(hangingFetch());

      assert.strictEqual(loop.isRunning(), false);
    });

    test("start returns immediately and runs a single worker", async () => {
      const fetchFn = hangingFetch();
      const loop = createLoop(fetchFn);

      loop.start();
      loop.start();

      assert.strictEqual(loop.isRunning(), true);
      assert.strictEqual(fetchFn.mock.callCount(), 1);

      loop.stop();
      await loop.whenStopped();
    });

    test("stop cancels the in-flight poll and can be repeated", async () => {
      const fetchFn = hangingFetch();
      const loop = createLoop(fetchFn);

      loop.start();
      loop.stop();
      loop.stop();
      await loop.whenStopped();

      assert.strictEqual(loop.isRunning(), false);
      assert.strictEqual(fetchFn.mock.callCount(), 1);
      assert.strictEqual(onFatalError.mock.callCount(), 0);
    });

    test("can be started again after a stop", async () => {
      const fetchFn = hangingFetch();
      const loop = createLoop(fetchFn);

      loop.start();
      loop.stop();
      loop.start();
      await nextTurn();

      assert.strictEqual(loop.isRunning(), true);
      assert.strictEqual(fetchFn.mock.callCount(), 2);

      loop.stop();
      await loop.whenStopped();
      assert.strictEqual(loop.isRunning(), false);
    });

    function blockingFunction() {
      let failFirst = false;
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const entered: string[] = [];
      let inFlight = 0;
      let maxInFlight = 0;

      registry.register("slow", async (_input, context) => {
        entered.push(context.requestId);
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await gate;
        inFlight -= 1;
        if (context.requestId === "r-1" && failFirst) {
          throw new Error("late failure");
        }
        return null;
      }, {});

      return {
        entered,
        release: () => release(),
        failFirstInvocation: () => {
          failFirst = true;
        },
        maxInFlight: () => maxInFlight,
      };
    }

    async function untilEntered(entered: string[]) {
      while (entered.length === 0) {
        await nextTurn();
      }
    }

    test("a restart waits for the invocation of the stopped run", async () => {
      const slow = blockingFunction();
      const { calls, fetchFn } = scriptedFetch([
        { requestId: "r-1", body: "{}" },
        { requestId: "r-2", body: "{}" },
      ]);
      const loop = createLoop(fetchFn);

      loop.start();
      await untilEntered(slow.entered);
      loop.stop();
      loop.start();
      await nextTurn();

      assert.deepStrictEqual(slow.entered, ["r-1"]);

      slow.release();
      await loop.whenStopped();

      assert.strictEqual(slow.maxInFlight(), 1);
      assert.deepStrictEqual(slow.entered, ["r-1", "r-2"]);
      assert.deepStrictEqual(
        calls.map(({ method, url }) => `${method} ${url.slice(BASE.length)}`),
        [
          "GET /next",
          "POST /r-1/response",
          "GET /next",
          "POST /r-2/response",
          "GET /next",
        ],
      );
    });

    test("a fatal failure of a stopped run does not end the next run", async () => {
      const slow = blockingFunction();
      slow.failFirstInvocation();
      const { calls, fetchFn } = scriptedFetch(
        [
          { requestId: "r-1", body: "{}" },
          { requestId: "r-2", body: "{}" },
        ],
        (url) => (url.endsWith("/error") ? 500 : 202),
      );
      const loop = createLoop(fetchFn);

      loop.start();
      await untilEntered(slow.entered);
      loop.stop();
      loop.start();
      slow.release();
      await loop.whenStopped();

      assert.deepStrictEqual(
        calls.map(({ method, url }) => `${method} ${url.slice(BASE.length)}`),
        [
          "GET /next",
          "POST /r-1/error",
          "GET /next",
          "POST /r-2/response",
          "GET /next",
        ],
      );
      assert.deepStrictEqual(
        onFatalError.mock.calls.map((call) => call.arguments[0].scope),
        ["transport"],
      );
    });
  });
});

describe("LoopState", () => {
  test("records only the first fatal failure of a run", () => {
    const state = new LoopState();
    state.start();

    state.stop({ scope: "transport", cause: "first" });
    state.stop({ scope: "transport", cause: "second" });

    assert.deepStrictEqual(state.fatalFailure, { scope: "transport", cause: "first" });
  });

  test("aborts the signal of the run it stops and resets on start", () => {
    const state = new LoopState();
    const first = state.start();
    state.stop({ scope: "transport", cause: "gone" });
    const second = state.start();

    assert.strictEqual(first.aborted, true);
    assert.strictEqual(second.aborted, false);
    assert.strictEqual(state.fatalFailure, undefined);
    assert.strictEqual(state.isRunning(), true);
  });
});
