/**
 * @fileoverview Tests for the session manager: connection lifecycle,
 * backoff, calls and push events.
 */

import { describe, it, expect } from "vitest";
import type { ChannelCallOptions } from "../../src/transport/channel.js";
import { SessionManager, STATE_EVENT, type SessionManagerOptions } from "../../src/transport/session.js";
import type { SessionEvent } from "../../src/types.js";
import { AuthError, ConnectionError, RemoteError } from "../../src/utils/errors.js";
import { silentLogger } from "../../src/utils/logger.js";
import { FakeEndpoint, fakeChannelFactory, recordingSleep } from "../helpers/fake-channel.js";

function manager(endpoints: FakeEndpoint[], overrides: Partial<SessionManagerOptions> = {}) {
  const { sleep, delays } = recordingSleep();
  const sessions = new SessionManager({
    channelFactory: fakeChannelFactory(...endpoints),
    backoffBaseMs: 1000,
    backoffCapMs: 30_000,
    maxConnectAttempts: 5,
    sleep,
    logger: silentLogger,
    ...overrides,
  });
  return { sessions, delays };
}

const inOneMinute = (): number => Date.now() + 60_000;

// ---------------------------------------------------------------------------
// Connection lifecycle
// ---------------------------------------------------------------------------

describe("SessionManager -- connect", () => {
  it("connects and publishes state changes", async () => {
    const memory = new FakeEndpoint("memory");
    const { sessions } = manager([memory]);
    const events: SessionEvent[] = [];
    sessions.onEvent((event) => events.push(event));

    const handle = await sessions.connect(memory.config);

    expect(handle).toEqual({ endpoint: "memory" });
    expect(sessions.endpoint("memory")?.state).toBe("connected");
    expect(events.map((e) => [e.endpoint, e.type, e.payload])).toEqual([
      ["memory", STATE_EVENT, { state: "connecting", previous: "disconnected" }],
      ["memory", STATE_EVENT, { state: "connected", previous: "connecting" }],
    ]);
  });

  it("retries with doubling backoff until the endpoint answers", async () => {
    const tasks = new FakeEndpoint("tasks");
    tasks.openFailures = [new Error("ECONNREFUSED"), new Error("ECONNREFUSED"), new Error("ECONNREFUSED")];
    const { sessions, delays } = manager([tasks]);

    await sessions.connect(tasks.config);

    expect(delays).toEqual([1000, 2000, 4000]);
    expect(tasks.opens).toBe(4);
    expect(sessions.endpoint("tasks")?.state).toBe("connected");
  });

  it("marks the endpoint failed when attempts run out", async () => {
    const tasks = new FakeEndpoint("tasks");
    tasks.alwaysFail = new Error("ECONNREFUSED");
    const { sessions, delays } = manager([tasks]);

    const attempt = sessions.connect(tasks.config);

    await expect(attempt).rejects.toBeInstanceOf(ConnectionError);
    await expect(attempt).rejects.toThrow(
      "Endpoint 'tasks' unreachable after 5 attempts: Endpoint 'tasks': ECONNREFUSED",
    );
    expect(delays).toEqual([1000, 2000, 4000, 8000]);
    expect(tasks.opens).toBe(5);
    expect(sessions.endpoint("tasks")?.state).toBe("failed");
  });

  it("caps the backoff delay", () => {
    const { sessions } = manager([]);
    expect([1, 2, 3, 4, 5, 6, 7].map((n) => sessions.backoffDelay(n))).toEqual([
      1000, 2000, 4000, 8000, 16000, 30000, 30000,
    ]);
  });

  it("does not retry a rejected API key", async () => {
    const calendar = new FakeEndpoint("calendar");
    calendar.alwaysFail = new Error("Error POSTing to endpoint (HTTP 401): Unauthorized");
    const { sessions, delays } = manager([calendar]);

    await expect(sessions.connect(calendar.config)).rejects.toBeInstanceOf(AuthError);
    expect(calendar.opens).toBe(1);
    expect(delays).toEqual([]);
    expect(sessions.endpoint("calendar")?.state).toBe("failed");
  });

  it("keeps other endpoints working when one is unreachable", async () => {
    const memory = new FakeEndpoint("memory").tool("get_all_memories", () => ({ text: "[]" }));
    const broken = new FakeEndpoint("broken");
    broken.alwaysFail = new Error("ECONNREFUSED");
    const { sessions } = manager([memory, broken]);

    const results = await Promise.allSettled([sessions.connect(broken.config), sessions.connect(memory.config)]);

    expect(results.map((r) => r.status)).toEqual(["rejected", "fulfilled"]);
    const result = await sessions.call({ endpoint: "memory" }, "get_all_memories", {}, {
      correlationId: "c-1",
      deadline: inOneMinute(),
    });
    expect(result.ok).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Calls
// ---------------------------------------------------------------------------

describe("SessionManager -- call", () => {
  it("returns the payload tagged with the correlation id", async () => {
    const memory = new FakeEndpoint("memory").tool("save_memory", (args) => ({
      text: `saved ${String(args.content)}`,
    }));
    const { sessions } = manager([memory]);
    const handle = await sessions.connect(memory.config);

    const result = await sessions.call(handle, "save_memory", { content: "milk" }, {
      correlationId: "c-42",
      deadline: inOneMinute(),
    });

    expect(result).toEqual({
      ok: true,
      correlationId: "c-42",
      toolName: "save_memory",
      endpoint: "memory",
      payload: { text: "saved milk" },
    });
    expect(memory.calls).toEqual([{ name: "save_memory", args: { content: "milk" }, correlationId: "c-42" }]);
  });

  it("reports server failures verbatim as RemoteError", async () => {
    const tasks = new FakeEndpoint("tasks").tool("complete_task", () => {
      throw new RemoteError("tasks", "Task 'walk dog' not found");
    });
    const { sessions } = manager([tasks]);
    const handle = await sessions.connect(tasks.config);

    const result = await sessions.call(handle, "complete_task", { task: "walk dog" }, {
      correlationId: "c-1",
      deadline: inOneMinute(),
    });

    expect(result).toEqual({
      ok: false,
      correlationId: "c-1",
      toolName: "complete_task",
      failure: { kind: "RemoteError", message: "Task 'walk dog' not found" },
    });
  });

  it("times out at the deadline and cancels the call on the channel", async () => {
    let seen: ChannelCallOptions | undefined;
    const crawler = new FakeEndpoint("crawler").tool("crawl_site", async (_args, options) => {
      seen = options;
      await new Promise((resolve) => setTimeout(resolve, 80));
      return { text: "late" };
    });
    const { sessions } = manager([crawler]);
    const handle = await sessions.connect(crawler.config);
    const deadline = Date.now() + 20;

    const result = await sessions.call(handle, "crawl_site", {}, { correlationId: "c-slow", deadline });

    expect(result.ok === false && result.failure).toEqual({
      kind: "Timeout",
      message: "Call to 'crawl_site' on 'crawler' passed its deadline",
    });
    expect(seen?.deadline).toBe(deadline);
    expect(seen?.signal?.aborted).toBe(true);
  });

  it("reports Cancelled and cancels the call when the caller aborts", async () => {
    let seen: ChannelCallOptions | undefined;
    const crawler = new FakeEndpoint("crawler").tool("crawl_site", async (_args, options) => {
      seen = options;
      await new Promise((resolve) => setTimeout(resolve, 80));
      return { text: "late" };
    });
    const { sessions } = manager([crawler]);
    const handle = await sessions.connect(crawler.config);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 5);

    const result = await sessions.call(handle, "crawl_site", {}, {
      correlationId: "c-stop",
      deadline: inOneMinute(),
      signal: controller.signal,
    });

    expect(result.ok === false && result.failure.kind).toBe("Cancelled");
    expect(seen?.signal?.aborted).toBe(true);
  });

  it("fails the endpoint when a call is rejected for its key", async () => {
    const tasks = new FakeEndpoint("tasks").tool("get_tasks", () => {
      throw new AuthError("tasks", "Endpoint 'tasks' rejected the API key: HTTP 401");
    });
    const { sessions } = manager([tasks]);
    const handle = await sessions.connect(tasks.config);
    const states: unknown[] = [];
    sessions.onEvent((event) => {
      if (event.type === STATE_EVENT) states.push(event.payload);
    });

    const first = await sessions.call(handle, "get_tasks", {}, { correlationId: "c-a", deadline: inOneMinute() });
    const second = await sessions.call(handle, "get_tasks", {}, { correlationId: "c-b", deadline: inOneMinute() });

    expect(first.ok === false && first.failure.kind).toBe("AuthError");
    expect(second.ok === false && second.failure.kind).toBe("EndpointUnavailable");
    expect(tasks.calls).toHaveLength(1);
    expect(sessions.endpoint("tasks")?.state).toBe("failed");
    expect(states).toEqual([
      {
        state: "failed",
        previous: "connected",
        error: "Endpoint 'tasks' rejected the API key: HTTP 401",
      },
    ]);
  });

  it("fails a call whose deadline already passed without sending it", async () => {
    const memory = new FakeEndpoint("memory").tool("get_all_memories", () => ({ text: "[]" }));
    const { sessions } = manager([memory]);
    const handle = await sessions.connect(memory.config);

    const result = await sessions.call(handle, "get_all_memories", {}, {
      correlationId: "c-old",
      deadline: Date.now() - 1,
    });

    expect(result.ok === false && result.failure.kind).toBe("Timeout");
    expect(memory.calls).toEqual([]);
  });

  it("returns EndpointUnavailable for failed, closed and unknown endpoints", async () => {
    const memory = new FakeEndpoint("memory").tool("get_all_memories", () => ({ text: "[]" }));
    const dead = new FakeEndpoint("dead");
    dead.alwaysFail = new Error("Error POSTing to endpoint (HTTP 403): Forbidden");
    const { sessions } = manager([memory, dead]);
    const handle = await sessions.connect(memory.config);
    await sessions.connect(dead.config).catch(() => undefined);
    await sessions.close(handle);

    const options = { correlationId: "c", deadline: inOneMinute() };
    const kinds = await Promise.all([
      sessions.call({ endpoint: "memory" }, "get_all_memories", {}, options),
      sessions.call({ endpoint: "dead" }, "anything", {}, options),
      sessions.call({ endpoint: "nowhere" }, "anything", {}, options),
    ]);

    expect(kinds.map((r) => (r.ok ? "ok" : r.failure.kind))).toEqual([
      "EndpointUnavailable",
      "EndpointUnavailable",
      "EndpointUnavailable",
    ]);
    expect(memory.calls).toEqual([]);
  });

  it("waits for a reconnect after the transport drops", async () => {
    const memory = new FakeEndpoint("memory").tool("get_all_memories", () => ({ text: "[]" }));
    const { sessions } = manager([memory]);
    const handle = await sessions.connect(memory.config);

    memory.drop();
    const result = await sessions.call(handle, "get_all_memories", {}, {
      correlationId: "c-after-drop",
      deadline: inOneMinute(),
    });

    expect(result.ok).toBe(true);
    expect(memory.opens).toBe(2);
    expect(sessions.endpoint("memory")?.state).toBe("connected");
  });

  it("forwards progress to the caller and to subscribers", async () => {
    const crawler = new FakeEndpoint("crawler").tool("crawl_site", (_args, options) => {
      options.onProgress?.({ progress: 1, total: 3, message: "https://site.test" });
      return { text: "done" };
    });
    const { sessions } = manager([crawler]);
    const handle = await sessions.connect(crawler.config);
    const progressEvents: SessionEvent[] = [];
    sessions.onEvent((event) => {
      if (event.type === "notifications/progress") progressEvents.push(event);
    });
    const seen: number[] = [];

    await sessions.call(handle, "crawl_site", {}, {
      correlationId: "c-p",
      deadline: inOneMinute(),
      onProgress: (p) => seen.push(p.progress),
    });

    expect(seen).toEqual([1]);
    expect(progressEvents.map((e) => e.payload)).toEqual([
      { correlationId: "c-p", toolName: "crawl_site", progress: 1, total: 3, message: "https://site.test" },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Subscriptions
// ---------------------------------------------------------------------------

describe("SessionManager -- subscribe", () => {
  it("streams notifications of one endpoint until aborted", async () => {
    const memory = new FakeEndpoint("memory");
    const tasks = new FakeEndpoint("tasks");
    const { sessions } = manager([memory, tasks]);
    const memoryHandle = await sessions.connect(memory.config);
    await sessions.connect(tasks.config);

    const controller = new AbortController();
    const stream = sessions.subscribe(memoryHandle, controller.signal);

    tasks.notify("notifications/message", { level: "info", data: "tasks" });
    memory.notify("notifications/message", { level: "info", data: "first" });
    memory.notify("notifications/tools/list_changed", undefined);

    const received: Array<[string, unknown]> = [];
    for await (const event of stream) {
      received.push([event.type, event.payload]);
      if (received.length === 2) controller.abort();
    }

    expect(received).toEqual([
      ["notifications/message", { level: "info", data: "first" }],
      ["notifications/tools/list_changed", undefined],
    ]);
  });

  it("ends every subscription on shutdown", async () => {
    const memory = new FakeEndpoint("memory");
    const { sessions } = manager([memory]);
    await sessions.connect(memory.config);

    const stream = sessions.subscribe();
    const drained = (async () => {
      const types: string[] = [];
      for await (const event of stream) types.push(event.type);
      return types;
    })();

    await sessions.shutdown();

    expect(await drained).toEqual([STATE_EVENT]);
    expect(sessions.endpoint("memory")?.state).toBe("disconnected");
  });
});
