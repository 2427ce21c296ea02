/**
 * @fileoverview End-to-end tests of the orchestrator against real backend
 * servers on linked in-memory transports, with a scripted classifier.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Orchestrator, type OrchestratorConfig } from "../src/orchestrator.js";
import type { ClassifierPrompt } from "../src/router/intent-router.js";
import { createCrawlerServer } from "../src/servers/crawler-server.js";
import { createMemoryServer } from "../src/servers/memory-server.js";
import { InMemoryTaskStore } from "../src/servers/stores/task-store.js";
import { createTasksServer } from "../src/servers/tasks-server.js";
import { PageCache } from "../src/services/cache.js";
import type { DispatchResult, EndpointConfig } from "../src/types.js";
import { silentLogger } from "../src/utils/logger.js";
import { fakeSite, type FakePage } from "./helpers/fake-site.js";
import { linkedChannelFactory } from "./helpers/linked-server.js";

const MEMORY: EndpointConfig = { name: "memory", url: "http://memory.test/sse", apiKey: "test-secret" };
const TASKS: EndpointConfig = { name: "tasks", url: "http://tasks.test/sse", apiKey: "test-secret" };
const CALENDAR: EndpointConfig = { name: "calendar", url: "http://calendar.test/sse", apiKey: "test-secret" };
const CRAWLER: EndpointConfig = { name: "crawler", url: "http://crawler.test/sse", apiKey: "test-secret" };
const SITE = "https://site.test";

interface Harness {
  orchestrator: Orchestrator;
  prompts: ClassifierPrompt[];
  responded: string[];
}

let running: Orchestrator | undefined;

afterEach(async () => {
  await running?.shutdown();
  running = undefined;
});

function harness(
  replies: Array<string | Error>,
  servers: Record<string, () => McpServer>,
  config: Partial<OrchestratorConfig> = {},
): Harness {
  const prompts: ClassifierPrompt[] = [];
  const responded: string[] = [];
  const orchestrator = Orchestrator.create(
    { endpoints: [MEMORY, TASKS], maxConnectAttempts: 1, callTimeoutMs: 2000, ...config },
    {
      classifier: async (prompt) => {
        prompts.push(prompt);
        const reply = replies.shift() ?? '{"calls": []}';
        if (reply instanceof Error) throw reply;
        return reply;
      },
      responder: async (text) => {
        responded.push(text);
        return `You said: ${text}`;
      },
      channelFactory: linkedChannelFactory(servers),
      logger: silentLogger,
    },
  );
  running = orchestrator;
  return { orchestrator, prompts, responded };
}

function defaultServers(): Record<string, () => McpServer> {
  const tasks = new InMemoryTaskStore();
  return {
    memory: () => createMemoryServer(),
    tasks: () => createTasksServer(tasks),
  };
}

function summarize(results: readonly DispatchResult[]): string[] {
  return results.map((result) => (result.ok ? result.payload.text : result.failure.kind));
}

// ---------------------------------------------------------------------------
// Startup
// ---------------------------------------------------------------------------

describe("Orchestrator -- start", () => {
  it("connects every endpoint and merges their catalogs", async () => {
    const { orchestrator } = harness([], defaultServers());

    expect(await orchestrator.start()).toEqual({ connected: ["memory", "tasks"], failed: [] });
    expect(Object.keys(orchestrator.tools().tools).sort()).toEqual([
      "add_new_task",
      "complete_task",
      "get_all_memories",
      "get_tasks",
      "save_memory",
      "search_memories",
    ]);
    expect(orchestrator.endpoints().map((endpoint) => [endpoint.name, endpoint.state])).toEqual([
      ["memory", "connected"],
      ["tasks", "connected"],
    ]);
  });

  it("reports an unreachable endpoint and keeps the others", async () => {
    const { orchestrator } = harness([], defaultServers(), { endpoints: [MEMORY, CALENDAR] });

    expect(await orchestrator.start()).toEqual({
      connected: ["memory"],
      failed: [
        {
          endpoint: "calendar",
          error: "Endpoint 'calendar' unreachable after 1 attempts: Endpoint 'calendar': no server for calendar",
        },
      ],
    });
    expect(Object.keys(orchestrator.tools().tools).sort()).toEqual([
      "get_all_memories",
      "save_memory",
      "search_memories",
    ]);
  });

  it("refuses to start twice", async () => {
    const { orchestrator } = harness([], defaultServers());
    await orchestrator.start();
    await expect(orchestrator.start()).rejects.toThrow("Orchestrator already started");
  });

  it("refreshes the catalog when a server announces a tool list change", async () => {
    let live: McpServer | undefined;
    const { orchestrator } = harness([], {
      memory: () => {
        live = new McpServer({ name: "memory", version: "1.0.0" });
        live.tool("ping", "Ping.", async () => ({ content: [{ type: "text" as const, text: "pong" }] }));
        return live;
      },
    }, { endpoints: [MEMORY] });
    await orchestrator.start();
    expect(Object.keys(orchestrator.tools().tools)).toEqual(["ping"]);

    live?.tool("echo", "Echo.", async () => ({ content: [{ type: "text" as const, text: "echo" }] }));

    await vi.waitFor(() => {
      expect(Object.keys(orchestrator.tools().tools).sort()).toEqual(["echo", "ping"]);
    });
  });
});

// ---------------------------------------------------------------------------
// Handling requests
// ---------------------------------------------------------------------------

describe("Orchestrator -- handle", () => {
  it("runs every planned call in order", async () => {
    const { orchestrator, prompts } = harness(
      [
        '{"calls": [{"tool": "save_memory", "arguments": {"content": "likes tea"}},' +
          ' {"tool": "get_all_memories", "arguments": {}}]}',
      ],
      defaultServers(),
    );
    await orchestrator.start();

    const outcome = await orchestrator.handle("remember that I like tea, then list my memories");

    expect(outcome.kind).toBe("tools");
    if (outcome.kind !== "tools") return;
    expect(outcome.plan.map((call) => call.toolName)).toEqual(["save_memory", "get_all_memories"]);
    expect(summarize(outcome.results)).toEqual(["Successfully saved memory: likes tea", '[\n  "likes tea"\n]']);
    expect(prompts[0]?.messages).toEqual([
      { role: "user", content: "remember that I like tea, then list my memories" },
    ]);
    expect(prompts[0]?.system).toContain("- save_memory: Save a new long-term memory about the user.");
  });

  it("reports per-call failures without stopping the plan", async () => {
    const { orchestrator } = harness(
      [
        '{"calls": [{"tool": "add_new_task", "arguments": {}},' +
          ' {"tool": "complete_task", "arguments": {"task": "walk"}},' +
          ' {"tool": "add_new_task", "arguments": {"task": "walk"}}]}',
      ],
      defaultServers(),
    );
    await orchestrator.start();

    const outcome = await orchestrator.handle("add a task");

    expect(outcome.kind === "tools" && summarize(outcome.results)).toEqual([
      "InvalidArguments",
      "RemoteError",
      "Successfully added task 'walk'",
    ]);
  });

  it("answers conversationally when no tool applies", async () => {
    const { orchestrator, responded } = harness(['{"tool": "none"}'], defaultServers());
    await orchestrator.start();

    expect(await orchestrator.handle("hello there")).toEqual({
      kind: "conversation",
      reply: "You said: hello there",
    });
    expect(responded).toEqual(["hello there"]);
  });

  it("returns a routing failure when the classifier fails", async () => {
    const { orchestrator, responded } = harness([new Error("model offline")], defaultServers());
    await orchestrator.start();

    expect(await orchestrator.handle("save this")).toEqual({
      kind: "routing-failure",
      message: "Classifier failed: model offline",
    });
    expect(responded).toEqual([]);
  });

  it("returns a routing failure after a second invented tool", async () => {
    const { orchestrator, prompts } = harness(['{"tool": "fly"}', '{"tool": "fly"}'], defaultServers());
    await orchestrator.start();

    const outcome = await orchestrator.handle("fly me to the moon");

    expect(outcome).toEqual({
      kind: "routing-failure",
      message: "Routing failed after correction: Classifier chose unknown tool 'fly'",
    });
    expect(prompts).toHaveLength(2);
  });

  it("passes progress with the tool name", async () => {
    const { orchestrator } = harness(['{"tool": "count"}'], {
      memory: () => {
        const server = new McpServer({ name: "memory", version: "1.0.0" });
        server.tool("count", "Count to two.", async (extra) => {
          const token = extra._meta?.progressToken;
          if (token !== undefined) {
            for (const progress of [1, 2]) {
              await extra.sendNotification({
                method: "notifications/progress",
                params: { progressToken: token, progress, total: 2 },
              });
            }
          }
          return { content: [{ type: "text" as const, text: "done" }] };
        });
        return server;
      },
    }, { endpoints: [MEMORY] });
    await orchestrator.start();
    const seen: Array<[string, number]> = [];

    const outcome = await orchestrator.handle("count", {
      onProgress: (toolName, progress) => seen.push([toolName, progress.progress]),
    });

    expect(outcome.kind === "tools" && summarize(outcome.results)).toEqual(["done"]);
    expect(seen).toEqual([
      ["count", 1],
      ["count", 2],
    ]);
  });

  it("returns the pages a crawl gathered before its deadline", async () => {
    const paths = Array.from({ length: 20 }, (_, index) => `/p${index + 1}`);
    const pages: Record<string, FakePage> = { [SITE]: { title: "Home", links: paths } };
    for (const path of paths) pages[`${SITE}${path}`] = { title: path };
    const site = fakeSite(pages);
    const cache = new PageCache({ ttlSeconds: 60 });
    const { orchestrator } = harness(
      [`{"tool": "crawl_site", "arguments": {"seed_url": "${SITE}", "max_depth": 1, "rate_limit_per_second": 10}}`],
      { crawler: () => createCrawlerServer({ cache, fetcher: site.fetcher, logger: silentLogger }) },
      { endpoints: [CRAWLER], callTimeoutMs: 500 },
    );
    await orchestrator.start();

    const outcome = await orchestrator.handle("crawl site.test");
    const fetchedAtReturn = site.fetched.length;
    await new Promise((resolve) => setTimeout(resolve, 300));
    cache.close();

    expect(outcome.kind).toBe("tools");
    if (outcome.kind !== "tools") return;
    const result = outcome.results[0];
    expect(result?.ok).toBe(true);
    if (result === undefined || !result.ok) return;
    const crawl: unknown = JSON.parse(result.payload.text);
    expect(crawl).toMatchObject({ summary: { state: "cancelled" }, records: [{ url: SITE, title: "Home" }] });
    expect(fetchedAtReturn).toBeLessThan(21);
    expect(site.fetched).toHaveLength(fetchedAtReturn);
  });

  it("drops every tool on shutdown", async () => {
    const { orchestrator } = harness([], defaultServers());
    await orchestrator.start();

    await orchestrator.shutdown();

    expect(orchestrator.tools().tools).toEqual({});
    expect(orchestrator.endpoints().map((endpoint) => endpoint.state)).toEqual(["disconnected", "disconnected"]);
  });
});
