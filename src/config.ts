/**
 * @module config
 * @fileoverview Application configuration loaded from environment variables
 * and the backend server list.
 *
 * Every numeric setting has a default so the orchestrator starts with no
 * environment at all. The server list is the one input without a default:
 * which backends exist is deployment knowledge.
 *
 * ## Architecture Position
 * Imported by nearly every module; imports nothing from the application
 * except the error types.
 *
 * ```
 *  +-----------+   +-----------+   +-----------+   +-----------+
 *  | transport |   | dispatch  |   |  crawler  |   |  servers  |
 *  +-----+-----+   +-----+-----+   +-----+-----+   +-----+-----+
 *        |               |               |               |
 *        +-------+-------+-------+-------+-------+-------+
 *                |                               |
 *          +-----v-----+                   +-----v-----+
 *          |  config   |                   |   utils   |
 *          +-----------+                   +-----------+
 * ```
 *
 * ## Environment Variable Naming Convention
 * - SCREAMING_SNAKE_CASE.
 * - Numbers are parsed with `parseInt(..., 10)`.
 * - Booleans are the strings `"true"` / `"false"`.
 *
 * @example
 * ```ts
 * import { config, loadServerEndpoints } from "./config.js";
 *
 * const endpoints = await loadServerEndpoints(config.serversConfigPath);
 * // [{ name: "memory", url: "http://localhost:8030/sse", apiKey: "..." }, ...]
 * ```
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { EndpointConfig } from "./types.js";
import { ConfigError, errorMessage } from "./utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Complete application configuration. Every field has a default.
 */
export interface AppConfig {
  /**
   * Time budget of one tool call, in milliseconds. Turned into an absolute
   * deadline when a request is created.
   *
   * @default 30000
   */
  callTimeout: number;

  /** First reconnect delay, doubled after every failed attempt. @default 1000 */
  backoffBaseMs: number;

  /** Upper bound on the reconnect delay. @default 30000 */
  backoffCapMs: number;

  /**
   * Connect attempts before an endpoint is marked `failed`, counting the
   * first one.
   *
   * @default 5
   */
  maxConnectAttempts: number;

  /** @default 2 */
  crawlMaxDepth: number;

  /** Fetches per second when the caller does not say. @default 1 */
  crawlRateLimit: number;

  /** Hard cap on fetches per crawl. @default 100 */
  crawlMaxPages: number;

  /** HTTP request timeout of one page fetch, in milliseconds. @default 10000 */
  fetchTimeout: number;

  /** Maximum response body size in bytes. @default 10485760 */
  maxResponseSize: number;

  /** User-Agent header sent with every page fetch. */
  userAgent: string;

  /**
   * Skip the private-address check before page fetches. Only for local
   * development against servers on localhost.
   *
   * @default false
   */
  allowPrivateHosts: boolean;

  /** Page cache entry lifetime, in seconds. @default 3600 */
  cacheTtl: number;

  /** @default 500 */
  cacheMaxKeys: number;

  /** Model name passed to the OpenAI-compatible chat API. */
  llmModel: string;

  /**
   * Base URL of the chat API. Unset means api.openai.com; point it at
   * `http://localhost:11434/v1` for Ollama.
   */
  llmBaseUrl: string | undefined;

  /** API key of the chat API. Ollama accepts any value. */
  llmApiKey: string;

  /** Path of the backend server list. @default "servers.json" */
  serversConfigPath: string;

  /** Directory of the per-user task files. @default "tasks" */
  tasksDataDir: string;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Read `process.env` and build a complete {@link AppConfig}.
 *
 * Pure apart from the environment read, so tests can set variables and call
 * it again.
 */
export function loadConfig(): AppConfig {
  return {
    callTimeout: parseInt(process.env.CALL_TIMEOUT_MS ?? "30000", 10),
    backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS ?? "1000", 10),
    backoffCapMs: parseInt(process.env.BACKOFF_CAP_MS ?? "30000", 10),
    maxConnectAttempts: parseInt(process.env.MAX_CONNECT_ATTEMPTS ?? "5", 10),

    crawlMaxDepth: parseInt(process.env.CRAWL_MAX_DEPTH ?? "2", 10),
    crawlRateLimit: parseFloat(process.env.CRAWL_RATE_LIMIT ?? "1"),
    crawlMaxPages: parseInt(process.env.CRAWL_MAX_PAGES ?? "100", 10),

    fetchTimeout: parseInt(process.env.FETCH_TIMEOUT ?? "10000", 10),
    maxResponseSize: parseInt(process.env.MAX_RESPONSE_SIZE ?? "10485760", 10),
    userAgent: process.env.USER_AGENT ?? "mcp-tool-orchestrator/1.0 (crawler)",
    allowPrivateHosts: process.env.ALLOW_PRIVATE_HOSTS === "true",

    cacheTtl: parseInt(process.env.CACHE_TTL ?? "3600", 10),
    cacheMaxKeys: parseInt(process.env.CACHE_MAX_KEYS ?? "500", 10),

    llmModel: process.env.LLM_MODEL ?? "gpt-4o-mini",
    llmBaseUrl: process.env.LLM_BASE_URL || undefined,
    llmApiKey: process.env.LLM_API_KEY ?? process.env.OPENAI_API_KEY ?? "ollama",

    serversConfigPath: process.env.SERVERS_CONFIG ?? "servers.json",
    tasksDataDir: process.env.TASKS_DATA_DIR ?? "tasks",
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Backend Server List
 * ──────────────────────────────────────────────────────────────────────────── */

const serverEntrySchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  api_key: z.string().min(1),
  path: z.string().startsWith("/").default("/sse"),
});

const serverListSchema = z.object({
  servers: z.record(serverEntrySchema),
});

/**
 * Validate an already-parsed server list and turn it into endpoint configs,
 * in file order.
 *
 * @throws {ConfigError} When the shape does not match.
 */
export function parseServerEndpoints(raw: unknown): EndpointConfig[] {
  const parsed = serverListSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid server list: ${problems}`);
  }

  return Object.entries(parsed.data.servers).map(([name, entry]) => ({
    name,
    url: `http://${entry.host}:${entry.port}${entry.path}`,
    apiKey: entry.api_key,
  }));
}

/**
 * Read and validate the JSON server list at `path`.
 *
 * ```json
 * { "servers": { "memory": { "host": "localhost", "port": 8030, "api_key": "..." } } }
 * ```
 *
 * @throws {ConfigError} When the file is missing, is not JSON or has the wrong shape.
 */
export async function loadServerEndpoints(path: string): Promise<EndpointConfig[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read server list '${path}': ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Server list '${path}' is not valid JSON: ${errorMessage(error)}`);
  }

  return parseServerEndpoints(raw);
}

/* ────────────────────────────────────────────────────────────────────────────
 * Backend Listen Settings
 * ──────────────────────────────────────────────────────────────────────────── */

/** Where one backend server listens and which key it expects. */
export interface ListenConfig {
  host: string;
  port: number;
  apiKey: string;
}

const DEFAULT_PORTS: Readonly<Record<string, number>> = {
  tasks: 8010,
  calendar: 8020,
  memory: 8030,
  crawler: 8040,
};

/**
 * Listen settings of the backend called `name`, from
 * `<NAME>_SERVER_HOST`, `<NAME>_SERVER_PORT` and `<NAME>_SERVER_API_KEY`.
 *
 * @throws {ConfigError} When the API key is unset or the port is not a number.
 */
export function loadListenConfig(name: string, env: NodeJS.ProcessEnv = process.env): ListenConfig {
  const prefix = `${name.toUpperCase()}_SERVER`;
  const apiKey = env[`${prefix}_API_KEY`];
  if (!apiKey) {
    throw new ConfigError(`${prefix}_API_KEY must be set`);
  }

  const port = parseInt(env[`${prefix}_PORT`] ?? String(DEFAULT_PORTS[name] ?? 8000), 10);
  if (Number.isNaN(port)) {
    throw new ConfigError(`${prefix}_PORT is not a number`);
  }

  return {
    host: env[`${prefix}_HOST`] ?? "localhost",
    port,
    apiKey,
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Configuration read once at module load. Call {@link loadConfig} for a
 * fresh snapshot.
 */
export const config: AppConfig = loadConfig();
