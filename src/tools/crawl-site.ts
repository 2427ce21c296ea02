/**
 * @module tools/crawl-site
 * @fileoverview MCP Tool: crawl_site -- bounded, rate-limited BFS crawl.
 *
 * ## Usage Example (from an MCP client)
 * ```json
 * {
 *   "tool": "crawl_site",
 *   "arguments": {
 *     "seed_url": "https://docs.example.com",
 *     "max_depth": 1,
 *     "rate_limit_per_second": 2,
 *     "scope": "allow-list",
 *     "allow_list": ["docs.example.com", "example.com"]
 *   }
 * }
 * ```
 *
 * ## Response Format
 * JSON `{ "summary": CrawlSummary, "records": CrawlRecord[] }`, records in
 * fetch order. When the caller sent a progress token, one progress
 * notification per record goes out as the crawl runs.
 *
 * A bad seed or an empty allow-list is the only error response; failures
 * of individual pages are records with a non-`ok` outcome.
 *
 * ## Time Budget
 * When the client sends `_meta.timeBudgetMs`, the crawl cancels itself
 * shortly before the budget runs out and answers with the records gathered
 * so far (`summary.state` is `"cancelled"`). {@link RESULT_RESERVE_MS} of the
 * budget, at most a fifth of it, is kept back for delivering the answer.
 */

import { z } from "zod";
import { config } from "../config.js";
import { CrawlEngine } from "../crawler/crawl-engine.js";
import type { CrawlRecord, CrawlScope, PageFetcher } from "../crawler/types.js";
import type { Logger } from "../utils/logger.js";
import { jsonResult, runTool, type ToolResponse } from "./result.js";

export const CrawlSiteSchema = {
  seed_url: z.string().url().describe("Start URL of the crawl"),
  max_depth: z
    .number()
    .int()
    .min(0)
    .max(5)
    .optional()
    .default(config.crawlMaxDepth)
    .describe(`Link depth to follow; 0 fetches only the seed (default: ${config.crawlMaxDepth})`),
  rate_limit_per_second: z
    .number()
    .positive()
    .max(10)
    .optional()
    .default(config.crawlRateLimit)
    .describe(`Page fetches per second (default: ${config.crawlRateLimit})`),
  scope: z
    .enum(["same-origin", "allow-list"])
    .optional()
    .default("same-origin")
    .describe("Which links to follow: the seed's origin only, or hosts from allow_list"),
  allow_list: z
    .array(z.string())
    .optional()
    .describe("Hosts (and their subdomains) to follow when scope is allow-list"),
  max_pages: z
    .number()
    .int()
    .min(1)
    .max(config.crawlMaxPages)
    .optional()
    .default(config.crawlMaxPages)
    .describe(`Maximum pages to fetch (default: ${config.crawlMaxPages})`),
};

export interface CrawlSiteParams {
  seed_url: string;
  max_depth: number;
  rate_limit_per_second: number;
  scope: "same-origin" | "allow-list";
  allow_list?: string[];
  max_pages: number;
}

/** Per-call hooks supplied by the server from the request context. */
export interface CrawlSiteContext {
  /** Aborted when the client cancels the request. */
  signal?: AbortSignal;
  /** Milliseconds the client still waits for the answer. */
  timeBudgetMs?: number;
  /** Present only when the client asked for progress. */
  reportProgress?: (progress: number, total: number, message: string) => Promise<void>;
}

export interface CrawlSiteDeps {
  fetcher?: PageFetcher;
  logger?: Logger;
}

export const RESULT_RESERVE_MS = 1_000;

/** Signal that aborts on client cancellation or when the time budget is nearly spent. */
export function crawlSignal(context: CrawlSiteContext): AbortSignal | undefined {
  const { signal, timeBudgetMs } = context;
  if (timeBudgetMs === undefined) return signal;

  const reserve = Math.min(RESULT_RESERVE_MS, timeBudgetMs / 5);
  const budget = AbortSignal.timeout(Math.max(Math.floor(timeBudgetMs - reserve), 0));
  return signal ? AbortSignal.any([signal, budget]) : budget;
}

function scopeOf(params: CrawlSiteParams): CrawlScope {
  return params.scope === "allow-list"
    ? { kind: "allow-list", hosts: params.allow_list ?? [] }
    : { kind: "same-origin" };
}

export function createCrawlSiteHandler(deps: CrawlSiteDeps = {}) {
  return (params: CrawlSiteParams, context: CrawlSiteContext = {}): Promise<ToolResponse> =>
    runTool(async () => {
      const engine = new CrawlEngine({
        seedUrl: params.seed_url,
        maxDepth: params.max_depth,
        rateLimitPerSecond: params.rate_limit_per_second,
        scope: scopeOf(params),
        maxPages: params.max_pages,
        fetcher: deps.fetcher,
        signal: crawlSignal(context),
        logger: deps.logger,
      });

      const records: CrawlRecord[] = [];
      const run = engine.run();
      for (;;) {
        const step = await run.next();
        if (step.done) {
          return jsonResult({ summary: step.value, records });
        }
        records.push(step.value);
        await context.reportProgress?.(records.length, params.max_pages, step.value.url);
      }
    });
}
