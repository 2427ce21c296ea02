/**
 * @module crawler/crawl-engine
 * @fileoverview Bounded, rate-limited breadth-first crawl.
 *
 * ## Lifecycle
 * ```
 *            run()                 frontier empty / maxPages
 *   idle ───────────> running ──────────────────────────────> completed
 *     │                 │
 *     │ bad seed/scope  │ cancel() / signal
 *     v                 v
 *   failed          cancelled
 * ```
 *
 * ## Algorithm
 * 1. Canonicalize the seed, check its scheme and bind the scope. Any failure
 *    here is fatal: the state becomes `failed` and `run()` throws
 *    {@link FrontierError}.
 * 2. Pop the lowest-depth frontier entry. Skip it when already visited.
 * 3. Wait for the rate limiter, fetch, parse, and emit one {@link CrawlRecord}
 *    whatever the outcome. Page failures never stop the crawl.
 * 4. Push in-scope, unseen links at depth + 1 while depth + 1 <= maxDepth.
 * 5. Stop when the frontier is empty, `maxPages` records were emitted, or the
 *    crawl is cancelled. A fetch in flight at cancellation completes and its
 *    record is dropped; records already emitted stay emitted.
 *
 * @example
 * ```ts
 * const engine = new CrawlEngine({
 *   seedUrl: "https://example.com/docs",
 *   maxDepth: 2,
 *   rateLimitPerSecond: 2,
 *   scope: { kind: "same-origin" },
 * });
 *
 * for await (const record of engine.run()) {
 *   console.error(record.depth, record.url, record.outcome);
 * }
 * ```
 */

import { config } from "../config.js";
import { safeFetch } from "../services/fetch.js";
import type { FetchedPage } from "../services/fetch.js";
import {
  ContentTypeError,
  FetchError,
  FrontierError,
  OrchestratorError,
  ParseError,
  ResponseTooLargeError,
  TimeoutError,
  errorMessage,
} from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { canonicalizeUrl, isFetchableUrl } from "../utils/url.js";
import { Frontier, type FrontierEntry } from "./frontier.js";
import { parseHtml } from "./html-parser.js";
import { AbortedWhileQueuedError, RateLimiter } from "./rate-limiter.js";
import { createScopeFilter, type ScopeFilter } from "./scope.js";
import type {
  CrawlOutcome,
  CrawlRecord,
  CrawlScope,
  CrawlStateName,
  CrawlSummary,
  PageFetcher,
  PageParser,
  ParsedPage,
} from "./types.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Options
 * ──────────────────────────────────────────────────────────────────────────── */

export interface CrawlOptions {
  seedUrl: string;
  /** 0 fetches only the seed. */
  maxDepth: number;
  /** Fetch starts per second; fractional values allowed. */
  rateLimitPerSecond: number;
  scope: CrawlScope;
  /** @default config.crawlMaxPages */
  maxPages?: number;
  /** @default safeFetch with the configured limits */
  fetcher?: PageFetcher;
  /** @default parseHtml */
  parser?: PageParser;
  /** Aborting it cancels the crawl. */
  signal?: AbortSignal;
  logger?: Logger;
}

/** Everything a drained crawl produced. */
export interface CrawlResult {
  state: CrawlStateName;
  records: CrawlRecord[];
  summary: CrawlSummary;
}

const defaultFetcher: PageFetcher = (url) => safeFetch(url);

/* ────────────────────────────────────────────────────────────────────────────
 * Failure Classification
 * ──────────────────────────────────────────────────────────────────────────── */

function outcomeOf(error: unknown): CrawlOutcome {
  if (error instanceof TimeoutError) return "timeout";
  if (
    error instanceof ContentTypeError ||
    error instanceof ResponseTooLargeError ||
    error instanceof ParseError
  ) {
    return "parse-error";
  }
  return "http-error";
}

function statusCodeOf(error: unknown): number | undefined {
  return error instanceof FetchError ? error.statusCode : undefined;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Engine
 * ──────────────────────────────────────────────────────────────────────────── */

export class CrawlEngine {
  private stateName: CrawlStateName = "idle";
  private readonly cancelController = new AbortController();
  private readonly limiter: RateLimiter;
  private readonly fetcher: PageFetcher;
  private readonly parser: PageParser;
  private readonly maxPages: number;
  private readonly log: Logger;

  constructor(private readonly options: CrawlOptions) {
    this.fetcher = options.fetcher ?? defaultFetcher;
    this.parser = options.parser ?? parseHtml;
    this.maxPages = options.maxPages ?? config.crawlMaxPages;
    this.log = options.logger ?? createLogger("crawler");

    const rate = options.rateLimitPerSecond;
    this.limiter = new RateLimiter(Number.isFinite(rate) && rate > 0 ? rate : 1);

    if (options.signal?.aborted) {
      this.cancelController.abort();
    } else {
      options.signal?.addEventListener("abort", () => this.cancel(), { once: true });
    }
  }

  get state(): CrawlStateName {
    return this.stateName;
  }

  /** Minimum gap between fetch starts, in milliseconds. */
  get intervalMs(): number {
    return this.limiter.intervalMs;
  }

  /**
   * Request cancellation. Takes effect before the next fetch; a fetch in
   * flight finishes and its record is discarded. No-op once the crawl ended.
   */
  cancel(): void {
    if (this.cancelController.signal.aborted) return;
    this.cancelController.abort();
    this.limiter.clear();
  }

  private get cancelled(): boolean {
    return this.cancelController.signal.aborted;
  }

  /**
   * Build the frontier. Sets the state to `failed` and throws on bad input.
   */
  private prepare(): { seed: string; inScope: ScopeFilter } {
    const { seedUrl, maxDepth, rateLimitPerSecond, scope } = this.options;
    try {
      if (!Number.isInteger(maxDepth) || maxDepth < 0) {
        throw new FrontierError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
      }
      if (!Number.isFinite(rateLimitPerSecond) || rateLimitPerSecond <= 0) {
        throw new FrontierError(`rateLimitPerSecond must be positive, got ${rateLimitPerSecond}`);
      }
      if (!isFetchableUrl(seedUrl)) {
        throw new FrontierError(`Seed URL '${seedUrl}' is not an absolute http(s) URL`);
      }
      const seed = canonicalizeUrl(seedUrl);
      return { seed, inScope: createScopeFilter(scope, seed) };
    } catch (error) {
      this.stateName = "failed";
      if (error instanceof FrontierError) throw error;
      throw new FrontierError(`Cannot build crawl frontier: ${errorMessage(error)}`);
    }
  }

  /**
   * Crawl lazily, yielding one record per fetched page. The generator's
   * return value is the {@link CrawlSummary}.
   *
   * Breaking out of a `for await` loop cancels the crawl.
   *
   * @throws {FrontierError} When the seed or scope is unusable.
   */
  async *run(): AsyncGenerator<CrawlRecord, CrawlSummary, undefined> {
    if (this.stateName !== "idle") {
      throw new OrchestratorError(`Crawl already ${this.stateName}`, "CRAWL_STARTED");
    }

    const { seed, inScope } = this.prepare();
    const { maxDepth } = this.options;
    const startedAt = Date.now();

    this.stateName = "running";
    this.log.info(
      `Starting crawl of ${seed} (maxDepth=${maxDepth}, interval=${this.limiter.intervalMs}ms, maxPages=${this.maxPages})`,
    );

    const frontier = new Frontier();
    const visited = new Set<string>();
    frontier.push(seed, 0);

    let pagesVisited = 0;
    let failures = 0;
    let maxDepthReached = 0;

    try {
      while (!this.cancelled && pagesVisited < this.maxPages) {
        const entry = frontier.pop();
        if (!entry) break;
        if (visited.has(entry.url) || entry.depth > maxDepth) continue;
        visited.add(entry.url);

        let record: CrawlRecord;
        try {
          record = await this.limiter.schedule(
            () => this.visit(entry),
            this.cancelController.signal,
          );
        } catch (error) {
          if (error instanceof AbortedWhileQueuedError) break;
          throw error;
        }

        if (this.cancelled) {
          this.log.debug(`Discarding ${entry.url}: crawl cancelled while fetching`);
          break;
        }

        pagesVisited += 1;
        if (record.outcome !== "ok") failures += 1;
        maxDepthReached = Math.max(maxDepthReached, record.depth);
        if (record.finalUrl) visited.add(record.finalUrl);

        if (entry.depth + 1 <= maxDepth) {
          for (const link of record.links) {
            if (!visited.has(link) && inScope(link)) {
              frontier.push(link, entry.depth + 1);
            }
          }
        }

        yield record;
      }

      this.stateName = this.cancelled ? "cancelled" : "completed";
    } finally {
      // Reached without a state change only when the consumer stopped early.
      if (this.stateName === "running") {
        this.cancel();
        this.stateName = "cancelled";
      }
    }

    this.log.info(
      `Crawl ${this.stateName}: ${pagesVisited} pages, ${failures} failures, depth ${maxDepthReached}`,
    );

    return Object.freeze({
      state: this.stateName,
      pagesVisited,
      failures,
      maxDepthReached,
      startedAt,
      finishedAt: Date.now(),
    });
  }

  /** Drain {@link run} into memory. */
  async collect(): Promise<CrawlResult> {
    const records: CrawlRecord[] = [];
    const iterator = this.run();
    for (;;) {
      const step = await iterator.next();
      if (step.done) {
        return { state: step.value.state, records, summary: step.value };
      }
      records.push(step.value);
    }
  }

  /** Fetch and parse one page. Never throws. */
  private async visit(entry: FrontierEntry): Promise<CrawlRecord> {
    const fetchedAt = Date.now();
    const base = { url: entry.url, depth: entry.depth, fetchedAt };

    let page: FetchedPage;
    try {
      page = await this.fetcher(entry.url, this.cancelController.signal);
    } catch (error) {
      this.log.warn(`Fetch failed for ${entry.url}`, error);
      return Object.freeze({
        ...base,
        outcome: outcomeOf(error),
        title: "",
        text: "",
        links: [],
        statusCode: statusCodeOf(error),
        error: errorMessage(error),
      });
    }

    const finalUrl = page.url !== entry.url ? page.url : undefined;

    let parsed: ParsedPage;
    try {
      parsed = this.parser(page.body, page.url);
    } catch (error) {
      this.log.warn(`Parse failed for ${entry.url}`, error);
      return Object.freeze({
        ...base,
        finalUrl,
        outcome: "parse-error",
        title: "",
        text: "",
        links: [],
        statusCode: page.statusCode,
        error: errorMessage(error),
      });
    }

    this.log.debug(`Fetched ${entry.url} (depth ${entry.depth}, ${parsed.links.length} links)`);
    return Object.freeze({
      ...base,
      finalUrl,
      outcome: "ok",
      title: parsed.title,
      text: parsed.text,
      links: Object.freeze([...parsed.links]),
      statusCode: page.statusCode,
    });
  }
}
