/**
 * @module crawler/types
 * @fileoverview Types of the breadth-first crawl engine and its collaborators.
 */

import type { FetchedPage } from "../services/fetch.js";

/** Which discovered links a crawl may follow. The seed is always fetched. */
export type CrawlScope =
  | { readonly kind: "same-origin" }
  | { readonly kind: "allow-list"; readonly hosts: readonly string[] };

/** How fetching one page ended. */
export type CrawlOutcome = "ok" | "http-error" | "timeout" | "parse-error";

/** Lifecycle of one crawl. */
export type CrawlStateName = "idle" | "running" | "completed" | "cancelled" | "failed";

/** Result of fetching and parsing one page. Frozen when emitted. */
export interface CrawlRecord {
  /** Canonical URL the crawl requested. */
  readonly url: string;
  /** Canonical final URL after redirects, when it differs from `url`. */
  readonly finalUrl?: string;
  readonly depth: number;
  readonly outcome: CrawlOutcome;
  /** Empty unless `outcome` is `"ok"`. */
  readonly title: string;
  readonly text: string;
  /** Canonical outbound links, in document order, before scope filtering. */
  readonly links: readonly string[];
  readonly statusCode?: number;
  readonly error?: string;
  /** Epoch milliseconds when the fetch started. */
  readonly fetchedAt: number;
}

/** Returned by `CrawlEngine.run()` once the generator finishes. */
export interface CrawlSummary {
  readonly state: CrawlStateName;
  readonly pagesVisited: number;
  /** Records whose outcome is not `"ok"`. */
  readonly failures: number;
  readonly maxDepthReached: number;
  readonly startedAt: number;
  readonly finishedAt: number;
}

/** Text and links extracted from one HTML document. */
export interface ParsedPage {
  title: string;
  text: string;
  links: string[];
}

/** Fetches one page; `signal` aborts when the crawl is cancelled. */
export type PageFetcher = (url: string, signal: AbortSignal) => Promise<FetchedPage>;

/** Parses an HTML body, resolving links against `baseUrl`. May throw. */
export type PageParser = (html: string, baseUrl: string) => ParsedPage;
