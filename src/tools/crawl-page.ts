/**
 * @module tools/crawl-page
 * @fileoverview MCP Tools: crawl_page and search_page -- one page, through
 * the page cache.
 *
 * ## Flow
 * ```
 *  url ──> PageCache hit? ──yes──────────────────────────────┐
 *              │ no                                          v
 *              └──> fetch ──> parseHtml ──> PageCache.set ──> CachedPage
 * ```
 * Both the requested and the final (post-redirect) URL are cached.
 *
 * `search_page` splits the page text into sentences and returns those
 * containing the query, case-insensitively, in document order.
 */

import { z } from "zod";
import { parseHtml } from "../crawler/html-parser.js";
import type { PageFetcher } from "../crawler/types.js";
import type { CachedPage, PageCache } from "../services/cache.js";
import { safeFetch } from "../services/fetch.js";
import { jsonResult, runTool, type ToolResponse } from "./result.js";

export const CrawlPageSchema = {
  url: z.string().url().describe("URL of the page to read"),
};

export const SearchPageSchema = {
  url: z.string().url().describe("URL of the page to search"),
  query: z.string().min(1).describe("Keyword or phrase to look for"),
  max_matches: z
    .number()
    .int()
    .min(1)
    .max(100)
    .optional()
    .default(20)
    .describe("Maximum sentences to return (default: 20)"),
};

export interface PageToolDeps {
  cache: PageCache;
  /** @default safeFetch with the configured limits */
  fetcher?: PageFetcher;
}

export interface PageHandlers {
  crawlPage(params: { url: string }, signal?: AbortSignal): Promise<ToolResponse>;
  searchPage(params: { url: string; query: string; max_matches: number }, signal?: AbortSignal): Promise<ToolResponse>;
}

const SENTENCE_END = /(?<=[.!?])\s+/;

/** Sentences of `text` containing `query`, ignoring case. */
export function findMatches(text: string, query: string, limit: number): string[] {
  const needle = query.toLowerCase();
  return text
    .split(SENTENCE_END)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0 && sentence.toLowerCase().includes(needle))
    .slice(0, limit);
}

export function createPageHandlers(deps: PageToolDeps): PageHandlers {
  const fetcher: PageFetcher = deps.fetcher ?? ((url, signal) => safeFetch(url, { signal }));

  const load = async (url: string, signal: AbortSignal): Promise<{ page: CachedPage; cached: boolean }> => {
    const hit = deps.cache.get(url);
    if (hit) return { page: hit, cached: true };

    const fetched = await fetcher(url, signal);
    const parsed = parseHtml(fetched.body, fetched.url);
    const page: CachedPage = {
      ...parsed,
      url: fetched.url,
      statusCode: fetched.statusCode,
      fetchedAt: Date.now(),
    };
    deps.cache.set(url, page);
    if (fetched.url !== url) deps.cache.set(fetched.url, page);
    return { page, cached: false };
  };

  return {
    crawlPage: ({ url }, signal = new AbortController().signal) =>
      runTool(async () => {
        const { page, cached } = await load(url, signal);
        return jsonResult({ ...page, cached });
      }),

    searchPage: ({ url, query, max_matches }, signal = new AbortController().signal) =>
      runTool(async () => {
        const { page } = await load(url, signal);
        return jsonResult({ url: page.url, query, matches: findMatches(page.text, query, max_matches) });
      }),
  };
}
