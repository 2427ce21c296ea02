/**
 * @module servers/crawler-server
 * @fileoverview Crawler backend: site crawls and single-page reads.
 *
 * | Tool          | Cache | Progress |
 * | ------------- | ----- | -------- |
 * | `crawl_site`  | no    | yes      |
 * | `crawl_page`  | yes   | no       |
 * | `search_page` | yes   | no       |
 *
 * Client cancellation of a `crawl_site` request cancels the crawl, and so
 * does running out of the time budget the client sent in `_meta.timeBudgetMs`.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PageFetcher } from "../crawler/types.js";
import { PageCache } from "../services/cache.js";
import { CrawlPageSchema, createPageHandlers, SearchPageSchema } from "../tools/crawl-page.js";
import { CrawlSiteSchema, createCrawlSiteHandler } from "../tools/crawl-site.js";
import type { Logger } from "../utils/logger.js";

export interface CrawlerServerOptions {
  cache?: PageCache;
  /** Page fetcher for every tool. @default safeFetch */
  fetcher?: PageFetcher;
  logger?: Logger;
}

export function createCrawlerServer(options: CrawlerServerOptions = {}): McpServer {
  const server = new McpServer({ name: "crawler", version: "1.0.0" }, { capabilities: { tools: {} } });
  const crawlSite = createCrawlSiteHandler({ fetcher: options.fetcher, logger: options.logger });
  const pages = createPageHandlers({ cache: options.cache ?? new PageCache(), fetcher: options.fetcher });

  server.tool(
    "crawl_site",
    "Crawl a website breadth-first from a seed URL, at a fixed rate, up to a link depth. Returns every fetched page.",
    CrawlSiteSchema,
    (params, extra) => {
      const token = extra._meta?.progressToken;
      const budget = extra._meta?.timeBudgetMs;
      return crawlSite(params, {
        signal: extra.signal,
        timeBudgetMs: typeof budget === "number" && Number.isFinite(budget) ? budget : undefined,
        reportProgress:
          token === undefined
            ? undefined
            : (progress, total, message) =>
                extra.sendNotification({
                  method: "notifications/progress",
                  params: { progressToken: token, progress, total, message },
                }),
      });
    },
  );
  server.tool(
    "crawl_page",
    "Read one web page: title, text and links.",
    CrawlPageSchema,
    (params, extra) => pages.crawlPage(params, extra.signal),
  );
  server.tool(
    "search_page",
    "Find the sentences of a web page that mention a keyword or phrase.",
    SearchPageSchema,
    (params, extra) => pages.searchPage(params, extra.signal),
  );

  return server;
}
