/**
 * @module services/cache
 * @fileoverview In-memory TTL cache of parsed pages for the single-page
 * crawler tools (`crawl_page`, `search_page`).
 *
 * Full crawls bypass the cache: their records carry `fetchedAt`, and a
 * crawl's rate limit is a promise to the target site about fresh fetches.
 *
 * ## Key Strategy
 * ```
 *  "https://example.com/a?y=2&x=1"
 *        |  canonicalizeUrl
 *        v
 *  "https://example.com/a?x=1&y=2"
 *        |  sha256
 *        v
 *  "page:3f1c..."
 * ```
 */

import crypto from "node:crypto";
import NodeCache from "node-cache";
import { config } from "../config.js";
import type { ParsedPage } from "../crawler/types.js";
import { canonicalizeUrl } from "../utils/url.js";

/** A parsed page as stored in the cache. */
export interface CachedPage extends ParsedPage {
  /** Canonical final URL the page was fetched from. */
  url: string;
  statusCode: number;
  fetchedAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** Percentage 0-100; 0 before the first lookup. */
  hitRate: number;
  entries: number;
}

export interface PageCacheOptions {
  /** @default config.cacheTtl */
  ttlSeconds?: number;
  /** @default config.cacheMaxKeys */
  maxKeys?: number;
}

const PAGE_PREFIX = "page:";

export class PageCache {
  private readonly cache: NodeCache;
  private hitCount = 0;
  private missCount = 0;

  constructor(options: PageCacheOptions = {}) {
    const ttl = options.ttlSeconds ?? config.cacheTtl;
    this.cache = new NodeCache({
      stdTTL: ttl,
      checkperiod: Math.max(60, Math.floor(ttl * 0.2)),
      maxKeys: options.maxKeys ?? config.cacheMaxKeys,
      // Entries are never mutated after insertion.
      useClones: false,
    });
  }

  private key(url: string): string {
    const digest = crypto.createHash("sha256").update(canonicalizeUrl(url)).digest("hex");
    return `${PAGE_PREFIX}${digest}`;
  }

  get(url: string): CachedPage | undefined {
    const page = this.cache.get<CachedPage>(this.key(url));
    if (page === undefined) {
      this.missCount += 1;
    } else {
      this.hitCount += 1;
    }
    return page;
  }

  /**
   * Store `page` under `url`. Returns `false` when the cache is full;
   * node-cache signals that by throwing ECACHEFULL.
   */
  set(url: string, page: CachedPage): boolean {
    try {
      return this.cache.set<CachedPage>(this.key(url), page);
    } catch (error) {
      if (error instanceof Error && error.name === "ECACHEFULL") return false;
      throw error;
    }
  }

  stats(): CacheStats {
    const lookups = this.hitCount + this.missCount;
    return {
      hits: this.hitCount,
      misses: this.missCount,
      hitRate: lookups > 0 ? (this.hitCount / lookups) * 100 : 0,
      entries: this.cache.keys().length,
    };
  }

  clear(): void {
    this.cache.flushAll();
    this.hitCount = 0;
    this.missCount = 0;
  }

  /** Stop the expiry timer so the process can exit. */
  close(): void {
    this.cache.close();
  }
}
