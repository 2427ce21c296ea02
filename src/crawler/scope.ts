/**
 * @module crawler/scope
 * @fileoverview Crawl scope checks.
 *
 * `same-origin` compares scheme, host and port with the seed.
 * `allow-list` matches the link host against each listed host or any of its
 * subdomains; entries may be bare hosts or full URLs.
 */

import type { CrawlScope } from "./types.js";
import { FrontierError } from "../utils/errors.js";
import { extractHost, hostMatches, originOf } from "../utils/url.js";

/** A scope bound to one seed, ready to test links. */
export type ScopeFilter = (url: string) => boolean;

function hostOfEntry(entry: string): string {
  const trimmed = entry.trim();
  if (!trimmed.includes("://")) return trimmed.toLowerCase();
  try {
    return extractHost(trimmed);
  } catch {
    throw new FrontierError(`Invalid allow-list entry '${entry}'`);
  }
}

/**
 * Bind `scope` to the canonical `seedUrl`.
 *
 * @throws {FrontierError} When an allow-list is empty or has unusable entries.
 */
export function createScopeFilter(scope: CrawlScope, seedUrl: string): ScopeFilter {
  if (scope.kind === "same-origin") {
    const seedOrigin = originOf(seedUrl);
    return (url) => originOf(url) === seedOrigin;
  }

  const hosts = scope.hosts.map(hostOfEntry).filter((host) => host.length > 0);
  if (hosts.length === 0) {
    throw new FrontierError("Allow-list scope needs at least one host");
  }
  return (url) => hostMatches(extractHost(url), hosts);
}
