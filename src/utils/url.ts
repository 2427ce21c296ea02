/**
 * @module utils/url
 * @fileoverview URL canonicalization and comparison helpers for the crawler.
 *
 * Two URLs that canonicalize to the same string are the same page as far as
 * the visited set is concerned.
 *
 * ## Canonical Form
 * | Step | Example                                            |
 * | ---- | -------------------------------------------------- |
 * | 1    | scheme and host lowercased (`HTTPS://EX.com`)      |
 * | 2    | fragment removed (`/page#top` -> `/page`)          |
 * | 3    | default port removed (`:443` on https)             |
 * | 4    | query parameters sorted by key                     |
 * | 5    | trailing `/` removed from a bare root              |
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

const DEFAULT_PORTS: ReadonlyMap<string, string> = new Map([
  ["http:", "80"],
  ["https:", "443"],
]);

const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/* ────────────────────────────────────────────────────────────────────────────
 * Canonicalization
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Canonical string form of `url`.
 *
 * @throws {TypeError} When `url` is not an absolute URL.
 *
 * @example
 * ```ts
 * canonicalizeUrl("HTTPS://Example.COM:443/?b=2&a=1#frag");
 * // => "https://example.com/?a=1&b=2"
 * canonicalizeUrl("https://example.com/");
 * // => "https://example.com"
 * ```
 */
export function canonicalizeUrl(url: string): string {
  // The WHATWG parser already lowercases scheme and host.
  const parsed = new URL(url);
  parsed.hash = "";

  if (parsed.port === DEFAULT_PORTS.get(parsed.protocol)) {
    parsed.port = "";
  }

  parsed.searchParams.sort();

  let canonical = parsed.toString();

  // Only the bare root loses its slash; "/blog/" and "/blog" may differ.
  if (parsed.pathname === "/" && !parsed.search) {
    canonical = canonical.replace(/\/$/, "");
  }

  return canonical;
}

/**
 * Resolve `relative` against `base`. Absolute inputs come back unchanged.
 *
 * @throws {TypeError} When the result is not a valid URL.
 */
export function resolveUrl(base: string, relative: string): string {
  return new URL(relative, base).href;
}

/**
 * Resolve and canonicalize an href found on a page. Returns `undefined` for
 * hrefs that do not parse or use a scheme the crawler cannot fetch
 * (`mailto:`, `javascript:`, `data:` and so on).
 */
export function toCrawlableUrl(base: string, href: string): string | undefined {
  let absolute: string;
  try {
    absolute = resolveUrl(base, href.trim());
  } catch {
    return undefined;
  }
  return isFetchableUrl(absolute) ? canonicalizeUrl(absolute) : undefined;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Inspection
 * ──────────────────────────────────────────────────────────────────────────── */

/** `true` for absolute http(s) URLs; `false` for everything else, including garbage. */
export function isFetchableUrl(url: string): boolean {
  try {
    return FETCHABLE_SCHEMES.has(new URL(url).protocol);
  } catch {
    return false;
  }
}

/** Lowercased hostname of `url`. */
export function extractHost(url: string): string {
  return new URL(url).hostname;
}

/**
 * Scheme, host and port of `url`, with the default port left out.
 *
 * @example
 * ```ts
 * originOf("https://example.com:443/a"); // => "https://example.com"
 * originOf("http://example.com:8080/a"); // => "http://example.com:8080"
 * ```
 */
export function originOf(url: string): string {
  return new URL(url).origin;
}

/**
 * `true` when `host` equals one of `allowed` or is a subdomain of one.
 * `notexample.com` does not match `example.com`.
 */
export function hostMatches(host: string, allowed: readonly string[]): boolean {
  const candidate = host.toLowerCase();
  return allowed.some((entry) => {
    const normalized = entry.trim().toLowerCase();
    return candidate === normalized || candidate.endsWith(`.${normalized}`);
  });
}
