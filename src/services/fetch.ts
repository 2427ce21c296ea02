/**
 * @module services/fetch
 * @fileoverview Guarded HTTP GET used by the crawler for every page.
 *
 * ## Pipeline
 * ```
 *  URL
 *   |
 *   v
 *  [1] Canonicalize + scheme check ----> FetchError
 *   |
 *   v
 *  [2] Private-address check ----------> SecurityError
 *   |
 *   v
 *  [3] fetch() with timeout -----------> TimeoutError / FetchError
 *   |
 *   v
 *  [4] Status check -------------------> FetchError(statusCode)
 *   |
 *   v
 *  [5] Content-Type check -------------> ContentTypeError
 *   |
 *   v
 *  [6] Streamed body read -------------> ResponseTooLargeError
 *   |
 *   v
 *  FetchedPage { url, body, contentType, statusCode }
 * ```
 *
 * A response rejected at [4], [5] or [6] has its body cancelled before the
 * error is thrown, which releases the connection.
 *
 * Pacing is not done here: the crawl engine owns one rate limiter per crawl
 * and calls this function from inside it.
 */

import { config } from "../config.js";
import { validateHostname, type HostResolver } from "../utils/network.js";
import { canonicalizeUrl } from "../utils/url.js";
import {
  ContentTypeError,
  FetchError,
  ResponseTooLargeError,
  TimeoutError,
  errorMessage,
} from "../utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/** A successfully fetched HTML page. */
export interface FetchedPage {
  /** Canonical form of the final URL after redirects. */
  url: string;
  body: string;
  contentType: string;
  statusCode: number;
}

export interface FetchOptions {
  /** @default config.fetchTimeout */
  timeoutMs?: number;
  /** @default config.maxResponseSize */
  maxBytes?: number;
  /** @default config.userAgent */
  userAgent?: string;
  /** @default config.allowPrivateHosts */
  allowPrivateHosts?: boolean;
  /** Aborts the request together with the timeout. */
  signal?: AbortSignal;
  /** DNS lookup used by the private-address check. */
  resolver?: HostResolver;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Content-Type Handling
 * ──────────────────────────────────────────────────────────────────────────── */

const ALLOWED_CONTENT_TYPES: ReadonlySet<string> = new Set([
  "text/html",
  "application/xhtml+xml",
]);

/** `"text/html; charset=utf-8"` -> `"text/html"` */
function extractMimeType(contentType: string | null): string {
  return (contentType ?? "").split(";")[0]?.trim().toLowerCase() ?? "";
}

/* ────────────────────────────────────────────────────────────────────────────
 * Body Reading
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Read the body as UTF-8, aborting as soon as more than `maxBytes` arrived.
 * A Content-Length above the limit is rejected before reading anything.
 */
async function readBodyWithLimit(response: Response, maxBytes: number): Promise<string> {
  const declared = parseInt(response.headers.get("content-length") ?? "", 10);
  if (!Number.isNaN(declared) && declared > maxBytes) {
    await response.body?.cancel();
    throw new ResponseTooLargeError(
      `Response Content-Length (${declared} bytes) exceeds limit of ${maxBytes} bytes`,
    );
  }

  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder("utf-8", { fatal: false });
  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        throw new ResponseTooLargeError(
          `Response body exceeds limit of ${maxBytes} bytes (read ${totalBytes} bytes so far)`,
        );
      }
      chunks.push(decoder.decode(value, { stream: true }));
    }
    chunks.push(decoder.decode());
  } catch (error) {
    if (error instanceof ResponseTooLargeError) throw error;
    throw new FetchError(`Error reading response body: ${errorMessage(error)}`);
  }

  return chunks.join("");
}

function isAbortLike(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Fetch one HTML page with every guard applied.
 *
 * @throws {FetchError} Bad URL, unsupported scheme, network failure or non-2xx
 *   status (with `statusCode`).
 * @throws {SecurityError} The host resolves to a private address.
 * @throws {TimeoutError} No complete response within the timeout.
 * @throws {ContentTypeError} The response is not HTML.
 * @throws {ResponseTooLargeError} The body exceeds the size limit.
 *
 * @example
 * ```ts
 * const page = await safeFetch("https://example.com/docs", { timeoutMs: 5000 });
 * page.url;        // "https://example.com/docs/" when the server redirected
 * page.statusCode; // 200
 * ```
 */
export async function safeFetch(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
  const timeoutMs = options.timeoutMs ?? config.fetchTimeout;

  let target: URL;
  try {
    target = new URL(canonicalizeUrl(url));
  } catch {
    throw new FetchError(`Invalid URL: ${url}`);
  }
  if (target.protocol !== "http:" && target.protocol !== "https:") {
    throw new FetchError(
      `Unsupported protocol: ${target.protocol} (only http: and https: are allowed)`,
    );
  }

  if (!(options.allowPrivateHosts ?? config.allowPrivateHosts)) {
    await validateHostname(target.hostname, options.resolver);
  }

  const timeout = AbortSignal.timeout(timeoutMs);
  const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;

  let response: Response;
  try {
    response = await fetch(target, {
      signal,
      headers: {
        "User-Agent": options.userAgent ?? config.userAgent,
        Accept: "text/html, application/xhtml+xml;q=0.9, */*;q=0.1",
      },
      redirect: "follow",
    });
  } catch (error) {
    if (timeout.aborted || (isAbortLike(error) && !options.signal?.aborted)) {
      throw new TimeoutError(`Request to ${target.href} timed out after ${timeoutMs}ms`);
    }
    throw new FetchError(`Failed to fetch ${target.href}: ${errorMessage(error)}`);
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new FetchError(
      `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""} for ${target.href}`,
      response.status,
    );
  }

  const contentType = response.headers.get("content-type");
  const mimeType = extractMimeType(contentType);
  if (!ALLOWED_CONTENT_TYPES.has(mimeType)) {
    await response.body?.cancel();
    throw new ContentTypeError(
      `Unacceptable Content-Type "${mimeType || "(none)"}" for ${target.href}`,
    );
  }

  let body: string;
  try {
    body = await readBodyWithLimit(response, options.maxBytes ?? config.maxResponseSize);
  } catch (error) {
    if (timeout.aborted) {
      throw new TimeoutError(`Reading ${target.href} timed out after ${timeoutMs}ms`);
    }
    throw error;
  }

  return {
    url: canonicalizeUrl(response.url || target.href),
    body,
    contentType: contentType ?? mimeType,
    statusCode: response.status,
  };
}
