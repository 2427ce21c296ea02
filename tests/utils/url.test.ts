/**
 * @fileoverview Tests for URL canonicalization and comparison helpers.
 */

import { describe, it, expect } from "vitest";
import {
  canonicalizeUrl,
  resolveUrl,
  toCrawlableUrl,
  isFetchableUrl,
  extractHost,
  originOf,
  hostMatches,
} from "../../src/utils/url.js";

// ---------------------------------------------------------------------------
// canonicalizeUrl
// ---------------------------------------------------------------------------

describe("canonicalizeUrl", () => {
  it("removes fragment identifiers", () => {
    expect(canonicalizeUrl("https://example.com/page#section")).toBe("https://example.com/page");
  });

  it("strips the trailing slash of a bare root", () => {
    expect(canonicalizeUrl("https://example.com/")).toBe("https://example.com");
    expect(canonicalizeUrl("https://example.com/#top")).toBe("https://example.com");
  });

  it("preserves trailing slash on deeper paths", () => {
    expect(canonicalizeUrl("https://example.com/blog/")).toBe("https://example.com/blog/");
  });

  it("keeps the root slash when a query follows", () => {
    expect(canonicalizeUrl("https://example.com/?q=1")).toBe("https://example.com/?q=1");
  });

  it("sorts query parameters by key", () => {
    expect(canonicalizeUrl("https://example.com/path?z=3&a=1&m=2")).toBe(
      "https://example.com/path?a=1&m=2&z=3",
    );
  });

  it("removes default ports and keeps others", () => {
    expect(canonicalizeUrl("http://example.com:80/page")).toBe("http://example.com/page");
    expect(canonicalizeUrl("https://example.com:443/page")).toBe("https://example.com/page");
    expect(canonicalizeUrl("https://example.com:8080/page")).toBe("https://example.com:8080/page");
  });

  it("lowercases scheme and host but not the path", () => {
    expect(canonicalizeUrl("HTTPS://Example.COM/Path")).toBe("https://example.com/Path");
  });

  it("maps equivalent spellings to one string", () => {
    expect(canonicalizeUrl("HTTPS://Example.COM:443/path?b=2&a=1#section")).toBe(
      canonicalizeUrl("https://example.com/path?a=1&b=2"),
    );
  });

  it("throws on a relative or invalid URL", () => {
    expect(() => canonicalizeUrl("not-a-valid-url")).toThrow();
  });
});

// ---------------------------------------------------------------------------
// resolveUrl / toCrawlableUrl
// ---------------------------------------------------------------------------

describe("resolveUrl", () => {
  it("resolves absolute paths, parent traversal and siblings", () => {
    expect(resolveUrl("https://example.com/a/b", "/c")).toBe("https://example.com/c");
    expect(resolveUrl("https://example.com/a/b/c", "../d")).toBe("https://example.com/a/d");
    expect(resolveUrl("https://example.com/a/b", "c")).toBe("https://example.com/a/c");
  });

  it("returns an absolute input unchanged", () => {
    expect(resolveUrl("https://example.com/", "https://other.org/x")).toBe("https://other.org/x");
  });

  it("resolves protocol-relative URLs with the base scheme", () => {
    expect(resolveUrl("https://example.com/", "//cdn.example.com/x")).toBe(
      "https://cdn.example.com/x",
    );
  });
});

describe("toCrawlableUrl", () => {
  it("resolves and canonicalizes a relative href", () => {
    expect(toCrawlableUrl("https://example.com/docs/", "intro?b=1&a=2#top")).toBe(
      "https://example.com/docs/intro?a=2&b=1",
    );
  });

  it("drops non-fetchable schemes", () => {
    expect(toCrawlableUrl("https://example.com/", "mailto:someone@example.com")).toBeUndefined();
    expect(toCrawlableUrl("https://example.com/", "javascript:void(0)")).toBeUndefined();
  });

  it("trims whitespace around the href", () => {
    expect(toCrawlableUrl("https://example.com/", "  /a  ")).toBe("https://example.com/a");
  });
});

// ---------------------------------------------------------------------------
// Inspection helpers
// ---------------------------------------------------------------------------

describe("isFetchableUrl", () => {
  it("accepts http and https", () => {
    expect(isFetchableUrl("https://example.com")).toBe(true);
    expect(isFetchableUrl("http://example.com")).toBe(true);
  });

  it("rejects other schemes and garbage", () => {
    expect(isFetchableUrl("ftp://example.com/file")).toBe(false);
    expect(isFetchableUrl("data:text/html,hi")).toBe(false);
    expect(isFetchableUrl("not a url")).toBe(false);
    expect(isFetchableUrl("")).toBe(false);
  });
});

describe("extractHost / originOf", () => {
  it("returns the lowercased host without port", () => {
    expect(extractHost("https://Sub.Example.com:8443/x")).toBe("sub.example.com");
  });

  it("keeps non-default ports in the origin", () => {
    expect(originOf("https://example.com:443/a")).toBe("https://example.com");
    expect(originOf("http://example.com:8080/a")).toBe("http://example.com:8080");
  });
});

describe("hostMatches", () => {
  it("matches exact hosts and subdomains", () => {
    expect(hostMatches("example.com", ["example.com"])).toBe(true);
    expect(hostMatches("a.b.example.com", ["example.com"])).toBe(true);
  });

  it("does not match a shared suffix without a dot boundary", () => {
    expect(hostMatches("notexample.com", ["example.com"])).toBe(false);
  });

  it("is case-insensitive and checks every entry", () => {
    expect(hostMatches("DOCS.Other.org", ["example.com", "other.ORG"])).toBe(true);
    expect(hostMatches("third.net", ["example.com", "other.org"])).toBe(false);
  });
});
