/**
 * @module crawler/html-parser
 * @fileoverview HTML -> title, readable text and outbound links, using cheerio.
 *
 * Links are resolved against the page URL (or its `<base href>`),
 * canonicalized and de-duplicated in document order. Fragment-only anchors
 * and non-fetchable schemes are dropped.
 *
 * @example
 * ```ts
 * const page = parseHtml('<title>Docs</title><a href="/a#x">A</a>', "https://example.com/");
 * // => { title: "Docs", text: "A", links: ["https://example.com/a"] }
 * ```
 */

import * as cheerio from "cheerio";
import type { ParsedPage } from "./types.js";
import { ParseError, errorMessage } from "../utils/errors.js";
import { resolveUrl, toCrawlableUrl } from "../utils/url.js";

/** Elements whose text never reaches the reader. */
const NON_CONTENT_SELECTOR = "script, style, noscript, template, svg, iframe";

/** Collapse runs of whitespace into single spaces. */
function squash(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Parse one HTML document.
 *
 * @throws {ParseError} When cheerio cannot load the document.
 */
export function parseHtml(html: string, baseUrl: string): ParsedPage {
  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (error) {
    throw new ParseError(`Cannot parse HTML of ${baseUrl}: ${errorMessage(error)}`);
  }

  let base = baseUrl;
  const baseHref = $("base[href]").first().attr("href");
  if (baseHref) {
    try {
      base = resolveUrl(baseUrl, baseHref);
    } catch {
      // unusable <base>: keep the page URL
      base = baseUrl;
    }
  }

  const seen = new Set<string>();
  const links: string[] = [];
  $("a[href]").each((_index, element) => {
    const href = $(element).attr("href")?.trim();
    if (!href || href.startsWith("#")) return;

    const url = toCrawlableUrl(base, href);
    if (url === undefined || seen.has(url)) return;
    seen.add(url);
    links.push(url);
  });

  const title = squash($("title").first().text()) || squash($("h1").first().text());

  $(NON_CONTENT_SELECTOR).remove();
  const root = $("body").length > 0 ? $("body") : $.root();
  // Block elements run together in .text(); pad them first.
  root.find("p, div, li, h1, h2, h3, h4, h5, h6, br, tr, section, article").each((_i, el) => {
    $(el).append(" ");
  });
  const text = squash(root.text());

  return { title, text, links };
}
