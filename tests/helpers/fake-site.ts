/**
 * @fileoverview In-process stand-in for a web site, used by crawler tests.
 *
 * Pages are described by their links; the fetcher renders them to HTML so
 * the real parser runs over them.
 */

import type { FetchedPage } from "../../src/services/fetch.js";
import type { PageFetcher } from "../../src/crawler/types.js";

export interface FakePage {
  title?: string;
  /** Paragraph text; defaults to "<title> body". */
  body?: string;
  links?: string[];
  /** Throw this instead of answering. */
  error?: Error;
  /** Answer as if redirected here (canonical URL). */
  redirectTo?: string;
}

export interface FakeSite {
  fetcher: PageFetcher;
  /** URLs in the order they were fetched. */
  fetched: string[];
  /** `Date.now()` at the start of each fetch. */
  startTimes: number[];
}

export function renderPage(title: string, links: readonly string[], body = `${title} body`): string {
  const anchors = links.map((href) => `<a href="${href}">${href}</a>`).join(" ");
  return `<html><head><title>${title}</title></head><body><p>${body}</p>${anchors}</body></html>`;
}

export function fakeSite(pages: Record<string, FakePage>): FakeSite {
  const fetched: string[] = [];
  const startTimes: number[] = [];

  const fetcher: PageFetcher = async (url) => {
    fetched.push(url);
    startTimes.push(Date.now());

    const page = pages[url];
    if (!page) {
      throw new Error(`no fake page for ${url}`);
    }
    if (page.error) throw page.error;

    const result: FetchedPage = {
      url: page.redirectTo ?? url,
      body: renderPage(page.title ?? url, page.links ?? [], page.body),
      contentType: "text/html; charset=utf-8",
      statusCode: 200,
    };
    return result;
  };

  return { fetcher, fetched, startTimes };
}
