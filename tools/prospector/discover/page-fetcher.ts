import { load, type Cheerio } from "cheerio";
import type { AnyNode } from "domhandler";
import pLimit from "p-limit";
import { errorMessage } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import type { PageRecord } from "../pipeline/types.js";
import type { BrowserSession } from "./browser.js";
import { canonicalizeUrl, dedupeUrls, isAbsoluteHttpUrl } from "./url-canonical.js";

export const DEFAULT_MAX_PAGE_CHARS = 50_000;
const DEFAULT_SEARCH_PAGE = "https://www.bing.com/search";
const RESULT_LINK_SELECTORS = ["li.b_algo h2 a", "a[href^='http']"];
const BLOCK_ELEMENTS = "br, p, div, li, tr, section, article, header, footer, h1, h2, h3, h4, h5, h6";

export interface PageFetcherOptions {
  pageTimeoutMs: number;
  maxPageChars: number;
  concurrency: number;
  searchPageUrl?: string;
}

export interface DeepScrapeResult {
  pages: PageRecord[];
  /** canonical URL -> the first query that surfaced it */
  origins: Record<string, string>;
  discovered: number;
  failed: string[];
}

/**
 * Browser-driven discovery: reads result links off a rendered search page,
 * resolves redirect wrappers, and fetches each unique destination once.
 */
export class PageFetcher {
  private readonly searchPageUrl: string;

  constructor(
    private readonly session: BrowserSession,
    private readonly options: PageFetcherOptions
  ) {
    this.searchPageUrl = options.searchPageUrl ?? DEFAULT_SEARCH_PAGE;
  }

  async discoverUrls(query: string, maxLinks: number, signal?: AbortSignal): Promise<string[]> {
    const searchUrl = new URL(this.searchPageUrl);
    searchUrl.searchParams.set("q", query);
    const searchHost = searchUrl.hostname;

    try {
      const rendered = await this.session.render(searchUrl.toString(), {
        timeoutMs: this.options.pageTimeoutMs,
        signal,
      });
      const $ = load(rendered.html);
      const hrefs: string[] = [];
      for (const selector of RESULT_LINK_SELECTORS) {
        $(selector).each((_index, element) => {
          const href = $(element).attr("href");
          if (href) {
            hrefs.push(href.trim());
          }
        });
      }

      const urls = dedupeUrls(hrefs.filter(isAbsoluteHttpUrl))
        .filter((url) => !isSameSite(url, searchHost))
        .slice(0, Math.max(0, maxLinks));
      emitAgentEvent({
        level: "info",
        eventType: "page.discover",
        message: "Result links collected",
        phase: "end",
        query,
        links: urls.length,
      });
      return urls;
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason ?? error;
      }
      emitAgentEvent({
        level: "warn",
        eventType: "page.discover",
        message: "Result page discovery failed",
        phase: "fail",
        query,
        errorMessage: errorMessage(error),
      });
      return [];
    }
  }

  async fetchPage(url: string, signal?: AbortSignal): Promise<PageRecord> {
    const startedAt = Date.now();
    const rendered = await this.session.render(url, {
      timeoutMs: this.options.pageTimeoutMs,
      signal,
    });
    const page = extractPageText(url, rendered.html, this.options.maxPageChars);
    emitAgentEvent({
      level: "info",
      eventType: "page.fetch",
      message: "Page fetched",
      phase: "end",
      url,
      chars: page.text.length,
      durationMs: Date.now() - startedAt,
    });
    return page;
  }

  async scrape(queries: string[], perQuery: number, signal?: AbortSignal): Promise<DeepScrapeResult> {
    const limiter = pLimit(Math.max(1, this.options.concurrency));

    const perQueryUrls = await Promise.all(
      queries.map((query) => limiter(() => this.discoverUrls(query, perQuery, signal)))
    );

    const origins: Record<string, string> = {};
    const ordered: string[] = [];
    perQueryUrls.forEach((urls, index) => {
      for (const url of urls) {
        const canonical = canonicalizeUrl(url);
        if (!(canonical in origins)) {
          origins[canonical] = queries[index];
        }
        ordered.push(canonical);
      }
    });
    const unique = dedupeUrls(ordered);

    const failed: string[] = [];
    const fetched = await Promise.all(
      unique.map((url) =>
        limiter(async () => {
          try {
            return await this.fetchPage(url, signal);
          } catch (error) {
            if (signal?.aborted) {
              throw signal.reason ?? error;
            }
            failed.push(url);
            emitAgentEvent({
              level: "warn",
              eventType: "page.fetch",
              message: "Page fetch failed; excluding page",
              phase: "fail",
              url,
              errorMessage: errorMessage(error),
            });
            return undefined;
          }
        })
      )
    );

    return {
      pages: fetched.filter((page): page is PageRecord => page !== undefined),
      origins,
      discovered: unique.length,
      failed,
    };
  }
}

export function extractPageText(url: string, html: string, maxChars: number = DEFAULT_MAX_PAGE_CHARS): PageRecord {
  const $ = load(html);
  const title = $("title").first().text().trim();
  $("script, style, noscript, template, svg").remove();
  $(BLOCK_ELEMENTS).after("\n");
  const root: Cheerio<AnyNode> = $("body").length > 0 ? $("body") : $.root();
  const text = root
    .text()
    .split(/\n/)
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");

  return { url, title, text: text.slice(0, Math.max(0, maxChars)) };
}

function isSameSite(url: string, searchHost: string): boolean {
  const host = new URL(url).hostname.toLowerCase();
  const base = searchHost.toLowerCase().replace(/^www\./, "");
  return host === base || host.endsWith(`.${base}`);
}
