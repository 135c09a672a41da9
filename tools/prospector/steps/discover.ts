import type { DeepScrapeResult } from "../discover/page-fetcher.js";
import { ARTIFACT_NAMES } from "../pipeline/artifacts.js";
import type { PipelineContext } from "../pipeline/context.js";
import { linkedTimeout } from "../pipeline/retry.js";
import type { StatePatch } from "../pipeline/state-model.js";
import type { CandidateResult, PageRecord, PipelineState, ScrapedLeads } from "../pipeline/types.js";

const PAGE_SNIPPET_CHARS = 300;
const DEEP_SCRAPE_RESERVE_MAX_MS = 5_000;

export interface DiscoverOutput extends StatePatch {
  scraped_leads: ScrapedLeads;
  scraped_pages?: PageRecord[];
}

export async function runDiscoverStep(
  context: PipelineContext,
  state: PipelineState,
  signal: AbortSignal
): Promise<DiscoverOutput> {
  const { options, stateStore } = context;
  const logger = context.logger.child({ step: "discover" });
  const stageDeadline = Date.now() + context.budget.effectiveStepTimeout(options.stages.discover.timeoutMs);
  const queries = state.search_queries ?? [];

  logger.info("Discovering candidate companies", {
    queries: queries.length,
    resultsPerQuery: options.resultsPerQuery,
  });
  stateStore.setStepMessage("discover", `Searching ${queries.length} queries`);

  let scrapedLeads = await context.discovery.searchMany(queries, options.resultsPerQuery, signal);
  recordArtifact(context, ARTIFACT_NAMES.searchResults, scrapedLeads);

  const searchEmpty = countCandidates(scrapedLeads) === 0;
  const wantsDeepScrape =
    options.deepScrape === "always" || (options.deepScrape === "fallback" && searchEmpty);
  if (!wantsDeepScrape) {
    return { scraped_leads: scrapedLeads };
  }

  if (!context.pageFetcher) {
    logger.warn("Deep scrape requested but no browser session is configured", {
      eventType: "pipeline.skip",
      mode: options.deepScrape,
    });
    return { scraped_leads: scrapedLeads };
  }

  // Deep scrape deadline: the rest of the stage minus a reserve for returning the search mapping.
  const remainingMs = stageDeadline - Date.now();
  const deepScrapeMs = remainingMs - Math.min(DEEP_SCRAPE_RESERVE_MAX_MS, Math.floor(remainingMs / 4));
  if (deepScrapeMs <= 0) {
    logger.warn("Deep scrape skipped; stage budget spent on search", {
      eventType: "pipeline.skip",
      mode: options.deepScrape,
    });
    return { scraped_leads: scrapedLeads };
  }

  logger.info("Reasoning: rendering result pages in a headless browser", {
    eventType: "reasoning",
    mode: options.deepScrape,
    searchEmpty,
    timeoutMs: deepScrapeMs,
  });
  stateStore.setStepMessage("discover", "Deep scraping result pages");

  const guard = linkedTimeout(deepScrapeMs, signal);
  let deep: DeepScrapeResult;
  try {
    deep = await context.pageFetcher.scrape(queries, options.linksPerQuery, guard.signal);
  } catch (error) {
    if (!guard.timedOut() || signal.aborted) {
      throw error;
    }
    logger.warn("Deep scrape timed out; keeping search results", {
      eventType: "pipeline.skip",
      timeoutMs: deepScrapeMs,
    });
    return { scraped_leads: scrapedLeads };
  } finally {
    guard.dispose();
  }

  recordArtifact(context, ARTIFACT_NAMES.rawPages, deep.pages);
  logger.info("Deep scrape completed", {
    discovered: deep.discovered,
    fetched: deep.pages.length,
    failed: deep.failed.length,
  });

  if (options.deepScrape === "fallback") {
    scrapedLeads = candidatesFromPages(queries, deep);
  }
  return { scraped_leads: scrapedLeads, scraped_pages: deep.pages };
}

/**
 * Files every fetched page as a candidate under the query that first
 * surfaced it. Every query keeps a key, empty when none of its pages loaded.
 */
export function candidatesFromPages(queries: string[], deep: DeepScrapeResult): ScrapedLeads {
  const leads: ScrapedLeads = {};
  for (const query of queries) {
    leads[query] = [];
  }
  for (const page of deep.pages) {
    const query = deep.origins[page.url];
    if (query === undefined) {
      continue;
    }
    const candidate: CandidateResult = {
      title: page.title || page.url,
      snippet: page.text.slice(0, PAGE_SNIPPET_CHARS).replace(/\s+/g, " ").trim(),
      url: page.url,
    };
    leads[query] = [...(leads[query] ?? []), candidate];
  }
  return leads;
}

export function countCandidates(leads: ScrapedLeads): number {
  return Object.values(leads).reduce((sum, candidates) => sum + candidates.length, 0);
}

function recordArtifact(
  context: PipelineContext,
  name: (typeof ARTIFACT_NAMES)["searchResults" | "rawPages"],
  value: unknown
): void {
  const path = context.artifacts.write(context.runId, name, value);
  if (path) {
    context.stateStore.addArtifact(path);
  }
}
