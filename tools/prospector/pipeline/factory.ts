import { AiTextGenerator } from "../lib/ai.js";
import { PlaywrightBrowserSession } from "../discover/browser.js";
import { PageFetcher } from "../discover/page-fetcher.js";
import { DiscoveryClient, GoogleCustomSearchBackend } from "../discover/search-client.js";
import { NullAuditStore, SupabaseAuditStore, type AuditStore } from "../store/audit-store.js";
import type { ProspectorConfig } from "./config.js";
import { Logger } from "./logger.js";
import { DEFAULT_PIPELINE_OPTIONS, LeadPipeline } from "./orchestrator.js";

export interface ProspectorServices {
  pipeline: LeadPipeline;
  auditStore: AuditStore;
}

/** Wires the production collaborators for a loaded configuration. */
export function createProspectorServices(config: ProspectorConfig): ProspectorServices {
  const logger = new Logger();
  const options = {
    ...DEFAULT_PIPELINE_OPTIONS,
    ...config.pipeline,
    stages: { ...DEFAULT_PIPELINE_OPTIONS.stages, ...config.pipeline.stages },
  };

  const generator = new AiTextGenerator(config.model, options.maxModelMs);
  const discovery = new DiscoveryClient(new GoogleCustomSearchBackend(config.search, options.searchTimeoutMs), {
    timeoutMs: options.searchTimeoutMs,
    maxAttempts: options.searchMaxAttempts,
    concurrency: options.searchConcurrency,
  });

  const browser =
    options.deepScrape === "off" ? undefined : new PlaywrightBrowserSession({ executablePath: config.browser.executablePath });
  const pageFetcher = browser
    ? new PageFetcher(browser, {
        pageTimeoutMs: options.pageTimeoutMs,
        maxPageChars: options.maxPageChars,
        concurrency: options.pageConcurrency,
      })
    : undefined;

  const auditStore: AuditStore = config.supabase ? new SupabaseAuditStore(config.supabase) : new NullAuditStore();
  if (!config.supabase) {
    logger.warn("SUPABASE_URL / SUPABASE_KEY not set; runs will not be archived", {
      eventType: "audit.persist",
    });
  }

  const pipeline = new LeadPipeline({
    generator,
    discovery,
    pageFetcher,
    browser,
    auditStore,
    options,
    logger,
  });
  return { pipeline, auditStore };
}
