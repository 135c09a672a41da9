import type { TextGenerator } from "../lib/ai.js";
import type { DiscoveryClient } from "../discover/search-client.js";
import type { PageFetcher } from "../discover/page-fetcher.js";
import type { ArtifactWriter } from "./artifacts.js";
import type { BudgetManager } from "./budget.js";
import type { Logger } from "./logger.js";
import type { RunStateStore } from "./state.js";
import type { PipelineOptions } from "./types.js";

export interface PipelineContext {
  runId: string;
  options: PipelineOptions;
  logger: Logger;
  stateStore: RunStateStore;
  budget: BudgetManager;
  generator: TextGenerator;
  discovery: DiscoveryClient;
  pageFetcher?: PageFetcher;
  artifacts: ArtifactWriter;
  /** Caller-supplied cancellation for the whole invocation. */
  signal?: AbortSignal;
}
