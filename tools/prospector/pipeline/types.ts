export const STEP_ORDER = ["enhance", "discover", "rank"] as const;

export type StepName = (typeof STEP_ORDER)[number];
export type StepStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

export type PipelinePhase = "start" | "enhancing" | "discovering" | "ranking" | "done";

export interface StepAttemptRecord {
  attempt: number;
  startedAt: string;
  endedAt?: string;
  status: "running" | "succeeded" | "failed";
  errorCode?: string;
  errorMessage?: string;
}

export interface StepState {
  status: StepStatus;
  attempts: number;
  message?: string;
  messageUpdatedAt?: string;
  startedAt?: string;
  endedAt?: string;
  lastErrorCode?: string;
  lastErrorMessage?: string;
  history: StepAttemptRecord[];
}

export interface ProductInput {
  product_name: string;
  description: string;
  features: string[];
  competitors: string[];
}

export interface CandidateResult {
  readonly title: string;
  readonly snippet: string;
  readonly url: string;
}

export type RankedLead = string | Record<string, unknown>;

export interface RankedLeads {
  high_priority: RankedLead[];
  medium_priority: RankedLead[];
  low_priority: RankedLead[];
}

export interface PageRecord {
  url: string;
  title: string;
  text: string;
}

export type ScrapedLeads = Record<string, CandidateResult[]>;

export interface PipelineState extends Readonly<ProductInput> {
  readonly search_queries?: string[];
  readonly business_domains?: string[];
  readonly scraped_leads?: ScrapedLeads;
  readonly scraped_pages?: PageRecord[];
  readonly value_prop?: string;
  readonly customer_profile?: string;
  readonly ranked_leads?: RankedLeads;
  readonly messages: string[];
}

export type StageOutcome =
  | { kind: "continue"; state: PipelineState }
  | { kind: "terminate"; state: PipelineState; reason: string };

export interface RunState {
  version: string;
  runId: string;
  productName: string;
  startedAt: string;
  finishedAt?: string;
  phase: PipelinePhase;
  phaseTrail: PipelinePhase[];
  terminatedBy?: string;
  stepStatuses: Record<StepName, StepState>;
  artifacts: string[];
}

export interface PipelineResult {
  runId: string;
  state: PipelineState;
  stages: Record<StepName, StepState>;
  phaseTrail: PipelinePhase[];
  terminatedBy: string;
}

export type DeepScrapeMode = "off" | "fallback" | "always";

export interface StagePolicy {
  timeoutMs: number;
  maxAttempts: number;
}

export interface PipelineOptions {
  resultsPerQuery: number;
  maxQueries: number;
  searchConcurrency: number;
  pageConcurrency: number;
  searchTimeoutMs: number;
  searchMaxAttempts: number;
  pageTimeoutMs: number;
  maxModelMs: number;
  maxTotalMs: number;
  maxPageChars: number;
  deepScrape: DeepScrapeMode;
  linksPerQuery: number;
  workDir?: string;
  stages: Record<StepName, StagePolicy>;
}

export type LlmProvider = "anthropic" | "openai-compatible";

export interface ModelRuntimeConfig {
  provider: LlmProvider;
  modelId: string;
  baseURL: string;
  apiKey: string;
  temperature: number;
}

export type LogFormat = "pretty" | "condensed" | "json";
export type EventType =
  | "reasoning"
  | "step.lifecycle"
  | "model.lifecycle"
  | "search.query"
  | "search.batch"
  | "browser.lifecycle"
  | "page.discover"
  | "page.fetch"
  | "http.request"
  | "http.response"
  | "file.read"
  | "file.write"
  | "retry"
  | "state.update"
  | "validation"
  | "summary"
  | "budget.enforced"
  | "provider.lifecycle"
  | "parse.result"
  | "pipeline.transition"
  | "pipeline.skip"
  | "audit.persist"
  | "artifact.persist"
  | "server.request";

export interface AgentEvent {
  ts: string;
  runId: string;
  level: "debug" | "info" | "warn" | "error";
  step: StepName | "system";
  attempt: number;
  eventType: EventType;
  message: string;
  phase?: "start" | "end" | "fail" | "progress";
  action?: string;
  durationMs?: number;
  statusCode?: number;
  bytes?: number;
  path?: string;
  retryable?: boolean;
  errorCode?: string;
  [key: string]: unknown;
}

export interface LogRuntimeConfig {
  runId: string;
  format: LogFormat;
  verbose: boolean;
  agentLogs: boolean;
  eventsLogPath?: string;
  eventFilePath?: string;
}
