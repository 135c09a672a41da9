import { randomUUID } from "crypto";
import { z } from "zod";
import type { TextGenerator } from "../lib/ai.js";
import type { DiscoveryClient } from "../discover/search-client.js";
import type { PageFetcher } from "../discover/page-fetcher.js";
import type { BrowserSession } from "../discover/browser.js";
import { emptyRankedLeads } from "../parse/result-parser.js";
import { runDiscoverStep } from "../steps/discover.js";
import { runEnhanceStep } from "../steps/enhance.js";
import { buildCustomerProfile, buildValueProp, runRankStep } from "../steps/rank.js";
import { NullAuditStore, buildAuditRow, type AuditStore } from "../store/audit-store.js";
import { ARTIFACT_NAMES, ArtifactWriter } from "./artifacts.js";
import { BudgetManager } from "./budget.js";
import type { PipelineContext } from "./context.js";
import { InputValidationError, PipelineCancelledError, errorMessage } from "./errors.js";
import { Logger } from "./logger.js";
import { nextPhase, stageForPhase } from "./machine.js";
import { createPipelineState, hasCandidates, mergeState, type StatePatch } from "./state-model.js";
import { RunStateStore, runStatePath } from "./state.js";
import { runStep, type StepRunOptions } from "./step-runner.js";
import { runWithTelemetryContext } from "./telemetry-context.js";
import type {
  PipelineOptions,
  PipelinePhase,
  PipelineResult,
  PipelineState,
  ProductInput,
  StageOutcome,
  StepName,
} from "./types.js";

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  resultsPerQuery: 5,
  maxQueries: 8,
  searchConcurrency: 4,
  pageConcurrency: 3,
  searchTimeoutMs: 15_000,
  searchMaxAttempts: 2,
  pageTimeoutMs: 60_000,
  maxModelMs: 60_000,
  maxTotalMs: 5 * 60 * 1000,
  maxPageChars: 50_000,
  deepScrape: "off",
  linksPerQuery: 8,
  stages: {
    enhance: { timeoutMs: 90_000, maxAttempts: 2 },
    discover: { timeoutMs: 3 * 60 * 1000, maxAttempts: 1 },
    rank: { timeoutMs: 2 * 60 * 1000, maxAttempts: 2 },
  },
};

export const productInputSchema = z.object({
  product_name: z
    .string({ required_error: "product_name is required" })
    .refine((value) => value.trim().length > 0, "product_name must not be empty"),
  description: z
    .string({ required_error: "description is required" })
    .refine((value) => value.trim().length > 0, "description must not be empty"),
  features: z.array(z.string()).nullish().transform((value) => value ?? []),
  competitors: z.array(z.string()).nullish().transform((value) => value ?? []),
});

export function validateProductInput(input: unknown): ProductInput {
  const parsed = productInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new InputValidationError(`Invalid product input: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

export interface LeadPipelineDeps {
  generator: TextGenerator;
  discovery: DiscoveryClient;
  pageFetcher?: PageFetcher;
  /** Closed by {@link LeadPipeline.close}. */
  browser?: BrowserSession;
  auditStore?: AuditStore;
  artifacts?: ArtifactWriter;
  options?: Partial<PipelineOptions>;
  logger?: Logger;
  stepRunOptions?: StepRunOptions;
}

export interface RunRequest {
  signal?: AbortSignal;
  runId?: string;
}

/**
 * Enhance, discover and rank one product. Collaborators are injected and
 * shared across invocations; each `run` gets its own state, ledger and
 * budget.
 */
export class LeadPipeline {
  readonly options: PipelineOptions;
  private readonly auditStore: AuditStore;
  private readonly artifacts: ArtifactWriter;
  private readonly logger: Logger;

  constructor(private readonly deps: LeadPipelineDeps) {
    this.options = {
      ...DEFAULT_PIPELINE_OPTIONS,
      ...deps.options,
      stages: { ...DEFAULT_PIPELINE_OPTIONS.stages, ...deps.options?.stages },
    };
    this.auditStore = deps.auditStore ?? new NullAuditStore();
    this.artifacts = deps.artifacts ?? new ArtifactWriter(this.options.workDir);
    this.logger = deps.logger ?? new Logger();
  }

  async run(input: unknown, request: RunRequest = {}): Promise<PipelineResult> {
    const product = validateProductInput(input);
    const runId = request.runId ?? randomUUID();
    return runWithTelemetryContext({ runId, step: "system", attempt: 0 }, () =>
      this.execute(runId, product, request.signal)
    );
  }

  async close(): Promise<void> {
    await this.deps.browser?.close();
  }

  private async execute(runId: string, product: ProductInput, signal?: AbortSignal): Promise<PipelineResult> {
    const runDirectory = this.artifacts.runDirectory(runId);
    const stateStore = RunStateStore.create({
      runId,
      productName: product.product_name,
      path: runDirectory ? runStatePath(runDirectory) : undefined,
    });
    const context: PipelineContext = {
      runId,
      options: this.options,
      logger: this.logger,
      stateStore,
      budget: new BudgetManager(this.options.maxTotalMs),
      generator: this.deps.generator,
      discovery: this.deps.discovery,
      pageFetcher: this.deps.pageFetcher,
      artifacts: this.artifacts,
      signal,
    };

    this.logger.info("Pipeline start", {
      eventType: "summary",
      productName: product.product_name,
      features: product.features.length,
      competitors: product.competitors.length,
      deepScrape: this.options.deepScrape,
      resultsPerQuery: this.options.resultsPerQuery,
      maxTotalMs: this.options.maxTotalMs,
      workDir: this.options.workDir,
    });

    let state = createPipelineState(product);
    let phase: PipelinePhase = "start";
    let terminatedBy = "completed";

    try {
      while (phase !== "done") {
        const stage = stageForPhase(phase);
        const outcome = stage ? await this.runStage(stage, context, state) : undefined;
        if (outcome) {
          state = outcome.state;
          if (outcome.kind === "terminate") {
            terminatedBy = outcome.reason;
          }
        }
        const previous = phase;
        phase = nextPhase(phase, outcome);
        stateStore.enterPhase(phase);
        this.logger.info("Pipeline transition", {
          eventType: "pipeline.transition",
          from: previous,
          to: phase,
        });
      }
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        stateStore.skipPending("cancelled");
        stateStore.markFinished("cancelled");
        this.logger.warn("Pipeline cancelled", {
          eventType: "summary",
          phase: "fail",
          errorCode: error.code,
          lastPhase: phase,
        });
      }
      throw error;
    }

    stateStore.skipPending(terminatedBy);
    stateStore.markFinished(terminatedBy);
    this.writeSummary(context, state, terminatedBy);
    await this.archive(runId, state);

    this.logger.info("Pipeline completed", {
      eventType: "summary",
      terminatedBy,
      queries: state.search_queries?.length ?? 0,
      candidates: countLeads(state),
      ranked: state.ranked_leads !== undefined,
    });

    return {
      runId,
      state,
      stages: stateStore.state.stepStatuses,
      phaseTrail: [...stateStore.state.phaseTrail],
      terminatedBy,
    };
  }

  private async runStage(step: StepName, context: PipelineContext, state: PipelineState): Promise<StageOutcome> {
    const policy = this.options.stages[step];
    const result = await runStep(
      {
        name: step,
        timeoutMs: policy.timeoutMs,
        maxAttempts: policy.maxAttempts,
        run: (ctx: PipelineContext, signal: AbortSignal): Promise<StatePatch> => STAGE_RUNNERS[step](ctx, state, signal),
      },
      context,
      this.deps.stepRunOptions
    );

    let patch: StatePatch;
    if (result.ok) {
      patch = result.value;
    } else {
      patch = degradedPatch(step, state);
      this.logger.warn("Stage degraded to empty output", {
        step,
        eventType: "pipeline.skip",
        errorCode: result.error.code,
        errorMessage: result.error.message,
      });
    }
    const next = mergeState(state, patch);

    if (step === "enhance" && (next.search_queries ?? []).length === 0) {
      return this.terminate(next, "no-search-queries", "No search queries; skipping discover and rank");
    }
    if (step === "discover" && !hasCandidates(next)) {
      return this.terminate(next, "no-candidates", "No candidates found; skipping rank");
    }
    return { kind: "continue", state: next };
  }

  private terminate(state: PipelineState, reason: string, message: string): StageOutcome {
    this.logger.info(message, {
      eventType: "pipeline.skip",
      reason,
    });
    return { kind: "terminate", state, reason };
  }

  private writeSummary(context: PipelineContext, state: PipelineState, terminatedBy: string): void {
    const path = this.artifacts.write(context.runId, ARTIFACT_NAMES.summary, {
      runId: context.runId,
      productName: state.product_name,
      finishedAt: new Date().toISOString(),
      terminatedBy,
      phaseTrail: context.stateStore.state.phaseTrail,
      stepStatuses: context.stateStore.state.stepStatuses,
      artifacts: context.stateStore.state.artifacts,
      searchQueries: state.search_queries ?? [],
      candidates: countLeads(state),
      pages: state.scraped_pages?.length ?? 0,
    });
    if (path) {
      context.stateStore.addArtifact(path);
    }
  }

  private async archive(runId: string, state: PipelineState): Promise<void> {
    try {
      await this.auditStore.insert(buildAuditRow(runId, state));
      this.logger.info("Run archived", {
        eventType: "audit.persist",
        phase: "end",
        store: this.auditStore.name,
      });
    } catch (error) {
      this.logger.warn("Run could not be archived", {
        eventType: "audit.persist",
        phase: "fail",
        store: this.auditStore.name,
        errorMessage: errorMessage(error),
      });
    }
  }
}

const STAGE_RUNNERS: Record<
  StepName,
  (context: PipelineContext, state: PipelineState, signal: AbortSignal) => Promise<StatePatch>
> = {
  enhance: runEnhanceStep,
  discover: runDiscoverStep,
  rank: runRankStep,
};

function degradedPatch(step: StepName, state: PipelineState): StatePatch {
  switch (step) {
    case "enhance":
      return { search_queries: [], business_domains: [] };
    case "discover":
      return { scraped_leads: Object.fromEntries((state.search_queries ?? []).map((query) => [query, []])) };
    case "rank":
      return {
        value_prop: buildValueProp(state),
        customer_profile: buildCustomerProfile(state),
        ranked_leads: emptyRankedLeads(),
      };
  }
}

function countLeads(state: PipelineState): number {
  return Object.values(state.scraped_leads ?? {}).reduce((sum, leads) => sum + leads.length, 0);
}
