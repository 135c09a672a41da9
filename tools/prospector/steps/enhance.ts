import { applyQueryPolicy } from "../discover/query-policy.js";
import { loadPrompt, renderPrompt } from "../lib/prompt.js";
import { parseEnhancerOutput } from "../parse/result-parser.js";
import { ARTIFACT_NAMES } from "../pipeline/artifacts.js";
import type { PipelineContext } from "../pipeline/context.js";
import type { StatePatch } from "../pipeline/state-model.js";
import type { PipelineState } from "../pipeline/types.js";

export interface EnhanceOutput extends StatePatch {
  search_queries: string[];
  business_domains: string[];
  messages: string[];
}

export function buildEnhancePrompt(state: PipelineState, template: string = loadPrompt("enhance")): string {
  return renderPrompt(template, {
    product_name: state.product_name,
    description: state.description,
    features: state.features.join(", "),
    competitors: state.competitors.join(", "),
  });
}

export async function runEnhanceStep(
  context: PipelineContext,
  state: PipelineState,
  signal: AbortSignal
): Promise<EnhanceOutput> {
  const { options, stateStore } = context;
  const logger = context.logger.child({ step: "enhance" });

  logger.info("Reasoning: turning product fields into search queries and target domains", {
    eventType: "reasoning",
  });
  stateStore.setStepMessage("enhance", "Generating search queries");

  const { content } = await context.generator.invoke(buildEnhancePrompt(state), {
    action: "enhance-input",
    signal,
  });
  const parsed = parseEnhancerOutput(content);
  const policy = applyQueryPolicy({ queries: parsed.search_queries, maxQueries: options.maxQueries });

  if (policy.duplicateCount > 0 || policy.droppedCount > 0) {
    logger.info("Search queries filtered", {
      eventType: "validation",
      kept: policy.queries.length,
      duplicates: policy.duplicateCount,
      dropped: policy.droppedCount,
      duplicateRatio: Number(policy.duplicateRatio.toFixed(2)),
    });
  }

  const artifactPath = context.artifacts.write(context.runId, ARTIFACT_NAMES.enhanceOutput, {
    tier: parsed.tier,
    raw: content,
    search_queries: policy.queries,
    business_domains: parsed.business_domains,
  });
  if (artifactPath) {
    stateStore.addArtifact(artifactPath);
  }

  return {
    search_queries: policy.queries,
    business_domains: parsed.business_domains,
    messages: [...state.messages, ...parsed.messages],
  };
}
