import { loadPrompt, renderPrompt } from "../lib/prompt.js";
import { parseRankedOutput } from "../parse/result-parser.js";
import { ARTIFACT_NAMES } from "../pipeline/artifacts.js";
import type { PipelineContext } from "../pipeline/context.js";
import type { StatePatch } from "../pipeline/state-model.js";
import type { PipelineState, RankedLeads } from "../pipeline/types.js";

export interface RankOutput extends StatePatch {
  value_prop: string;
  customer_profile: string;
  ranked_leads: RankedLeads;
  messages: string[];
}

export function buildValueProp(state: PipelineState): string {
  return `${state.product_name}: ${state.description}. Key features include ${state.features.join(", ")}.`;
}

export function buildCustomerProfile(state: PipelineState): string {
  return `Ideal customers include businesses in ${(state.business_domains ?? []).join(", ")}.`;
}

export function buildRankPrompt(
  state: PipelineState,
  derived: { value_prop: string; customer_profile: string },
  template: string = loadPrompt("rank")
): string {
  return renderPrompt(template, {
    product_name: state.product_name,
    description: state.description,
    features: state.features.join(", "),
    competitors: state.competitors.join(", "),
    value_prop: derived.value_prop,
    customer_profile: derived.customer_profile,
    business_domains: (state.business_domains ?? []).join(", "),
    companies: JSON.stringify(state.scraped_leads ?? {}, null, 2),
  });
}

export async function runRankStep(
  context: PipelineContext,
  state: PipelineState,
  signal: AbortSignal
): Promise<RankOutput> {
  const { stateStore } = context;
  const logger = context.logger.child({ step: "rank" });
  const derived = {
    value_prop: buildValueProp(state),
    customer_profile: buildCustomerProfile(state),
  };

  logger.info("Reasoning: ranking candidates against the value proposition", {
    eventType: "reasoning",
    queries: Object.keys(state.scraped_leads ?? {}).length,
  });
  stateStore.setStepMessage("rank", "Ranking candidates");

  const { content } = await context.generator.invoke(buildRankPrompt(state, derived), {
    action: "rank-leads",
    signal,
  });
  const parsed = parseRankedOutput(content);

  const artifactPath = context.artifacts.write(context.runId, ARTIFACT_NAMES.rankedLeads, {
    tier: parsed.tier,
    ranked_leads: parsed.ranked_leads,
  });
  if (artifactPath) {
    stateStore.addArtifact(artifactPath);
  }

  return {
    ...derived,
    ranked_leads: parsed.ranked_leads,
    messages: [...state.messages, ...parsed.messages],
  };
}
