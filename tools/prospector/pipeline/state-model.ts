import type { PipelineState, ProductInput } from "./types.js";

export type StatePatch = Partial<Omit<PipelineState, keyof ProductInput>>;

export function createPipelineState(input: ProductInput): PipelineState {
  return Object.freeze({
    product_name: input.product_name,
    description: input.description,
    features: [...input.features],
    competitors: [...input.competitors],
    messages: [],
  });
}

/**
 * Returns a new state with `patch` applied key by key. Values replace the
 * previous value whole; keys the patch leaves undefined keep their value, so
 * fields written by earlier stages are never removed.
 */
export function mergeState(state: PipelineState, patch: StatePatch): PipelineState {
  return Object.freeze({ ...state, ...pickDefined(patch) });
}

function pickDefined(patch: StatePatch): StatePatch {
  const out: { -readonly [K in keyof StatePatch]: StatePatch[K] } = {};
  if (patch.search_queries !== undefined) out.search_queries = patch.search_queries;
  if (patch.business_domains !== undefined) out.business_domains = patch.business_domains;
  if (patch.scraped_leads !== undefined) out.scraped_leads = patch.scraped_leads;
  if (patch.scraped_pages !== undefined) out.scraped_pages = patch.scraped_pages;
  if (patch.value_prop !== undefined) out.value_prop = patch.value_prop;
  if (patch.customer_profile !== undefined) out.customer_profile = patch.customer_profile;
  if (patch.ranked_leads !== undefined) out.ranked_leads = patch.ranked_leads;
  if (patch.messages !== undefined) out.messages = patch.messages;
  return out;
}

export function hasCandidates(state: PipelineState): boolean {
  const leads = state.scraped_leads;
  if (!leads) {
    return false;
  }
  return Object.values(leads).some((candidates) => candidates.length > 0);
}
