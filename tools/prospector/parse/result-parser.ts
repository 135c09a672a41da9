import { emitAgentEvent } from "../pipeline/events.js";
import type { RankedLead, RankedLeads } from "../pipeline/types.js";
import { extractFirstJsonObject, isJsonObject, type JsonObject } from "./json-scan.js";

export type ParseTier = "json" | "lines" | "empty";

export interface EnhancerParseResult {
  search_queries: string[];
  business_domains: string[];
  messages: string[];
  tier: ParseTier;
}

export interface RankedParseResult {
  ranked_leads: RankedLeads;
  messages: string[];
  tier: ParseTier;
}

const BULLET_CHARS = "•\\-* ";
const BULLET_START = /^[•\-*]/;
const BULLET_TRIM = new RegExp(`^[${BULLET_CHARS}]+|[${BULLET_CHARS}]+$`, "g");

/**
 * Reads search queries and business domains out of free-form model output.
 * A JSON object anywhere in the text wins; otherwise bullet lines are taken
 * as queries. Never throws: unusable output yields empty lists.
 */
export function parseEnhancerOutput(raw: string): EnhancerParseResult {
  const object = extractFirstJsonObject(raw);
  if (object) {
    return record({
      search_queries: stringList(object.search_queries),
      business_domains: stringList(object.business_domains),
      messages: [raw],
      tier: "json",
    });
  }

  const queries = bulletLines(raw).map(stripBullet).filter((line) => line.length > 0);
  return record({
    search_queries: queries,
    business_domains: [],
    messages: [raw],
    tier: queries.length > 0 ? "lines" : "empty",
  });
}

/**
 * Reads HIGH / MEDIUM / LOW buckets out of ranking output. Partial output
 * (a single bucket) is kept as produced.
 */
export function parseRankedOutput(raw: string): RankedParseResult {
  const object = extractFirstJsonObject(raw);
  if (object) {
    return recordRanked({
      ranked_leads: {
        high_priority: leadList(pickBucket(object, "high")),
        medium_priority: leadList(pickBucket(object, "medium")),
        low_priority: leadList(pickBucket(object, "low")),
      },
      messages: [raw],
      tier: "json",
    });
  }

  const ranked = emptyRankedLeads();
  let bucket: keyof RankedLeads | undefined;
  let found = 0;
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    if (BULLET_START.test(trimmed) && !trimmed.startsWith("**")) {
      const entry = stripBullet(trimmed);
      if (bucket && entry) {
        ranked[bucket].push(entry);
        found += 1;
      }
      continue;
    }
    bucket = headingBucket(trimmed) ?? bucket;
  }

  return recordRanked({
    ranked_leads: ranked,
    messages: [raw],
    tier: found > 0 ? "lines" : "empty",
  });
}

export function emptyRankedLeads(): RankedLeads {
  return { high_priority: [], medium_priority: [], low_priority: [] };
}

export function stripBullet(line: string): string {
  return line.trim().replace(BULLET_TRIM, "").trim();
}

function bulletLines(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && BULLET_START.test(line));
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === "string");
}

function leadList(value: unknown): RankedLead[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const out: RankedLead[] = [];
  for (const item of value) {
    if (typeof item === "string" || isJsonObject(item)) {
      out.push(item);
    }
  }
  return out;
}

function pickBucket(object: JsonObject, level: "high" | "medium" | "low"): unknown {
  const candidates = [`${level}_priority`, level, level.toUpperCase(), `${level.toUpperCase()}_PRIORITY`];
  for (const key of candidates) {
    if (key in object) {
      return object[key];
    }
  }
  return undefined;
}

function headingBucket(line: string): keyof RankedLeads | undefined {
  const normalized = line.replace(/[#*:_]/g, " ").trim().toLowerCase();
  if (!/\bpriority\b|\bleads?\b|^(high|medium|low)$/.test(normalized)) {
    return undefined;
  }
  if (/\bhigh\b/.test(normalized)) return "high_priority";
  if (/\bmedium\b/.test(normalized)) return "medium_priority";
  if (/\blow\b/.test(normalized)) return "low_priority";
  return undefined;
}

function record(result: EnhancerParseResult): EnhancerParseResult {
  emitAgentEvent({
    level: result.tier === "empty" ? "warn" : "info",
    eventType: "parse.result",
    message: "Enhancer output parsed",
    tier: result.tier,
    queries: result.search_queries.length,
    domains: result.business_domains.length,
  });
  return result;
}

function recordRanked(result: RankedParseResult): RankedParseResult {
  emitAgentEvent({
    level: result.tier === "empty" ? "warn" : "info",
    eventType: "parse.result",
    message: "Ranking output parsed",
    tier: result.tier,
    high: result.ranked_leads.high_priority.length,
    medium: result.ranked_leads.medium_priority.length,
    low: result.ranked_leads.low_priority.length,
  });
  return result;
}
