import {
  optionalEnv,
  optionalEnvBool,
  optionalEnvChoice,
  optionalEnvFloat,
  optionalEnvInt,
  requireEnv,
} from "../lib/env.js";
import { defaultWorkDir } from "../lib/paths.js";
import { ConfigError } from "./errors.js";
import type { DeepScrapeMode, LlmProvider, LogFormat, ModelRuntimeConfig, PipelineOptions } from "./types.js";

export const LLM_PROVIDERS = ["anthropic", "openai-compatible"] as const satisfies readonly LlmProvider[];
export const DEEP_SCRAPE_MODES = ["off", "fallback", "always"] as const satisfies readonly DeepScrapeMode[];
export const LOG_FORMATS = ["condensed", "pretty", "json"] as const satisfies readonly LogFormat[];

const DEFAULT_BASE_URLS: Record<LlmProvider, string> = {
  anthropic: "https://api.anthropic.com/v1",
  "openai-compatible": "https://api.openai.com/v1",
};

export interface SupabaseConfig {
  url: string;
  key: string;
  table: string;
}

export interface ProspectorConfig {
  model: ModelRuntimeConfig;
  search: { apiKey?: string; engineId?: string };
  supabase?: SupabaseConfig;
  browser: { executablePath?: string };
  port: number;
  log: { format: LogFormat; verbose: boolean; agentLogs: boolean };
  pipeline: Partial<PipelineOptions>;
}

export function loadProspectorConfig(env: NodeJS.ProcessEnv = process.env): ProspectorConfig {
  const provider = optionalEnvChoice("LLM_PROVIDER", LLM_PROVIDERS, "openai-compatible", env);

  return {
    model: {
      provider,
      modelId: optionalEnv("MODEL", "gpt-4o-mini", env),
      baseURL: normalizeBaseURL(optionalEnv("LLM_BASE_URL", DEFAULT_BASE_URLS[provider], env)),
      apiKey: requireEnv("LLM_API_KEY", env),
      temperature: optionalEnvFloat("TEMPERATURE", 0.7, env),
    },
    search: {
      apiKey: env.GOOGLE_SEARCH_API_KEY || undefined,
      engineId: env.GOOGLE_SEARCH_ENGINE_ID || undefined,
    },
    supabase: loadSupabaseConfig(env),
    browser: {
      executablePath: env.CHROMIUM_EXECUTABLE_PATH || undefined,
    },
    port: optionalEnvInt("PORT", 8000, env),
    log: {
      format: optionalEnvChoice("LOG_FORMAT", LOG_FORMATS, "condensed", env),
      verbose: optionalEnvBool("VERBOSE", false, env),
      agentLogs: optionalEnvBool("AGENT_LOGS", true, env),
    },
    pipeline: {
      workDir: optionalEnv("PROSPECTOR_WORK_DIR", defaultWorkDir(), env),
      deepScrape: optionalEnvChoice("PROSPECTOR_DEEP_SCRAPE", DEEP_SCRAPE_MODES, "off", env),
      resultsPerQuery: optionalEnvInt("PROSPECTOR_RESULTS_PER_QUERY", 5, env),
      maxQueries: optionalEnvInt("PROSPECTOR_MAX_QUERIES", 8, env),
      maxTotalMs: optionalEnvInt("PROSPECTOR_MAX_TOTAL_MS", 5 * 60 * 1000, env),
      maxModelMs: optionalEnvInt("PROSPECTOR_MAX_MODEL_MS", 60_000, env),
    },
  };
}

function loadSupabaseConfig(env: NodeJS.ProcessEnv): SupabaseConfig | undefined {
  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_KEY;
  if (!url && !key) {
    return undefined;
  }
  if (!url || !key) {
    throw new ConfigError("SUPABASE_URL and SUPABASE_KEY must be set together");
  }
  return {
    url,
    key,
    table: optionalEnv("SUPABASE_TABLE", "evaluation_runs", env),
  };
}

function normalizeBaseURL(candidate: string): string {
  return candidate.replace(/\/+$/, "");
}
