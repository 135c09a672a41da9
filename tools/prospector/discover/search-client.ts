import pLimit from "p-limit";
import { z } from "zod";
import { fetchTextWithLimits } from "../lib/http.js";
import {
  ConfigError,
  NetworkError,
  PipelineError,
  SearchBackendError,
  errorMessage,
} from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import { RETRY_BASE_MS, calculateBackoffMs, linkedTimeout, wait } from "../pipeline/retry.js";
import type { CandidateResult, ScrapedLeads } from "../pipeline/types.js";

export interface RawSearchItem {
  title?: string;
  snippet?: string;
  link?: string;
}

/** The search backend boundary. */
export interface SearchBackend {
  readonly name: string;
  query(q: string, count: number, signal: AbortSignal): Promise<RawSearchItem[]>;
}

export interface GoogleSearchCredentials {
  apiKey?: string;
  engineId?: string;
}

const GOOGLE_CSE_ENDPOINT = "https://www.googleapis.com/customsearch/v1";
const GOOGLE_MAX_RESULTS = 10;
const MAX_RESPONSE_BYTES = 2 * 1024 * 1024;

const cseResponseSchema = z.object({
  items: z
    .array(
      z
        .object({
          title: z.string().optional(),
          snippet: z.string().optional(),
          link: z.string().optional(),
        })
        .passthrough()
    )
    .optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
    })
    .optional(),
});

export class GoogleCustomSearchBackend implements SearchBackend {
  readonly name = "google-cse";
  private readonly apiKey: string;
  private readonly engineId: string;

  constructor(
    credentials: GoogleSearchCredentials,
    private readonly timeoutMs: number,
    private readonly endpoint: string = GOOGLE_CSE_ENDPOINT
  ) {
    if (!credentials.apiKey) {
      throw new ConfigError("Missing GOOGLE_SEARCH_API_KEY for the search backend");
    }
    if (!credentials.engineId) {
      throw new ConfigError("Missing GOOGLE_SEARCH_ENGINE_ID for the search backend");
    }
    this.apiKey = credentials.apiKey;
    this.engineId = credentials.engineId;
  }

  async query(q: string, count: number, signal: AbortSignal): Promise<RawSearchItem[]> {
    const url = new URL(this.endpoint);
    url.searchParams.set("key", this.apiKey);
    url.searchParams.set("cx", this.engineId);
    url.searchParams.set("q", q);
    url.searchParams.set("num", String(clampCount(count)));

    const response = await fetchTextWithLimits(url.toString(), {
      timeoutMs: this.timeoutMs,
      maxBytes: MAX_RESPONSE_BYTES,
      signal,
      headers: { Accept: "application/json" },
    });

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (error) {
      throw new SearchBackendError(`Search response for "${q}" is not JSON`, error);
    }

    const parsed = cseResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SearchBackendError(`Search response for "${q}" has an unexpected shape`, parsed.error);
    }
    if (parsed.data.error) {
      throw new SearchBackendError(
        `Search backend error ${parsed.data.error.code ?? "unknown"}: ${parsed.data.error.message ?? "no message"}`
      );
    }
    return parsed.data.items ?? [];
  }
}

export interface DiscoveryClientOptions {
  timeoutMs: number;
  maxAttempts: number;
  concurrency: number;
  backoffBaseMs?: number;
}

/**
 * Wraps a {@link SearchBackend} with per-query isolation: a failing query is
 * retried while its error is retryable, then logged and reported as an
 * empty list. Only cancellation by the caller escapes.
 */
export class DiscoveryClient {
  constructor(
    private readonly backend: SearchBackend,
    private readonly options: DiscoveryClientOptions
  ) {}

  async search(query: string, limit: number, signal?: AbortSignal): Promise<CandidateResult[]> {
    const maxAttempts = Math.max(1, this.options.maxAttempts);
    const startedAt = Date.now();

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const guard = linkedTimeout(this.options.timeoutMs, signal);
      try {
        const items = await this.backend.query(query, limit, guard.signal);
        const results = toCandidates(items).slice(0, limit);
        emitAgentEvent({
          level: "info",
          eventType: "search.query",
          message: "Search query completed",
          phase: "end",
          backend: this.backend.name,
          query,
          searchAttempt: attempt,
          results: results.length,
          durationMs: Date.now() - startedAt,
        });
        return results;
      } catch (error) {
        if (signal?.aborted) {
          throw signal.reason ?? error;
        }
        const failure = normalizeSearchError(error, guard.timedOut(), this.options.timeoutMs);
        const willRetry = failure.retryable && attempt < maxAttempts;
        emitAgentEvent({
          level: "warn",
          eventType: "search.query",
          message: willRetry ? "Search query failed; retrying" : "Search query failed; recording no results",
          phase: "fail",
          backend: this.backend.name,
          query,
          searchAttempt: attempt,
          errorCode: failure.code,
          errorMessage: failure.message,
          retryable: failure.retryable,
        });
        if (!willRetry) {
          return [];
        }
        await wait(calculateBackoffMs(attempt, this.options.backoffBaseMs ?? RETRY_BASE_MS), signal);
      } finally {
        guard.dispose();
      }
    }

    return [];
  }

  /**
   * One entry per distinct query. Queries run concurrently, bounded by
   * `concurrency`; the mapping is keyed by query text, so completion order
   * does not matter.
   */
  async searchMany(queries: string[], limit: number, signal?: AbortSignal): Promise<ScrapedLeads> {
    const unique = [...new Set(queries)];
    const limiter = pLimit(Math.max(1, this.options.concurrency));
    const startedAt = Date.now();

    const settled = await Promise.all(
      unique.map((query) => limiter(async () => [query, await this.search(query, limit, signal)] as const))
    );

    const results: ScrapedLeads = {};
    for (const [query, candidates] of settled) {
      results[query] = candidates;
    }

    emitAgentEvent({
      level: "info",
      eventType: "search.batch",
      message: "Search batch completed",
      phase: "end",
      queries: unique.length,
      emptyQueries: settled.filter(([, candidates]) => candidates.length === 0).length,
      totalResults: settled.reduce((sum, [, candidates]) => sum + candidates.length, 0),
      durationMs: Date.now() - startedAt,
    });
    return results;
  }
}

export function toCandidates(items: RawSearchItem[]): CandidateResult[] {
  const out: CandidateResult[] = [];
  for (const item of items) {
    const url = item.link?.trim();
    if (!url) {
      continue;
    }
    out.push({
      title: item.title?.trim() ?? "",
      snippet: item.snippet?.trim() ?? "",
      url,
    });
  }
  return out;
}

function clampCount(count: number): number {
  return Math.min(GOOGLE_MAX_RESULTS, Math.max(1, Math.floor(count)));
}

function normalizeSearchError(error: unknown, timedOut: boolean, timeoutMs: number): PipelineError {
  if (timedOut) {
    return new NetworkError(`Search timed out after ${timeoutMs}ms`, error, true);
  }
  if (error instanceof PipelineError) {
    return error;
  }
  return new SearchBackendError(errorMessage(error), error);
}
