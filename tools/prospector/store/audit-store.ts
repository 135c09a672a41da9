import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { PipelineError } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import type { PipelineState, RankedLeads, ScrapedLeads } from "../pipeline/types.js";

export const DEFAULT_AUDIT_TABLE = "evaluation_runs";
export const DEFAULT_LIST_LIMIT = 50;

const LIST_COLUMNS =
  "trace_id, created_at, product_name, category, evaluation_status, evaluation_comment, " +
  "search_queries, business_domains, scraped_leads, ranked_leads";

/** One archived invocation, as inserted. */
export interface AuditRow {
  trace_id: string;
  product_name: string;
  description: string;
  features: string[];
  competitors: string[];
  search_queries: string[];
  business_domains: string[];
  scraped_leads: ScrapedLeads;
  ranked_leads: RankedLeads | Record<string, never>;
  messages: string[];
  evaluation_status: "pending";
}

const auditRecordSchema = z
  .object({
    trace_id: z.string(),
    created_at: z.string().nullish(),
    product_name: z.string().nullish(),
    category: z.string().nullish(),
    evaluation_status: z.string().nullish(),
    evaluation_comment: z.string().nullish(),
    search_queries: z.unknown(),
    business_domains: z.unknown(),
    scraped_leads: z.unknown(),
    ranked_leads: z.unknown(),
  })
  .passthrough();

/** One archived invocation, as listed for review. */
export type AuditRecord = z.infer<typeof auditRecordSchema>;

export interface AuditStore {
  readonly name: string;
  insert(row: AuditRow): Promise<void>;
  listRuns(limit?: number): Promise<AuditRecord[]>;
  listRunsByCategory(category: string): Promise<AuditRecord[]>;
  /** Resolves `false` when no row has `traceId`. */
  updateCategory(traceId: string, category: string): Promise<boolean>;
  /** Resolves `false` when no row has `traceId`. */
  updateEvaluation(traceId: string, status: string, comment?: string | null): Promise<boolean>;
}

export function buildAuditRow(traceId: string, state: PipelineState): AuditRow {
  return {
    trace_id: traceId,
    product_name: state.product_name,
    description: state.description,
    features: [...state.features],
    competitors: [...state.competitors],
    search_queries: state.search_queries ?? [],
    business_domains: state.business_domains ?? [],
    scraped_leads: state.scraped_leads ?? {},
    ranked_leads: state.ranked_leads ?? {},
    messages: state.messages,
    evaluation_status: "pending",
  };
}

export interface SupabaseAuditStoreOptions {
  url: string;
  key: string;
  table?: string;
}

export class SupabaseAuditStore implements AuditStore {
  readonly name = "supabase";
  private readonly client: SupabaseClient;
  private readonly table: string;

  constructor(options: SupabaseAuditStoreOptions, client?: SupabaseClient) {
    this.client = client ?? createClient(options.url, options.key, { auth: { persistSession: false } });
    this.table = options.table ?? DEFAULT_AUDIT_TABLE;
  }

  async insert(row: AuditRow): Promise<void> {
    const { error } = await this.client.from(this.table).insert(row);
    if (error) {
      throw auditError("insert", error.message);
    }
  }

  async listRuns(limit: number = DEFAULT_LIST_LIMIT): Promise<AuditRecord[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select(LIST_COLUMNS)
      .order("created_at", { ascending: false })
      .limit(limit);
    if (error) {
      throw auditError("list", error.message);
    }
    return parseRecords(data);
  }

  async listRunsByCategory(category: string): Promise<AuditRecord[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select(LIST_COLUMNS)
      .eq("category", category)
      .order("created_at", { ascending: false });
    if (error) {
      throw auditError("list by category", error.message);
    }
    return parseRecords(data);
  }

  async updateCategory(traceId: string, category: string): Promise<boolean> {
    return this.update(traceId, { category });
  }

  async updateEvaluation(traceId: string, status: string, comment?: string | null): Promise<boolean> {
    return this.update(traceId, {
      evaluation_status: status,
      evaluation_comment: comment ?? null,
    });
  }

  private async update(traceId: string, values: Record<string, string | null>): Promise<boolean> {
    const { data, error } = await this.client
      .from(this.table)
      .update(values)
      .eq("trace_id", traceId)
      .select("trace_id");
    if (error) {
      throw auditError("update", error.message);
    }
    return Array.isArray(data) && data.length > 0;
  }
}

/** Used when no database is configured: archives nothing, lists nothing. */
export class NullAuditStore implements AuditStore {
  readonly name = "none";

  async insert(row: AuditRow): Promise<void> {
    emitAgentEvent({
      level: "debug",
      eventType: "audit.persist",
      message: "Audit store not configured; run not archived",
      traceId: row.trace_id,
    });
  }

  async listRuns(_limit?: number): Promise<AuditRecord[]> {
    return [];
  }

  async listRunsByCategory(_category: string): Promise<AuditRecord[]> {
    return [];
  }

  async updateCategory(_traceId: string, _category: string): Promise<boolean> {
    return false;
  }

  async updateEvaluation(_traceId: string, _status: string, _comment?: string | null): Promise<boolean> {
    return false;
  }
}

function parseRecords(data: unknown): AuditRecord[] {
  const parsed = z.array(auditRecordSchema).safeParse(data ?? []);
  if (!parsed.success) {
    throw auditError("list", `unexpected row shape: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}

function auditError(operation: string, message: string): PipelineError {
  return new PipelineError(`Audit store ${operation} failed: ${message}`, {
    code: "AUDIT_FAILED",
    retryable: false,
  });
}
