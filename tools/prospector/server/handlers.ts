import { z } from "zod";
import type { LeadPipeline } from "../pipeline/orchestrator.js";
import { InputValidationError, PipelineError, errorMessage } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import type { PipelineResult } from "../pipeline/types.js";
import type { AuditStore } from "../store/audit-store.js";

export interface HandlerResponse {
  status: number;
  body: unknown;
}

export interface HandlerDeps {
  pipeline: Pick<LeadPipeline, "run">;
  auditStore: AuditStore;
}

export const ENDPOINTS = [
  "/run-lead-pipeline",
  "/evaluation/runs",
  "/evaluation/runs/category/{category}",
  "/evaluation/update-category",
  "/evaluation/update-evaluation",
] as const;

const categoryUpdateSchema = z.object({
  trace_id: z.string().min(1),
  category: z.string().min(1),
});

const evaluationUpdateSchema = z.object({
  trace_id: z.string().min(1),
  evaluation_status: z.string().min(1),
  evaluation_comment: z.string().nullish(),
});

export function toResultBody(result: PipelineResult): Record<string, unknown> {
  return { run_id: result.runId, ...result.state };
}

export async function handleRunLeadPipeline(
  deps: HandlerDeps,
  body: unknown,
  signal?: AbortSignal
): Promise<HandlerResponse> {
  try {
    const result = await deps.pipeline.run(body, { signal });
    return { status: 200, body: { status: "success", result: toResultBody(result) } };
  } catch (error) {
    return errorResponse("run-lead-pipeline", error);
  }
}

export async function handleListRuns(deps: HandlerDeps): Promise<HandlerResponse> {
  try {
    return { status: 200, body: await deps.auditStore.listRuns() };
  } catch (error) {
    return errorResponse("evaluation/runs", error);
  }
}

export async function handleListRunsByCategory(deps: HandlerDeps, category: string): Promise<HandlerResponse> {
  try {
    return { status: 200, body: await deps.auditStore.listRunsByCategory(category) };
  } catch (error) {
    return errorResponse("evaluation/runs/category", error);
  }
}

export async function handleUpdateCategory(deps: HandlerDeps, body: unknown): Promise<HandlerResponse> {
  const parsed = categoryUpdateSchema.safeParse(body);
  if (!parsed.success) {
    return validationResponse(parsed.error);
  }
  try {
    const updated = await deps.auditStore.updateCategory(parsed.data.trace_id, parsed.data.category);
    if (!updated) {
      return { status: 404, body: { detail: "Evaluation row not found" } };
    }
    return { status: 200, body: { message: "Category updated successfully." } };
  } catch (error) {
    return errorResponse("evaluation/update-category", error);
  }
}

export async function handleUpdateEvaluation(deps: HandlerDeps, body: unknown): Promise<HandlerResponse> {
  const parsed = evaluationUpdateSchema.safeParse(body);
  if (!parsed.success) {
    return validationResponse(parsed.error);
  }
  try {
    const updated = await deps.auditStore.updateEvaluation(
      parsed.data.trace_id,
      parsed.data.evaluation_status,
      parsed.data.evaluation_comment
    );
    if (!updated) {
      return { status: 404, body: { detail: "Evaluation row not found" } };
    }
    return { status: 200, body: { message: "Evaluation updated successfully." } };
  } catch (error) {
    return errorResponse("evaluation/update-evaluation", error);
  }
}

export function handleIndex(): HandlerResponse {
  return {
    status: 200,
    body: {
      message: "Prospector API is running.",
      available_endpoints: [...ENDPOINTS],
    },
  };
}

/** Body-parser failures: malformed JSON is 422, anything else keeps the HTTP status it carries. */
export function handleBodyError(error: unknown): HandlerResponse {
  if (typeof error === "object" && error !== null) {
    if ("type" in error && error.type === "entity.parse.failed") {
      return { status: 422, body: { detail: `Invalid request body: ${errorMessage(error)}` } };
    }
    if ("status" in error && typeof error.status === "number" && error.status >= 400 && error.status < 600) {
      return { status: error.status, body: { detail: errorMessage(error) } };
    }
  }
  return errorResponse("request-body", error);
}

function validationResponse(error: z.ZodError): HandlerResponse {
  const detail = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  return { status: 422, body: { detail } };
}

function errorResponse(route: string, error: unknown): HandlerResponse {
  if (error instanceof InputValidationError) {
    return { status: 422, body: { detail: error.message } };
  }
  emitAgentEvent({
    level: "error",
    eventType: "server.request",
    message: "Request failed",
    phase: "fail",
    route,
    errorCode: error instanceof PipelineError ? error.code : "INTERNAL",
    errorMessage: errorMessage(error),
  });
  return { status: 500, body: { detail: errorMessage(error) } };
}
