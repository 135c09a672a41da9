import { describe, expect, test } from "vitest";
import { InputValidationError } from "../pipeline/errors.js";
import type { PipelineResult } from "../pipeline/types.js";
import {
  handleBodyError,
  handleIndex,
  handleListRuns,
  handleListRunsByCategory,
  handleRunLeadPipeline,
  handleUpdateCategory,
  handleUpdateEvaluation,
  type HandlerDeps,
} from "../server/handlers.js";
import { buildAuditRow } from "../store/audit-store.js";
import { createPipelineState, mergeState } from "../pipeline/state-model.js";
import { MemoryAuditStore } from "./helpers/fakes.js";

const STATE = mergeState(
  createPipelineState({
    product_name: "Acme CRM",
    description: "A CRM for dental clinics",
    features: [],
    competitors: [],
  }),
  { search_queries: [], business_domains: [], messages: ["raw"] }
);

function completedRun(): PipelineResult {
  return {
    runId: "run-1",
    state: STATE,
    stages: {
      enhance: { status: "succeeded", attempts: 1, history: [] },
      discover: { status: "skipped", attempts: 0, history: [] },
      rank: { status: "skipped", attempts: 0, history: [] },
    },
    phaseTrail: ["start", "enhancing", "done"],
    terminatedBy: "no-search-queries",
  };
}

function deps(run: HandlerDeps["pipeline"]["run"], auditStore = new MemoryAuditStore()): HandlerDeps {
  return { pipeline: { run }, auditStore };
}

describe("handleRunLeadPipeline", () => {
  test("wraps the final state with the run id", async () => {
    const response = await handleRunLeadPipeline(deps(async () => completedRun()), { product_name: "Acme CRM" });

    expect(response).toEqual({
      status: 200,
      body: {
        status: "success",
        result: {
          run_id: "run-1",
          product_name: "Acme CRM",
          description: "A CRM for dental clinics",
          features: [],
          competitors: [],
          search_queries: [],
          business_domains: [],
          messages: ["raw"],
        },
      },
    });
  });

  test("passes the body and the abort signal through", async () => {
    const controller = new AbortController();
    const seen: Array<{ body: unknown; signal?: AbortSignal }> = [];

    await handleRunLeadPipeline(
      deps(async (body, request) => {
        seen.push({ body, signal: request?.signal });
        return completedRun();
      }),
      { product_name: "Acme CRM" },
      controller.signal
    );

    expect(seen).toEqual([{ body: { product_name: "Acme CRM" }, signal: controller.signal }]);
  });

  test("maps invalid input to 422", async () => {
    const response = await handleRunLeadPipeline(
      deps(async () => {
        throw new InputValidationError("Invalid product input: description: description is required");
      }),
      {}
    );

    expect(response).toEqual({
      status: 422,
      body: { detail: "Invalid product input: description: description is required" },
    });
  });

  test("maps unexpected failures to 500 with the message", async () => {
    const response = await handleRunLeadPipeline(
      deps(async () => {
        throw new Error("boom");
      }),
      {}
    );

    expect(response).toEqual({ status: 500, body: { detail: "boom" } });
  });
});

describe("evaluation handlers", () => {
  function seeded(): MemoryAuditStore {
    const store = new MemoryAuditStore();
    store.rows.push(buildAuditRow("trace-1", STATE), buildAuditRow("trace-2", STATE));
    return store;
  }

  const neverRuns: HandlerDeps["pipeline"]["run"] = async () => {
    throw new Error("not used");
  };

  test("lists runs newest first", async () => {
    const response = await handleListRuns(deps(neverRuns, seeded()));

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject([{ trace_id: "trace-2" }, { trace_id: "trace-1" }]);
  });

  test("updates a category and lists by it", async () => {
    const store = seeded();

    await expect(
      handleUpdateCategory(deps(neverRuns, store), { trace_id: "trace-1", category: "dental" })
    ).resolves.toEqual({ status: 200, body: { message: "Category updated successfully." } });

    const listed = await handleListRunsByCategory(deps(neverRuns, store), "dental");
    expect(listed.status).toBe(200);
    expect(listed.body).toMatchObject([{ trace_id: "trace-1", category: "dental" }]);
  });

  test("reports an unknown trace id as 404", async () => {
    await expect(
      handleUpdateCategory(deps(neverRuns, seeded()), { trace_id: "missing", category: "dental" })
    ).resolves.toEqual({ status: 404, body: { detail: "Evaluation row not found" } });

    await expect(
      handleUpdateEvaluation(deps(neverRuns, seeded()), { trace_id: "missing", evaluation_status: "approved" })
    ).resolves.toEqual({ status: 404, body: { detail: "Evaluation row not found" } });
  });

  test("accepts an evaluation with or without a comment", async () => {
    await expect(
      handleUpdateEvaluation(deps(neverRuns, seeded()), {
        trace_id: "trace-2",
        evaluation_status: "approved",
        evaluation_comment: null,
      })
    ).resolves.toEqual({ status: 200, body: { message: "Evaluation updated successfully." } });
  });

  test("rejects malformed update bodies with 422", async () => {
    await expect(handleUpdateCategory(deps(neverRuns, seeded()), { trace_id: "trace-1" })).resolves.toEqual({
      status: 422,
      body: { detail: "category: Required" },
    });
  });
});

describe("handleIndex", () => {
  test("lists the available endpoints", () => {
    expect(handleIndex()).toEqual({
      status: 200,
      body: {
        message: "Prospector API is running.",
        available_endpoints: [
          "/run-lead-pipeline",
          "/evaluation/runs",
          "/evaluation/runs/category/{category}",
          "/evaluation/update-category",
          "/evaluation/update-evaluation",
        ],
      },
    });
  });
});

describe("handleBodyError", () => {
  test("malformed JSON is a 422", () => {
    const error = Object.assign(new SyntaxError("Unexpected token } in JSON at position 9"), {
      type: "entity.parse.failed",
      status: 400,
    });
    expect(handleBodyError(error)).toEqual({
      status: 422,
      body: { detail: "Invalid request body: Unexpected token } in JSON at position 9" },
    });
  });

  test("an oversized body keeps its 413", () => {
    const error = Object.assign(new Error("request entity too large"), { type: "entity.too.large", status: 413 });
    expect(handleBodyError(error)).toEqual({ status: 413, body: { detail: "request entity too large" } });
  });

  test("an error without an HTTP status is a 500", () => {
    expect(handleBodyError(new Error("stream ended early"))).toEqual({
      status: 500,
      body: { detail: "stream ended early" },
    });
  });
});
