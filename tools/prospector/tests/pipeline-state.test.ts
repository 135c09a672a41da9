import { mkdtempSync, readFileSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, test } from "vitest";
import { ARTIFACT_NAMES, ArtifactWriter } from "../pipeline/artifacts.js";
import { nextPhase, stageForPhase } from "../pipeline/machine.js";
import { createPipelineState, hasCandidates, mergeState } from "../pipeline/state-model.js";
import { RunStateStore, runStatePath } from "../pipeline/state.js";

const input = {
  product_name: "Acme CRM",
  description: "A CRM for dental clinics",
  features: ["scheduling"],
  competitors: [],
};

describe("phase machine", () => {
  test("walks the linear chain", () => {
    expect(nextPhase("start")).toBe("enhancing");
    expect(nextPhase("enhancing")).toBe("discovering");
    expect(nextPhase("discovering")).toBe("ranking");
    expect(nextPhase("ranking")).toBe("done");
    expect(nextPhase("done")).toBe("done");
  });

  test("a terminating outcome jumps to done", () => {
    const state = createPipelineState(input);
    expect(nextPhase("enhancing", { kind: "terminate", state, reason: "no-search-queries" })).toBe("done");
    expect(nextPhase("enhancing", { kind: "continue", state })).toBe("discovering");
  });

  test("maps phases to stages", () => {
    expect(stageForPhase("enhancing")).toBe("enhance");
    expect(stageForPhase("discovering")).toBe("discover");
    expect(stageForPhase("ranking")).toBe("rank");
    expect(stageForPhase("start")).toBeUndefined();
    expect(stageForPhase("done")).toBeUndefined();
  });
});

describe("pipeline state", () => {
  test("merging returns a new frozen state and keeps earlier fields", () => {
    const initial = createPipelineState(input);
    const enhanced = mergeState(initial, { search_queries: ["q1"], business_domains: ["healthcare"] });
    const discovered = mergeState(enhanced, { scraped_leads: { q1: [] }, search_queries: undefined });

    expect(initial).toEqual({ ...input, messages: [] });
    expect(Object.isFrozen(discovered)).toBe(true);
    expect(discovered.search_queries).toEqual(["q1"]);
    expect(discovered.business_domains).toEqual(["healthcare"]);
    expect(enhanced.scraped_leads).toBeUndefined();
  });

  test("does not alias the caller's input lists", () => {
    const features = ["scheduling"];
    const state = createPipelineState({ ...input, features });
    features.push("billing");
    expect(state.features).toEqual(["scheduling"]);
  });

  test("hasCandidates needs at least one non-empty query", () => {
    const state = createPipelineState(input);
    expect(hasCandidates(state)).toBe(false);
    expect(hasCandidates(mergeState(state, { scraped_leads: { q1: [], q2: [] } }))).toBe(false);
    expect(
      hasCandidates(mergeState(state, { scraped_leads: { q1: [{ title: "A", snippet: "", url: "https://a.example" }] } }))
    ).toBe(true);
  });
});

describe("RunStateStore", () => {
  test("records phases, skips and the final outcome on disk", () => {
    const dir = mkdtempSync(join(tmpdir(), "prospector-state-"));
    const path = runStatePath(dir);
    const store = RunStateStore.create({ runId: "run-1", productName: "Acme CRM", path });

    store.enterPhase("enhancing");
    store.markStepAttemptStart("enhance", 1);
    store.markStepAttemptResult("enhance", 1, true);
    store.enterPhase("done");
    store.skipPending("no-search-queries");
    store.markFinished("no-search-queries");

    const saved: unknown = JSON.parse(readFileSync(path, "utf-8"));
    expect(saved).toMatchObject({
      runId: "run-1",
      phase: "done",
      phaseTrail: ["start", "enhancing", "done"],
      terminatedBy: "no-search-queries",
      stepStatuses: {
        enhance: { status: "succeeded", attempts: 1 },
        discover: { status: "skipped", message: "no-search-queries" },
        rank: { status: "skipped", message: "no-search-queries" },
      },
    });
  });

  test("keeps running in memory when the file cannot be written", () => {
    const dir = mkdtempSync(join(tmpdir(), "prospector-state-"));
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "not a directory");
    const store = RunStateStore.create({ runId: "run-2", productName: "Acme CRM", path: join(blocker, "run-state.json") });

    store.enterPhase("enhancing");

    expect(store.state.phaseTrail).toEqual(["start", "enhancing"]);
  });
});

describe("ArtifactWriter", () => {
  test("writes JSON under the run directory", () => {
    const workDir = mkdtempSync(join(tmpdir(), "prospector-artifacts-"));
    const writer = new ArtifactWriter(workDir);

    const path = writer.write("run-1", ARTIFACT_NAMES.searchResults, { q1: [] });

    expect(path).toBe(join(workDir, "run-1", "search-results.json"));
    expect(JSON.parse(readFileSync(join(workDir, "run-1", "search-results.json"), "utf-8"))).toEqual({ q1: [] });
  });

  test("is disabled without a work dir", () => {
    const writer = new ArtifactWriter();
    expect(writer.enabled).toBe(false);
    expect(writer.write("run-1", ARTIFACT_NAMES.summary, {})).toBeUndefined();
  });
});
