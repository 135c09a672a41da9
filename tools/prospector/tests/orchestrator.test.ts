import { existsSync, mkdtempSync, readFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, test } from "vitest";
import type { BrowserSession } from "../discover/browser.js";
import { PageFetcher } from "../discover/page-fetcher.js";
import { DiscoveryClient } from "../discover/search-client.js";
import { InputValidationError, PipelineCancelledError } from "../pipeline/errors.js";
import { LeadPipeline, validateProductInput } from "../pipeline/orchestrator.js";
import type { PipelineOptions } from "../pipeline/types.js";
import {
  FakeBrowserSession,
  FakeSearchBackend,
  HangingBrowserSession,
  MemoryAuditStore,
  ScriptedGenerator,
  searchItems,
  untilAborted,
  type BackendHandler,
  type ScriptedReply,
} from "./helpers/fakes.js";

const PRODUCT = {
  product_name: "Acme CRM",
  description: "A CRM for dental clinics",
  features: ["scheduling", "billing"],
  competitors: ["DentiSoft"],
};

const ENHANCED = JSON.stringify({ search_queries: ["q1", "q2"], business_domains: ["healthcare"] });
const RANKED = JSON.stringify({
  high_priority: [{ company: "Acme Dental", url: "https://acme.example", reason: "multi-site" }],
  medium_priority: [],
  low_priority: [],
});

interface Harness {
  pipeline: LeadPipeline;
  generator: ScriptedGenerator;
  backend: FakeSearchBackend;
  auditStore: MemoryAuditStore;
}

function harness(input: {
  replies: Record<string, ScriptedReply | ScriptedReply[]>;
  search?: BackendHandler;
  pages?: Record<string, string>;
  browser?: BrowserSession;
  options?: Partial<PipelineOptions>;
}): Harness {
  const generator = new ScriptedGenerator(input.replies);
  const backend = new FakeSearchBackend(input.search ?? (async () => []));
  const auditStore = new MemoryAuditStore();
  const session = input.browser ?? (input.pages ? new FakeBrowserSession(input.pages) : undefined);
  const pageFetcher = session
    ? new PageFetcher(session, {
        pageTimeoutMs: 1_000,
        maxPageChars: 50_000,
        concurrency: 2,
        searchPageUrl: "https://search.example/search",
      })
    : undefined;
  const pipeline = new LeadPipeline({
    generator,
    discovery: new DiscoveryClient(backend, { timeoutMs: 1_000, maxAttempts: 1, concurrency: 2, backoffBaseMs: 1 }),
    pageFetcher,
    auditStore,
    options: input.options,
    stepRunOptions: { backoffBaseMs: 1 },
  });
  return { pipeline, generator, backend, auditStore };
}

const q1Only: BackendHandler = async (q) => (q === "q1" ? searchItems("https://acme.example") : []);

describe("LeadPipeline.run", () => {
  test("stops after enhance when no search queries come back", async () => {
    const raw = '{"search_queries": [], "business_domains": ["healthcare"]}';
    const { pipeline, generator, backend } = harness({ replies: { "enhance-input": raw } });

    const result = await pipeline.run(PRODUCT);

    expect(result.phaseTrail).toEqual(["start", "enhancing", "done"]);
    expect(result.terminatedBy).toBe("no-search-queries");
    expect(result.state.search_queries).toEqual([]);
    expect(result.state.business_domains).toEqual(["healthcare"]);
    expect(result.state.messages).toEqual([raw]);
    expect("scraped_leads" in result.state).toBe(false);
    expect("ranked_leads" in result.state).toBe(false);
    expect(result.stages.discover).toMatchObject({ status: "skipped", message: "no-search-queries" });
    expect(result.stages.rank).toMatchObject({ status: "skipped", message: "no-search-queries" });
    expect(generator.calls.map((call) => call.action)).toEqual(["enhance-input"]);
    expect(backend.calls).toEqual([]);
  });

  test("runs every stage and isolates a failing query", async () => {
    const { pipeline, generator } = harness({
      replies: { "enhance-input": ENHANCED, "rank-leads": RANKED },
      search: async (q) => {
        if (q === "q2") {
          throw new Error("quota exceeded");
        }
        return searchItems("https://acme.example");
      },
    });

    const result = await pipeline.run(PRODUCT);

    expect(result.phaseTrail).toEqual(["start", "enhancing", "discovering", "ranking", "done"]);
    expect(result.terminatedBy).toBe("completed");
    expect(result.state.scraped_leads).toEqual({
      q1: [{ title: "Result 1", snippet: "Snippet 1", url: "https://acme.example" }],
      q2: [],
    });
    expect(result.state.value_prop).toBe(
      "Acme CRM: A CRM for dental clinics. Key features include scheduling, billing."
    );
    expect(result.state.customer_profile).toBe("Ideal customers include businesses in healthcare.");
    expect(result.state.ranked_leads).toEqual({
      high_priority: [{ company: "Acme Dental", url: "https://acme.example", reason: "multi-site" }],
      medium_priority: [],
      low_priority: [],
    });
    expect(result.state.messages).toEqual([ENHANCED, RANKED]);

    const rankPrompt = generator.calls.find((call) => call.action === "rank-leads")?.prompt ?? "";
    expect(rankPrompt).toContain('"q2": []');
    expect(rankPrompt).toContain('"url": "https://acme.example"');
  });

  test("a failing enhance stage degrades to empty lists and ends the run", async () => {
    const { pipeline, generator } = harness({ replies: { "enhance-input": new Error("model unavailable") } });

    const result = await pipeline.run(PRODUCT);

    expect(result.terminatedBy).toBe("no-search-queries");
    expect(result.state.search_queries).toEqual([]);
    expect(result.state.business_domains).toEqual([]);
    expect(result.state.messages).toEqual([]);
    expect(result.stages.enhance).toMatchObject({ status: "failed", attempts: 2 });
    expect(generator.calls).toHaveLength(2);
  });

  test("ends after discover when every query comes back empty", async () => {
    const { pipeline, generator } = harness({ replies: { "enhance-input": ENHANCED } });

    const result = await pipeline.run(PRODUCT);

    expect(result.terminatedBy).toBe("no-candidates");
    expect(result.phaseTrail).toEqual(["start", "enhancing", "discovering", "done"]);
    expect(result.state.scraped_leads).toEqual({ q1: [], q2: [] });
    expect(result.state.ranked_leads).toBeUndefined();
    expect(result.stages.rank.status).toBe("skipped");
    expect(generator.calls.map((call) => call.action)).toEqual(["enhance-input"]);
  });

  test("a failing rank stage still reports derived fields and empty buckets", async () => {
    const { pipeline } = harness({
      replies: { "enhance-input": ENHANCED, "rank-leads": new Error("rate limited") },
      search: q1Only,
    });

    const result = await pipeline.run(PRODUCT);

    expect(result.terminatedBy).toBe("completed");
    expect(result.stages.rank.status).toBe("failed");
    expect(result.state.value_prop).toBe(
      "Acme CRM: A CRM for dental clinics. Key features include scheduling, billing."
    );
    expect(result.state.ranked_leads).toEqual({ high_priority: [], medium_priority: [], low_priority: [] });
    expect(result.state.messages).toEqual([ENHANCED]);
  });

  test("unstructured rank output yields empty buckets without failing the stage", async () => {
    const { pipeline } = harness({
      replies: { "enhance-input": ENHANCED, "rank-leads": "I could not rank these." },
      search: q1Only,
    });

    const result = await pipeline.run(PRODUCT);

    expect(result.stages.rank.status).toBe("succeeded");
    expect(result.state.ranked_leads).toEqual({ high_priority: [], medium_priority: [], low_priority: [] });
    expect(result.state.messages).toEqual([ENHANCED, "I could not rank these."]);
  });

  test("an exhausted run budget skips the model entirely", async () => {
    const { pipeline, generator } = harness({
      replies: { "enhance-input": ENHANCED },
      options: { maxTotalMs: 0 },
    });

    const result = await pipeline.run(PRODUCT);

    expect(result.terminatedBy).toBe("no-search-queries");
    expect(result.stages.enhance).toMatchObject({ status: "failed", attempts: 0 });
    expect(generator.calls).toEqual([]);
  });

  test("rejects invalid input before any stage runs", async () => {
    const { pipeline, generator } = harness({ replies: { "enhance-input": ENHANCED } });

    const error = await pipeline.run({ product_name: "  ", description: "x" }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InputValidationError);
    expect(error instanceof InputValidationError && error.issues).toEqual([
      "product_name: product_name must not be empty",
    ]);
    expect(generator.calls).toEqual([]);
  });

  test("caller cancellation rejects and archives nothing", async () => {
    const { pipeline, auditStore } = harness({
      replies: { "enhance-input": (request) => untilAborted(request.signal) },
    });
    const controller = new AbortController();

    const pending = pipeline.run(PRODUCT, { signal: controller.signal });
    controller.abort(new Error("client disconnected"));

    await expect(pending).rejects.toBeInstanceOf(PipelineCancelledError);
    expect(auditStore.rows).toEqual([]);
  });

  test("archives every completed run under its run id", async () => {
    const { pipeline, auditStore } = harness({ replies: { "enhance-input": '{"search_queries": []}' } });

    const result = await pipeline.run(PRODUCT, { runId: "run-fixed" });

    expect(result.runId).toBe("run-fixed");
    expect(auditStore.rows).toEqual([
      {
        trace_id: "run-fixed",
        product_name: "Acme CRM",
        description: "A CRM for dental clinics",
        features: ["scheduling", "billing"],
        competitors: ["DentiSoft"],
        search_queries: [],
        business_domains: [],
        scraped_leads: {},
        ranked_leads: {},
        messages: ['{"search_queries": []}'],
        evaluation_status: "pending",
      },
    ]);
  });

  test("an audit failure does not fail the run", async () => {
    const { pipeline, auditStore } = harness({ replies: { "enhance-input": '{"search_queries": []}' } });
    auditStore.failInsert = true;

    await expect(pipeline.run(PRODUCT)).resolves.toMatchObject({ terminatedBy: "no-search-queries" });
  });

  test("invocations do not share state", async () => {
    const { pipeline } = harness({
      replies: { "enhance-input": ENHANCED, "rank-leads": RANKED },
      search: q1Only,
    });

    const [first, second] = await Promise.all([
      pipeline.run(PRODUCT),
      pipeline.run({ ...PRODUCT, product_name: "Beta ERP" }),
    ]);

    expect(first.runId).not.toBe(second.runId);
    expect(first.state.product_name).toBe("Acme CRM");
    expect(second.state.product_name).toBe("Beta ERP");
    expect(second.state.messages).toEqual([ENHANCED, RANKED]);
  });
});

describe("deep scrape", () => {
  const pages = {
    "https://search.example/search?q=q1":
      '<html><body><li class="b_algo"><h2><a href="https://acme.example/">Acme</a></h2></li></body></html>',
    "https://acme.example/":
      "<html><head><title>Acme</title></head><body><p>Dental software for clinics.</p></body></html>",
  };

  test("fallback mode turns rendered pages into candidates when search is empty", async () => {
    const { pipeline } = harness({
      replies: { "enhance-input": '{"search_queries": ["q1"]}', "rank-leads": RANKED },
      pages,
      options: { deepScrape: "fallback" },
    });

    const result = await pipeline.run(PRODUCT);

    expect(result.terminatedBy).toBe("completed");
    expect(result.state.scraped_leads).toEqual({
      q1: [{ title: "Acme", snippet: "Dental software for clinics.", url: "https://acme.example/" }],
    });
    expect(result.state.scraped_pages).toEqual([
      { url: "https://acme.example/", title: "Acme", text: "Dental software for clinics." },
    ]);
  });

  test("fallback mode leaves search results alone when search found candidates", async () => {
    const { pipeline } = harness({
      replies: { "enhance-input": '{"search_queries": ["q1"]}', "rank-leads": RANKED },
      search: q1Only,
      pages,
      options: { deepScrape: "fallback" },
    });

    const result = await pipeline.run(PRODUCT);

    expect(result.state.scraped_leads).toEqual({
      q1: [{ title: "Result 1", snippet: "Snippet 1", url: "https://acme.example" }],
    });
    expect(result.state.scraped_pages).toBeUndefined();
  });

  test("always mode keeps search results and adds the pages", async () => {
    const { pipeline } = harness({
      replies: { "enhance-input": '{"search_queries": ["q1"]}', "rank-leads": RANKED },
      search: q1Only,
      pages,
      options: { deepScrape: "always" },
    });

    const result = await pipeline.run(PRODUCT);

    expect(result.state.scraped_leads?.q1).toHaveLength(1);
    expect(result.state.scraped_pages?.map((page) => page.url)).toEqual(["https://acme.example/"]);
  });
});

describe("discover stage deadlines", () => {
  const tightDiscover = (timeoutMs: number): Partial<PipelineOptions> => ({
    deepScrape: "always",
    stages: {
      enhance: { timeoutMs: 5_000, maxAttempts: 1 },
      discover: { timeoutMs, maxAttempts: 1 },
      rank: { timeoutMs: 5_000, maxAttempts: 1 },
    },
  });

  test("a browser that never finishes still leaves the search results for rank", async () => {
    const browser = new HangingBrowserSession();
    const { pipeline, generator } = harness({
      replies: { "enhance-input": ENHANCED, "rank-leads": RANKED },
      search: async () => searchItems("https://acme.example"),
      browser,
      options: tightDiscover(200),
    });

    const result = await pipeline.run(PRODUCT);

    expect(result.terminatedBy).toBe("completed");
    expect(result.stages.discover.status).toBe("succeeded");
    expect(result.state.scraped_leads).toEqual({
      q1: [{ title: "Result 1", snippet: "Snippet 1", url: "https://acme.example" }],
      q2: [{ title: "Result 1", snippet: "Snippet 1", url: "https://acme.example" }],
    });
    expect(result.state.scraped_pages).toBeUndefined();
    expect(browser.rendered.length).toBeGreaterThan(0);
    expect(generator.calls.map((call) => call.action)).toEqual(["enhance-input", "rank-leads"]);
  });

  test("a discover stage that times out keys every query to an empty list", async () => {
    const { pipeline } = harness({
      replies: { "enhance-input": ENHANCED },
      search: async (_q, _count, signal) => untilAborted(signal),
      options: { ...tightDiscover(50), deepScrape: "off" },
    });

    const result = await pipeline.run(PRODUCT);

    expect(result.stages.discover).toMatchObject({ status: "failed", attempts: 1 });
    expect(result.terminatedBy).toBe("no-candidates");
    expect(result.state.scraped_leads).toEqual({ q1: [], q2: [] });
  });
});

describe("run artifacts", () => {
  test("writes stage outputs, the ledger and a summary under the run directory", async () => {
    const workDir = mkdtempSync(join(tmpdir(), "prospector-run-"));
    const { pipeline } = harness({
      replies: { "enhance-input": ENHANCED, "rank-leads": RANKED },
      search: q1Only,
      options: { workDir },
    });

    const result = await pipeline.run(PRODUCT, { runId: "run-artifacts" });
    const runDirectory = join(workDir, "run-artifacts");

    for (const name of ["enhance-output.json", "search-results.json", "ranked-leads.json", "summary.json"]) {
      expect(existsSync(join(runDirectory, name))).toBe(true);
    }
    expect(existsSync(join(runDirectory, "raw-pages.json"))).toBe(false);

    const summary: unknown = JSON.parse(readFileSync(join(runDirectory, "summary.json"), "utf-8"));
    expect(summary).toMatchObject({ runId: "run-artifacts", terminatedBy: "completed", candidates: 1 });

    const ledger: unknown = JSON.parse(readFileSync(join(runDirectory, "run-state.json"), "utf-8"));
    expect(ledger).toMatchObject({
      terminatedBy: "completed",
      phaseTrail: result.phaseTrail,
      artifacts: [
        join(runDirectory, "enhance-output.json"),
        join(runDirectory, "search-results.json"),
        join(runDirectory, "ranked-leads.json"),
        join(runDirectory, "summary.json"),
      ],
    });
  });
});

describe("validateProductInput", () => {
  test("defaults missing lists and keeps values as given", () => {
    expect(validateProductInput({ product_name: " Acme ", description: "CRM", features: null })).toEqual({
      product_name: " Acme ",
      description: "CRM",
      features: [],
      competitors: [],
    });
  });

  test("lists every problem", () => {
    const error = (() => {
      try {
        validateProductInput({ description: 3, features: "x" });
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(InputValidationError);
    expect(error instanceof InputValidationError && error.issues).toEqual([
      "product_name: product_name is required",
      "description: Expected string, received number",
      "features: Expected array, received string",
    ]);
  });
});
