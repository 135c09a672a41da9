#!/usr/bin/env node
import "dotenv/config";
import { randomUUID } from "crypto";
import { join } from "path";
import { parseArgs } from "util";
import { readJsonFile } from "../lib/json.js";
import { runDir } from "../lib/paths.js";
import { DEEP_SCRAPE_MODES, LOG_FORMATS, loadProspectorConfig } from "../pipeline/config.js";
import { ConfigError, InputValidationError, PipelineCancelledError } from "../pipeline/errors.js";
import { initializeEventEmitter } from "../pipeline/events.js";
import { createProspectorServices } from "../pipeline/factory.js";
import { isJsonObject } from "../parse/json-scan.js";
import type { DeepScrapeMode, LogFormat } from "../pipeline/types.js";

interface RunCliArgs {
  input: Record<string, unknown>;
  runId: string;
  workDir?: string;
  deepScrape?: DeepScrapeMode;
  resultsPerQuery?: number;
  verbose: boolean;
  logFormat?: LogFormat;
}

function parseCliArgs(argv: string[]): RunCliArgs {
  const parsed = parseArgs({
    args: argv,
    options: {
      "product-name": { type: "string" },
      description: { type: "string" },
      feature: { type: "string", multiple: true },
      competitor: { type: "string", multiple: true },
      input: { type: "string" },
      "run-id": { type: "string" },
      "work-dir": { type: "string" },
      "deep-scrape": { type: "string" },
      "results-per-query": { type: "string" },
      verbose: { type: "boolean" },
      "log-format": { type: "string" },
    },
    allowPositionals: false,
  });
  const values = parsed.values;

  const input: Record<string, unknown> = {};
  if (values.input) {
    const fromFile = readJsonFile(values.input);
    if (!isJsonObject(fromFile)) {
      throw new InputValidationError(`--input ${values.input} must contain a JSON object`);
    }
    Object.assign(input, fromFile);
  }
  if (values["product-name"] !== undefined) input.product_name = values["product-name"];
  if (values.description !== undefined) input.description = values.description;
  if (values.feature !== undefined) input.features = values.feature;
  if (values.competitor !== undefined) input.competitors = values.competitor;

  return {
    input,
    runId: values["run-id"] ?? createRunId(),
    workDir: values["work-dir"],
    deepScrape: parseChoice("--deep-scrape", values["deep-scrape"], DEEP_SCRAPE_MODES),
    resultsPerQuery: parsePositiveInt("--results-per-query", values["results-per-query"]),
    verbose: values.verbose ?? false,
    logFormat: parseChoice("--log-format", values["log-format"], LOG_FORMATS),
  };
}

function parseChoice<T extends string>(flag: string, value: string | undefined, choices: readonly T[]): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new ConfigError(`${flag} must be one of ${choices.join(", ")}, got: ${value}`);
  }
  return match;
}

function parsePositiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`${flag} must be a positive integer, got: ${value}`);
  }
  return parsed;
}

function createRunId(): string {
  const now = new Date().toISOString().replace(/[.:]/g, "-");
  return `${now}-${randomUUID().slice(0, 8)}`;
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadProspectorConfig();
  if (args.workDir) config.pipeline.workDir = args.workDir;
  if (args.deepScrape) config.pipeline.deepScrape = args.deepScrape;
  if (args.resultsPerQuery) config.pipeline.resultsPerQuery = args.resultsPerQuery;

  const workDir = config.pipeline.workDir;
  const runDirectory = workDir ? runDir(workDir, args.runId) : undefined;
  initializeEventEmitter({
    runId: args.runId,
    format: args.logFormat ?? config.log.format,
    verbose: args.verbose || config.log.verbose,
    agentLogs: config.log.agentLogs,
    eventsLogPath: runDirectory ? join(runDirectory, "events.log") : undefined,
    eventFilePath: runDirectory ? join(runDirectory, "events.jsonl") : undefined,
  });

  const { pipeline } = createProspectorServices(config);
  const controller = new AbortController();
  const onSignal = () => controller.abort(new Error("interrupted"));
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const result = await pipeline.run(args.input, { runId: args.runId, signal: controller.signal });
    console.log(JSON.stringify({ run_id: result.runId, terminated_by: result.terminatedBy, ...result.state }, null, 2));
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await pipeline.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof InputValidationError || error instanceof ConfigError) {
    console.error(`Pipeline not started: ${error.message}`);
    process.exit(2);
  }
  if (error instanceof PipelineCancelledError) {
    console.error(`Pipeline cancelled: ${error.message}`);
    process.exit(130);
  }
  console.error("Pipeline failed:", error);
  process.exit(1);
});
