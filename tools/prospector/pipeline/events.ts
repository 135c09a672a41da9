import { appendFileSync } from "fs";
import { dirname } from "path";
import { ensureDir } from "../lib/json.js";
import { getTelemetryContext } from "./telemetry-context.js";
import type { AgentEvent, EventType, LogRuntimeConfig } from "./types.js";

export type LogLevel = AgentEvent["level"];

export interface EmitInput {
  level: LogLevel;
  message: string;
  eventType?: EventType;
  step?: AgentEvent["step"];
  attempt?: number;
  phase?: AgentEvent["phase"];
  [key: string]: unknown;
}

const ENVELOPE_KEYS = new Set(["ts", "runId", "level", "step", "attempt", "eventType", "message", "phase"]);
const CONDENSED_EXTRAS = ["query", "statusCode", "durationMs", "backoffMs", "errorCode", "retryable", "reason"];
const MAX_STRING_CHARS = 240;
const MAX_PARAM_CHARS = 40;
const SAFE_URL_PARAMS = new Set(["q", "page", "id", "lang"]);
const SENSITIVE_KEY = /^key$|token|api_?key|secret|password|authorization|cookie/;

/**
 * How much of each event type reaches a non-verbose terminal:
 * `all` always, `milestones` everything but heartbeats, `quiet` only
 * warnings and failures. Errors always print and debug never does.
 */
type TerminalPolicy = "all" | "milestones" | "quiet";

const TERMINAL_POLICY: Record<EventType, TerminalPolicy> = {
  reasoning: "all",
  "step.lifecycle": "milestones",
  "model.lifecycle": "milestones",
  "search.query": "quiet",
  "search.batch": "all",
  "browser.lifecycle": "quiet",
  "page.discover": "quiet",
  "page.fetch": "quiet",
  "http.request": "quiet",
  "http.response": "quiet",
  "file.read": "quiet",
  "file.write": "quiet",
  retry: "all",
  "state.update": "quiet",
  validation: "all",
  summary: "all",
  "budget.enforced": "all",
  "provider.lifecycle": "all",
  "parse.result": "quiet",
  "pipeline.transition": "all",
  "pipeline.skip": "all",
  "audit.persist": "all",
  "artifact.persist": "quiet",
  "server.request": "all",
};

class EventLog {
  constructor(private readonly config: LogRuntimeConfig) {}

  emit(input: EmitInput): void {
    const context = getTelemetryContext();
    const { level, message, ...extras } = input;
    const event = redactEvent({
      ...extras,
      ts: new Date().toISOString(),
      runId: context.runId ?? this.config.runId,
      level,
      step: input.step ?? context.step,
      attempt: input.attempt ?? context.attempt,
      eventType: input.eventType ?? "step.lifecycle",
      message,
      phase: input.phase,
    });

    if (this.config.agentLogs && shouldPrintToTerminal(event, this.config.verbose)) {
      const line = this.terminalLine(event);
      if (event.level === "error") {
        console.error(line);
      } else if (event.level === "warn") {
        console.warn(line);
      } else {
        console.log(line);
      }
    }
    if (this.config.eventsLogPath) {
      appendLine(this.config.eventsLogPath, formatPretty(event));
    }
    if (this.config.eventFilePath) {
      appendLine(this.config.eventFilePath, JSON.stringify(event));
    }
  }

  private terminalLine(event: AgentEvent): string {
    switch (this.config.format) {
      case "json":
        return JSON.stringify(event);
      case "pretty":
        return formatPretty(event);
      case "condensed":
        return formatCondensed(event);
    }
  }
}

let activeLog: EventLog | null = null;

export function initializeEventEmitter(config: LogRuntimeConfig): void {
  activeLog = new EventLog(config);
}

export function resetEventEmitter(): void {
  activeLog = null;
}

/** No-op until a sink is initialized. */
export function emitAgentEvent(input: EmitInput): void {
  activeLog?.emit(input);
}

export function shouldPrintToTerminal(event: AgentEvent, verbose: boolean): boolean {
  if (verbose || event.level === "error") {
    return true;
  }
  if (event.level === "debug") {
    return false;
  }
  switch (TERMINAL_POLICY[event.eventType]) {
    case "all":
      return true;
    case "milestones":
      return event.phase !== "progress";
    case "quiet":
      return event.level === "warn" || event.phase === "fail";
  }
}

/** `<ts> [run] [step/attempt] [eventType] message key=value...` */
export function formatPretty(event: AgentEvent): string {
  const extras = Object.entries(event)
    .filter(([key]) => key === "phase" || !ENVELOPE_KEYS.has(key))
    .filter(([, value]) => isPresent(value))
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  const prefix = `${event.ts} [${event.runId}] [${event.step}/${event.attempt}] [${event.eventType}]`;
  return joinLine(prefix, event.message, extras);
}

/** `[HH:MM:SS] step#attempt phase message key=value...` with a fixed set of extras. */
export function formatCondensed(event: AgentEvent): string {
  const time = /T(\d{2}:\d{2}:\d{2})/.exec(event.ts)?.[1] ?? event.ts;
  const phase = event.phase ? ` ${event.phase}` : "";
  const extras = CONDENSED_EXTRAS.filter((key) => isPresent(event[key])).map(
    (key) => `${key}=${JSON.stringify(event[key])}`
  );
  return joinLine(`[${time}] ${event.step}#${event.attempt}${phase}`, event.message, extras);
}

export function redactEvent(event: AgentEvent): AgentEvent {
  const redacted: AgentEvent = { ...event, message: truncate(event.message, MAX_STRING_CHARS) };
  for (const [key, value] of Object.entries(event)) {
    if (!ENVELOPE_KEYS.has(key)) {
      redacted[key] = redactValue(key, value);
    }
  }
  return redacted;
}

function redactValue(key: string, value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (SENSITIVE_KEY.test(key.toLowerCase())) {
    return "[REDACTED]";
  }
  if (typeof value === "string") {
    return /^https?:\/\//.test(value) ? safeUrl(value) : truncate(value, MAX_STRING_CHARS);
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(key, item));
  }
  if (typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([childKey, child]) => [childKey, redactValue(childKey, child)])
    );
  }
  return value;
}

/** Drops every query parameter except the few that identify a search or page. */
function safeUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return truncate(value, MAX_STRING_CHARS);
  }
  const safe = new URL(`${url.origin}${url.pathname}`);
  for (const [name, param] of url.searchParams) {
    if (SAFE_URL_PARAMS.has(name.toLowerCase())) {
      safe.searchParams.set(name, truncate(param, MAX_PARAM_CHARS));
    }
  }
  return safe.toString();
}

function truncate(value: string, max: number): string {
  return value.length <= max ? value : `${value.slice(0, max)}...[truncated]`;
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}

function joinLine(prefix: string, message: string, extras: string[]): string {
  return extras.length > 0 ? `${prefix} ${message} ${extras.join(" ")}` : `${prefix} ${message}`;
}

function appendLine(path: string, line: string): void {
  ensureDir(dirname(path));
  appendFileSync(path, `${line}\n`);
}
