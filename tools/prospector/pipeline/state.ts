import { join } from "path";
import { writeJsonAtomic } from "../lib/json.js";
import { errorMessage } from "./errors.js";
import { emitAgentEvent } from "./events.js";
import type { PipelinePhase, RunState, StepName, StepState, StepStatus } from "./types.js";
import { STEP_ORDER } from "./types.js";

const RUN_STATE_VERSION = "1.0.0";

export function runStatePath(runDirectory: string): string {
  return join(runDirectory, "run-state.json");
}

function createInitialStepState(): StepState {
  return {
    status: "pending",
    attempts: 0,
    history: [],
  };
}

function createInitialStepStatuses(): Record<StepName, StepState> {
  return {
    enhance: createInitialStepState(),
    discover: createInitialStepState(),
    rank: createInitialStepState(),
  };
}

/**
 * Per-invocation ledger of stage statuses and phase transitions. When a path
 * is given every change is mirrored to disk; a failed write is logged and
 * does not affect the run.
 */
export class RunStateStore {
  public state: RunState;

  constructor(
    public readonly path: string | undefined,
    state: RunState
  ) {
    this.state = state;
  }

  static create(input: { runId: string; productName: string; path?: string }): RunStateStore {
    const store = new RunStateStore(input.path, {
      version: RUN_STATE_VERSION,
      runId: input.runId,
      productName: input.productName,
      startedAt: new Date().toISOString(),
      phase: "start",
      phaseTrail: ["start"],
      stepStatuses: createInitialStepStatuses(),
      artifacts: [],
    });
    store.persist();
    return store;
  }

  persist(): void {
    if (!this.path) {
      return;
    }
    try {
      writeJsonAtomic(this.path, this.state);
    } catch (error) {
      emitAgentEvent({
        level: "warn",
        eventType: "state.update",
        message: "Run state could not be persisted",
        phase: "fail",
        path: this.path,
        errorMessage: errorMessage(error),
      });
    }
  }

  enterPhase(phase: PipelinePhase): void {
    this.state.phase = phase;
    this.state.phaseTrail.push(phase);
    this.persist();
  }

  markStepStatus(step: StepName, status: StepStatus, message?: string): void {
    const target = this.state.stepStatuses[step];
    const now = new Date().toISOString();
    target.status = status;
    if (!target.startedAt && status === "running") {
      target.startedAt = now;
    }
    if (status === "succeeded" || status === "failed" || status === "skipped") {
      target.endedAt = now;
    }
    if (status === "skipped") {
      target.message = message ?? "Skipped";
      target.messageUpdatedAt = now;
    }
    this.persist();
  }

  markStepAttemptStart(step: StepName, attempt: number): void {
    const target = this.state.stepStatuses[step];
    const now = new Date().toISOString();
    target.status = "running";
    target.attempts = Math.max(target.attempts, attempt);
    target.message = `Running attempt ${attempt}`;
    target.messageUpdatedAt = now;
    if (!target.startedAt) {
      target.startedAt = now;
    }
    target.history.push({
      attempt,
      startedAt: now,
      status: "running",
    });
    this.persist();
  }

  markStepAttemptResult(
    step: StepName,
    attempt: number,
    ok: boolean,
    errorCode?: string,
    errorMessage?: string
  ): void {
    const target = this.state.stepStatuses[step];
    const now = new Date().toISOString();
    const record = [...target.history].reverse().find((item) => item.attempt === attempt);

    if (record) {
      record.endedAt = now;
      record.status = ok ? "succeeded" : "failed";
      if (!ok) {
        record.errorCode = errorCode;
        record.errorMessage = errorMessage;
      }
    }

    target.status = ok ? "succeeded" : "failed";
    target.message = ok
      ? `Succeeded on attempt ${attempt}`
      : `Failed on attempt ${attempt}: ${errorMessage ?? "unknown error"}`;
    target.messageUpdatedAt = now;
    target.lastErrorCode = ok ? undefined : errorCode;
    target.lastErrorMessage = ok ? undefined : errorMessage;
    target.endedAt = now;

    this.persist();
  }

  setStepMessage(step: StepName, message: string): void {
    const target = this.state.stepStatuses[step];
    target.message = message;
    target.messageUpdatedAt = new Date().toISOString();
    this.persist();
    emitAgentEvent({
      level: "info",
      eventType: "state.update",
      step,
      attempt: target.attempts,
      message: "Step message updated",
      action: message,
    });
  }

  /** Stages the run never reached are recorded as skipped. */
  skipPending(reason: string): void {
    for (const step of STEP_ORDER) {
      if (this.state.stepStatuses[step].status === "pending") {
        this.markStepStatus(step, "skipped", reason);
      }
    }
  }

  addArtifact(path: string): void {
    if (!this.state.artifacts.includes(path)) {
      this.state.artifacts.push(path);
      this.persist();
    }
  }

  markFinished(terminatedBy: string): void {
    this.state.terminatedBy = terminatedBy;
    this.state.finishedAt = new Date().toISOString();
    this.persist();
  }
}
