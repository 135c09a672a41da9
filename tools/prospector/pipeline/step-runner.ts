import type { BudgetManager } from "./budget.js";
import { PipelineCancelledError, PipelineError, StepTimeoutError, isAbortError } from "./errors.js";
import type { Logger } from "./logger.js";
import { calculateBackoffMs, linkedTimeout, wait } from "./retry.js";
import type { RunStateStore } from "./state.js";
import { runWithTelemetryContext } from "./telemetry-context.js";
import type { StepName } from "./types.js";

const PROGRESS_HEARTBEAT_MS = 15_000;

export interface StepDefinition<TContext, TResult> {
  name: StepName;
  timeoutMs: number;
  maxAttempts: number;
  run: (context: TContext, signal: AbortSignal) => Promise<TResult>;
}

export interface StepRunnerContext {
  runId: string;
  logger: Logger;
  stateStore: RunStateStore;
  budget: BudgetManager;
  signal?: AbortSignal;
}

export interface StepRunOptions {
  backoffBaseMs?: number;
}

export type StepRunResult<TResult> =
  | { ok: true; value: TResult; attempts: number }
  | { ok: false; error: PipelineError; attempts: number };

/**
 * Runs one stage with a per-attempt timeout (capped by the remaining run
 * budget), bounded retries for retryable errors, and a status ledger entry
 * per attempt. Exhaustion is returned as `{ ok: false }`; only caller
 * cancellation throws.
 */
export async function runStep<TContext extends StepRunnerContext, TResult>(
  step: StepDefinition<TContext, TResult>,
  context: TContext,
  options: StepRunOptions = {}
): Promise<StepRunResult<TResult>> {
  const { stateStore: store } = context;
  const logger = context.logger.child({ step: step.name });
  const maxAttempts = Math.max(1, step.maxAttempts);
  let lastError: PipelineError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    throwIfCancelled(step.name, context.signal);

    const effectiveTimeoutMs = context.budget.effectiveStepTimeout(step.timeoutMs);
    if (effectiveTimeoutMs <= 0) {
      const exceeded = new PipelineError(`No budget remaining before step ${step.name}`, {
        code: "BUDGET_EXCEEDED",
        retryable: false,
      });
      store.markStepStatus(step.name, "failed");
      store.setStepMessage(step.name, exceeded.message);
      logger.error("Step not started; run budget exhausted", {
        attempt,
        eventType: "budget.enforced",
        errorCode: exceeded.code,
      });
      return { ok: false, error: exceeded, attempts: attempt - 1 };
    }

    store.markStepAttemptStart(step.name, attempt);
    logger.info("Step attempt started", {
      attempt,
      eventType: "step.lifecycle",
      phase: "start",
      timeoutMs: effectiveTimeoutMs,
    });

    const guard = linkedTimeout(effectiveTimeoutMs, context.signal);
    const startedAt = Date.now();
    const heartbeat = setInterval(() => {
      logger.debug("Step still running", {
        attempt,
        eventType: "step.lifecycle",
        phase: "progress",
        elapsedSec: Math.floor((Date.now() - startedAt) / 1000),
        action: store.state.stepStatuses[step.name].message,
      });
    }, PROGRESS_HEARTBEAT_MS);

    try {
      const value = await runWithTelemetryContext({ runId: context.runId, step: step.name, attempt }, () =>
        untilAborted(step.run(context, guard.signal), guard.signal)
      );
      store.markStepAttemptResult(step.name, attempt, true);
      logger.info("Step attempt succeeded", {
        attempt,
        eventType: "step.lifecycle",
        phase: "end",
        durationMs: Date.now() - startedAt,
      });
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (context.signal?.aborted) {
        const cancelled = new PipelineCancelledError(step.name, error);
        store.markStepAttemptResult(step.name, attempt, false, cancelled.code, cancelled.message);
        logger.warn("Step cancelled by caller", {
          attempt,
          eventType: "step.lifecycle",
          phase: "fail",
          errorCode: cancelled.code,
        });
        throw cancelled;
      }

      const wrapped = normalizeStepError(step.name, effectiveTimeoutMs, guard.timedOut(), error);
      lastError = wrapped;
      store.markStepAttemptResult(step.name, attempt, false, wrapped.code, wrapped.message);
      logger.warn("Step attempt failed", {
        attempt,
        eventType: "step.lifecycle",
        phase: "fail",
        errorCode: wrapped.code,
        errorMessage: wrapped.message,
        retryable: wrapped.retryable,
      });

      if (attempt >= maxAttempts || !wrapped.retryable) {
        logger.error("Step exhausted retries", {
          attempt,
          eventType: "retry",
          errorCode: wrapped.code,
          errorMessage: wrapped.message,
        });
        return { ok: false, error: wrapped, attempts: attempt };
      }

      const backoffMs = calculateBackoffMs(attempt, options.backoffBaseMs);
      store.setStepMessage(step.name, `Waiting ${backoffMs}ms before retry`);
      logger.info("Retrying step with backoff", {
        attempt,
        eventType: "retry",
        backoffMs,
      });
      try {
        await wait(backoffMs, context.signal);
      } catch (waitError) {
        throw new PipelineCancelledError(step.name, waitError);
      }
    } finally {
      clearInterval(heartbeat);
      guard.dispose();
    }
  }

  return {
    ok: false,
    error: lastError ?? new PipelineError(`Step ${step.name} did not run`, { code: "STEP_ERROR" }),
    attempts: maxAttempts,
  };
}

function throwIfCancelled(step: StepName, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(step, signal.reason);
  }
}

/** Rejects as soon as `signal` aborts, even if `work` ignores the signal. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function normalizeStepError(
  step: StepName,
  timeoutMs: number,
  timedOut: boolean,
  error: unknown
): PipelineError {
  if (timedOut) {
    return new StepTimeoutError(step, timeoutMs);
  }

  if (error instanceof PipelineError) {
    return error;
  }

  if (isAbortError(error)) {
    return new StepTimeoutError(step, timeoutMs);
  }

  return new PipelineError(error instanceof Error ? error.message : String(error), {
    code: "STEP_ERROR",
    retryable: true,
    cause: error,
  });
}
