import { emitAgentEvent } from "../pipeline/events.js";
import { PipelineError } from "../pipeline/errors.js";
import { linkedTimeout } from "../pipeline/retry.js";

export interface ModelCallOptions {
  maxModelMs: number;
  /** Caller cancellation; forwarded to the call alongside the timeout. */
  signal?: AbortSignal;
}

/**
 * Runs one model call under `maxModelMs`. The call receives a signal that
 * aborts on timeout or caller cancellation. Expiry surfaces as a retryable
 * `MODEL_TIMEOUT`; caller cancellation rethrows as is.
 */
export async function runModelText<T>(
  action: string,
  op: (signal: AbortSignal) => Promise<T>,
  options: ModelCallOptions
): Promise<T> {
  const startedAt = Date.now();
  emitAgentEvent({
    level: "info",
    eventType: "model.lifecycle",
    message: "Model call started",
    phase: "start",
    action,
    timeoutMs: options.maxModelMs,
  });

  const guard = linkedTimeout(options.maxModelMs, options.signal);
  try {
    const result = await op(guard.signal);
    emitAgentEvent({
      level: "info",
      eventType: "model.lifecycle",
      message: "Model call completed",
      phase: "end",
      action,
      durationMs: Date.now() - startedAt,
    });
    return result;
  } catch (error) {
    const failure =
      guard.timedOut() && !options.signal?.aborted
        ? new PipelineError(`Model call timed out for ${action} after ${options.maxModelMs}ms`, {
            code: "MODEL_TIMEOUT",
            retryable: true,
            cause: error,
          })
        : error;
    emitAgentEvent({
      level: "error",
      eventType: "model.lifecycle",
      message: "Model call failed",
      phase: "fail",
      action,
      durationMs: Date.now() - startedAt,
      errorCode: failure instanceof PipelineError ? failure.code : "MODEL_CALL_FAILED",
      errorMessage: failure instanceof Error ? failure.message : String(failure),
    });
    throw failure;
  } finally {
    guard.dispose();
  }
}
