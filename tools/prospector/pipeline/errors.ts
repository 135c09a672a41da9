export class PipelineError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, options: { code: string; retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
  }
}

export class NetworkError extends PipelineError {
  constructor(message: string, cause?: unknown, retryable = true) {
    super(message, { code: "NETWORK_ERROR", retryable, cause });
  }
}

export class SearchBackendError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "SEARCH_FAILED", retryable: false, cause });
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(message, { code: "CONFIG_MISSING", retryable: false });
  }
}

export class InputValidationError extends PipelineError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, { code: "INPUT_INVALID", retryable: false });
  }
}

export class StepTimeoutError extends PipelineError {
  constructor(step: string, timeoutMs: number) {
    super(`Step ${step} timed out after ${timeoutMs}ms`, {
      code: "STEP_TIMEOUT",
      retryable: true,
    });
  }
}

export class PipelineCancelledError extends PipelineError {
  constructor(where: string, cause?: unknown) {
    super(`Pipeline invocation cancelled during ${where}`, {
      code: "CANCELLED",
      retryable: false,
      cause,
    });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
