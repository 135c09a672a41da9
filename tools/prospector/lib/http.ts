import { NetworkError, isAbortError } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import { linkedTimeout } from "../pipeline/retry.js";

export interface FetchTextOptions {
  timeoutMs: number;
  maxBytes: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

export interface FetchTextResult {
  status: number;
  contentType?: string;
  bytesRead: number;
  body: string;
  finalUrl: string;
}

const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; prospector/0.1)";

/**
 * GET `url` and return its body as text. Non-2xx responses, oversized
 * bodies and timeouts reject with a {@link NetworkError}; 429 and 5xx are
 * marked retryable. Aborts coming from `options.signal` are rethrown as-is.
 */
export async function fetchTextWithLimits(
  url: string,
  options: FetchTextOptions
): Promise<FetchTextResult> {
  const startedAt = Date.now();
  emitAgentEvent({
    level: "debug",
    eventType: "http.request",
    message: "HTTP request start",
    phase: "start",
    action: "GET",
    url,
  });

  const guard = linkedTimeout(options.timeoutMs, options.signal);

  try {
    const response = await fetch(url, {
      headers: {
        "User-Agent": DEFAULT_USER_AGENT,
        ...options.headers,
      },
      redirect: "follow",
      signal: guard.signal,
    });

    const contentType = response.headers.get("content-type") ?? undefined;

    if (!response.ok) {
      const retryable = response.status === 429 || response.status >= 500;
      throw new NetworkError(
        `HTTP ${response.status} ${response.statusText} for ${stripQuery(url)}`,
        undefined,
        retryable
      );
    }

    const buffer = await response.arrayBuffer();
    const bytesRead = buffer.byteLength;
    if (bytesRead > options.maxBytes) {
      throw new NetworkError(
        `Response too large for ${stripQuery(url)}: ${bytesRead} bytes > ${options.maxBytes} bytes`,
        undefined,
        false
      );
    }

    const body = new TextDecoder("utf-8", { fatal: false }).decode(new Uint8Array(buffer));

    emitAgentEvent({
      level: "info",
      eventType: "http.response",
      message: "HTTP request success",
      phase: "end",
      durationMs: Date.now() - startedAt,
      statusCode: response.status,
      bytes: bytesRead,
    });

    return {
      status: response.status,
      contentType,
      bytesRead,
      body,
      finalUrl: response.url,
    };
  } catch (error) {
    if (guard.timedOut()) {
      emitAgentEvent({
        level: "warn",
        eventType: "http.response",
        message: "HTTP request timed out",
        phase: "fail",
        durationMs: Date.now() - startedAt,
        errorMessage: `Timed out after ${options.timeoutMs}ms`,
      });
      throw new NetworkError(`Timed out after ${options.timeoutMs}ms: ${stripQuery(url)}`, error, true);
    }

    if (options.signal?.aborted && isAbortError(error)) {
      throw error;
    }

    const wrapped =
      error instanceof NetworkError ? error : new NetworkError(`Request failed for ${stripQuery(url)}: ${String(error)}`, error);
    emitAgentEvent({
      level: "warn",
      eventType: "http.response",
      message: "HTTP request failed",
      phase: "fail",
      durationMs: Date.now() - startedAt,
      errorMessage: wrapped.message,
      retryable: wrapped.retryable,
    });
    throw wrapped;
  } finally {
    guard.dispose();
  }
}

function stripQuery(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return url;
  }
}
