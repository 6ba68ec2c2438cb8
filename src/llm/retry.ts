// ── Retry with Exponential Backoff ───────────────────────────────────

import { log } from "../logger.js";

export interface RetryOptions {
  /** Max number of retry attempts (default: 2) */
  maxRetries?: number;
  /** Base delay in ms (default: 500), doubled on each retry */
  baseDelayMs?: number;
  /** HTTP status codes that trigger a retry */
  retryableStatuses?: number[];
  /** Label for logging (e.g. "classifier") */
  label?: string;
  /** Injected in tests to skip real waiting */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 2,
  baseDelayMs: 500,
  retryableStatuses: [408, 429, 500, 502, 503, 504],
  label: "LLM call",
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Run `fn`, retrying network errors and retryable HTTP statuses.
 * Anything else is rethrown immediately; the last error is rethrown once
 * retries are exhausted.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const { maxRetries, baseDelayMs, retryableStatuses, label, sleep } = {
    ...DEFAULT_OPTIONS,
    ...opts,
  };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= maxRetries || !isRetryable(error, retryableStatuses)) {
        throw error;
      }

      const delayMs = baseDelayMs * 2 ** attempt;
      log.warn(
        {
          label,
          status: getStatusCode(error),
          delayMs,
          attempt: attempt + 1,
          maxRetries,
        },
        "⚠️ Retrying API call",
      );
      await sleep(delayMs);
    }
  }
}

// ── Helpers ──────────────────────────────────────────────

export function isRetryable(error: unknown, retryableStatuses: number[]): boolean {
  // fetch failures surface as TypeError
  if (error instanceof TypeError) return true;
  if (error instanceof Error && /ECONNRESET|ETIMEDOUT|ECONNREFUSED/.test(error.message)) {
    return true;
  }

  const status = getStatusCode(error);
  return status !== undefined && retryableStatuses.includes(status);
}

export function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  // OpenAI SDK errors carry `status`; some HTTP clients use `statusCode`
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}
