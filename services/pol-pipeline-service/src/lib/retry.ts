// =================================================================================
// Retry Utilities - Timeout and Exponential Backoff for External API Calls
// =================================================================================

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Backoff configuration shared by the catalog and acquisitions clients
 */
export interface BackoffConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt in ms */
  baseDelayMs: number;
  /** Upper bound for any single delay in ms */
  maxDelayMs: number;
  /** Fraction of the delay added as random jitter (0 disables) */
  jitter: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5000,
  jitter: 0.3
};

/**
 * HTTP statuses worth another attempt
 */
export const RETRYABLE_STATUSES = [408, 429, 500, 502, 503, 504];

export class TimeoutError extends Error {
  name = "TimeoutError";

  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request timed out after ${timeoutMs}ms: ${url}`);
  }
}

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });

/**
 * Delay before the given retry (attempt is 1 for the first retry)
 */
export function computeBackoff(attempt: number, config: BackoffConfig, random: () => number = Math.random): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = config.jitter > 0 ? random() * config.jitter * exponential : 0;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.includes(status);
}

/**
 * Fetch with a per-request timeout. The timeout aborts only this request;
 * run cancellation is not wired in so an in-flight call always settles.
 */
export async function fetchWithTimeout(
  fetchImpl: typeof fetch,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchImpl(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new TimeoutError(url, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
