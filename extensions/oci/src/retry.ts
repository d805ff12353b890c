/**
 * OCI Extension — Retry Utilities
 *
 * Exponential backoff with jitter for the REST transport. Errors the layer
 * has already classified (`OciError`) are never retried here.
 */

import { OciError, OperationCancelledError } from "./errors.js";
import type { OciRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<OciRetryOptions>;

export const OCI_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Transport and service codes that are safe to retry.
 */
export const OCI_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
  "TooManyRequests",
  "InternalServerError",
  "ServiceUnavailable",
]);

// =============================================================================
// Error Checking
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

function numberField(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === "number" ? value : undefined;
}

/**
 * Determine whether a raw transport or HTTP error is safe to retry.
 */
export function shouldRetryOciError(error: unknown): boolean {
  if (!isRecord(error)) return false;
  if (error instanceof OciError) return false;

  const code = stringField(error, "code");
  if (code && OCI_RETRYABLE_CODES.has(code)) return true;

  const statusCode = numberField(error, "statusCode") ?? numberField(error, "status");
  if (statusCode === 429) return true;
  if (statusCode !== undefined && statusCode >= 500 && statusCode < 600) return true;

  // fetch wraps socket errors; the code sits on the cause
  if (isRecord(error.cause) && OCI_RETRYABLE_CODES.has(stringField(error.cause, "code"))) return true;

  const message = stringField(error, "message").toLowerCase();
  const retryablePatterns = [
    "too many requests",
    "temporarily unavailable",
    "service unavailable",
    "connection reset",
    "socket hang up",
    "fetch failed",
    "network error",
  ];
  return retryablePatterns.some((pattern) => message.includes(pattern));
}

/**
 * Extract the Retry-After header value from an error response (in ms).
 */
export function getOciRetryAfterMs(error: unknown, now: number = Date.now()): number | null {
  if (!isRecord(error) || !isRecord(error.headers)) return null;

  const retryAfter = stringField(error.headers, "retry-after");
  if (!retryAfter) return null;

  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - now);
  }

  return null;
}

// =============================================================================
// Sleeping
// =============================================================================

/**
 * Wait `ms` milliseconds, rejecting with `OperationCancelledError` as soon as
 * the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal, operation = "wait"): Promise<void> {
  if (signal?.aborted) return Promise.reject(new OperationCancelledError(operation));

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError(operation));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// =============================================================================
// Retry Execution
// =============================================================================

export function backoffDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);
  return Math.max(config.minDelayMs, cappedDelay + jitter);
}

/**
 * Execute a function with OCI retry logic.
 */
export async function withOciRetry<T>(
  fn: () => Promise<T>,
  options?: OciRetryOptions,
  signal?: AbortSignal,
): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options?.maxAttempts ?? OCI_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? OCI_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? OCI_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? OCI_RETRY_DEFAULTS.jitterFactor,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryOciError(error)) break;
      if (signal?.aborted) break;

      const retryAfterMs = getOciRetryAfterMs(error);
      const delayMs = retryAfterMs !== null ? Math.min(retryAfterMs, config.maxDelayMs) : backoffDelay(attempt, config);

      await sleep(delayMs, signal, "retry");
    }
  }

  throw lastError;
}
