/**
 * Azure Resource Toolkit — Retry Utilities
 *
 * Retry with exponential backoff and jitter for Azure management reads,
 * plus the error classification shared by the managers.
 */

import type { AzureRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<AzureRetryOptions>;

export const AZURE_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Azure error codes that are safe to retry.
 */
export const AZURE_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
  "RetryableError",
]);

const NOT_FOUND_CODES = new Set(["ResourceNotFound", "ResourceGroupNotFound", "NotFound", "ParentResourceNotFound"]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "server busy",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "etimedout",
  "fetch failed",
];

// =============================================================================
// Error Inspection
// =============================================================================

function readField(error: unknown, key: string): unknown {
  if (typeof error !== "object" || error === null) return undefined;
  return Reflect.get(error, key);
}

function readString(error: unknown, ...keys: string[]): string {
  for (const key of keys) {
    const value = readField(error, key);
    if (typeof value === "string" && value) return value;
  }
  return "";
}

/** HTTP status carried by an SDK error (`statusCode` or `status`), or 0. */
export function getStatusCode(error: unknown): number {
  const value = readField(error, "statusCode") ?? readField(error, "status");
  return typeof value === "number" ? value : 0;
}

/** Service or system error code carried by an SDK error, or "". */
export function getErrorCode(error: unknown): string {
  return readString(error, "code", "Code");
}

/**
 * Whether an SDK error means the resource does not exist.
 */
export function isNotFoundError(error: unknown): boolean {
  if (getStatusCode(error) === 404) return true;
  return NOT_FOUND_CODES.has(getErrorCode(error));
}

/**
 * Determine whether an Azure error is safe to retry.
 */
export function shouldRetryAzureError(error: unknown): boolean {
  if (error === null || error === undefined) return false;

  const code = getErrorCode(error);
  if (code && AZURE_RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  const statusCode = getStatusCode(error);
  if (statusCode === 429) return true;
  if (statusCode >= 500 && statusCode < 600) return true;

  const message = readString(error, "message").toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Extract Retry-After header value from an Azure error response (in ms).
 */
export function getAzureRetryAfterMs(error: unknown): number | null {
  const headers = readField(error, "headers");
  if (typeof headers !== "object" || headers === null) return null;

  const retryAfter = readField(headers, "retry-after") ?? readField(headers, "Retry-After");
  if (typeof retryAfter !== "string" || !retryAfter) return null;

  // Could be seconds (integer) or HTTP date
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

// =============================================================================
// Retry Execution
// =============================================================================

function resolveRetryConfig(options?: AzureRetryOptions): RetryConfig {
  return {
    maxAttempts: options?.maxAttempts ?? AZURE_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? AZURE_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? AZURE_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? AZURE_RETRY_DEFAULTS.jitterFactor,
  };
}

/**
 * Execute a read against Azure with retry on transient failures.
 * Writes are not routed through here; their failures surface unchanged.
 */
export async function withAzureRetry<T>(
  fn: () => Promise<T>,
  options?: AzureRetryOptions,
): Promise<T> {
  const config = resolveRetryConfig(options);
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryAzureError(error)) break;

      const retryAfterMs = getAzureRetryAfterMs(error);
      let delayMs: number;

      if (retryAfterMs !== null) {
        delayMs = retryAfterMs;
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}

/**
 * Run a read that may legitimately find nothing. A not-found error becomes
 * `null`; anything else propagates after retries.
 */
export async function getOrNull<T>(fn: () => Promise<T>, options?: AzureRetryOptions): Promise<T | null> {
  return withAzureRetry(async () => {
    try {
      return await fn();
    } catch (error: unknown) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
  }, options);
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an Azure error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const code = getErrorCode(error);
  const statusCode = getStatusCode(error);
  const message = readString(error, "message") || "Unknown error";

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(message);

  return parts.join(" ");
}
