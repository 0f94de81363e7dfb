/**
 * Transient Error Detection
 *
 * Classifies platform errors as transient (network-level or server-side)
 * or permanent. Error comments pick their guidance line from this, and
 * the CLI prints it next to the failure.
 */

/** Network-level error codes that indicate a transient failure. */
export const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function getHeaderValue(headers: unknown, name: string): string | undefined {
  if (!isRecord(headers)) {
    return undefined;
  }
  const target = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === target && (typeof value === "string" || typeof value === "number")) {
      return String(value);
    }
  }
  return undefined;
}

/**
 * Extract the HTTP status code from an error object, or null if absent.
 */
export function getErrorStatus(error: unknown): number | null {
  if (!isRecord(error)) {
    return null;
  }
  return typeof error.status === "number" ? error.status : null;
}

/**
 * Returns true for 403 or 429 errors that carry rate-limit signals.
 * A plain 403 (permission denied without rate-limit headers) returns false.
 */
export function isRateLimitError(error: unknown): boolean {
  const status = getErrorStatus(error);
  if (!isRecord(error) || (status !== 403 && status !== 429)) {
    return false;
  }
  const headers = isRecord(error.response) ? error.response.headers : undefined;
  const remaining = getHeaderValue(headers, "x-ratelimit-remaining");
  const retryAfter = getHeaderValue(headers, "retry-after");
  if (remaining === "0" || retryAfter) {
    return true;
  }
  const message = typeof error.message === "string" ? error.message.toLowerCase() : "";
  return message.includes("rate limit");
}

/**
 * Determine whether an error is transient.
 *
 * Covers:
 * - Network errors: ECONNRESET, ETIMEDOUT, ECONNREFUSED, ENOTFOUND, EAI_AGAIN, EPIPE
 * - Rate limits: 429 or 403 with rate-limit response signals
 * - Server errors: any HTTP 5xx
 */
export function isTransientError(error: unknown): boolean {
  if (isRecord(error) && typeof error.code === "string" && TRANSIENT_NETWORK_CODES.has(error.code)) {
    return true;
  }

  const status = getErrorStatus(error);
  if (status === 429) {
    return true;
  }
  if (status !== null && status >= 500) {
    return true;
  }

  return isRateLimitError(error);
}

/**
 * True when `error` or any error in its cause chain is transient.
 * Command errors wrap the platform error that caused them.
 */
export function hasTransientCause(error: unknown): boolean {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (isRecord(current) && !seen.has(current)) {
    if (isTransientError(current)) {
      return true;
    }
    seen.add(current);
    current = current.cause;
  }
  return false;
}
