/**
 * Retry utility for OpenAI calls with a fixed delay between attempts.
 */

import logger from "./logger";

export const DEFAULT_RETRIES = 2;
export const RETRY_DELAY_MS = 500;

export type RetryableError = Error & { status?: number };

export interface RetryOptions {
  maxRetries?: number;
  delayMs?: number;
  logger?: (msg: string) => void;
}

/**
 * Check if an error is retryable (transient network, rate limit or server errors)
 */
export function isRetryableError(err: RetryableError): boolean {
  const message = err.message.toLowerCase();
  return (
    message.includes("timeout") ||
    message.includes("timed out") ||
    message.includes("econnreset") ||
    message.includes("etimedout") ||
    message.includes("fetch failed") ||
    message.includes("network") ||
    message.includes("enotfound") ||
    message.includes("econnrefused") ||
    err.status === 429 ||
    (typeof err.status === "number" && err.status >= 500)
  );
}

function toRetryableError(err: unknown): RetryableError {
  if (!(err instanceof Error)) return new Error(String(err));
  const status: unknown = Reflect.get(err, "status");
  return Object.assign(err, { status: typeof status === "number" ? status : undefined });
}

/**
 * Wrapper for async operations with retry logic
 *
 * @param operation - Async function to execute
 * @param label - Label for logging
 * @returns Result of the operation
 * @throws Last error if all retries exhausted or the error is not transient
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  label: string,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_RETRIES;
  const delayMs = options.delayMs ?? RETRY_DELAY_MS;
  const log = options.logger ?? ((msg: string) => logger.warn("retry", msg));

  let lastError: RetryableError = new Error(`${label}: no attempt made`);

  for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
    try {
      return await operation();
    } catch (err) {
      lastError = toRetryableError(err);
      const isLastAttempt = attempt > maxRetries;

      if (isLastAttempt || !isRetryableError(lastError)) {
        log(`${label}: FAILED after ${attempt} attempt(s) - ${lastError.message}`);
        throw lastError;
      }

      log(`${label}: Attempt ${attempt}/${maxRetries + 1} failed, retrying in ${delayMs}ms...`);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}
