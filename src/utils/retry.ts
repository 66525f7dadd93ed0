import { logger } from "../logger.js";

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    shouldRetry = () => true,
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;

      if (attempt === maxAttempts || !shouldRetry(err)) {
        throw err;
      }

      const delay = Math.min(initialDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
      logger.warn(`Attempt ${attempt} failed, retrying in ${delay}ms`, {
        error: String(err),
      });
      await sleep(delay);
    }
  }

  throw lastError;
}

function statusOf(error: Error): number | undefined {
  return "status" in error && typeof error.status === "number"
    ? error.status
    : undefined;
}

export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  // Octokit's RequestError and the LLM SDKs' APIError carry the HTTP status.
  const status = statusOf(error);
  if (status !== undefined && (status === 429 || status >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  const retryablePatterns = [
    "rate limit",
    "timeout",
    "econnreset",
    "econnrefused",
    "socket hang up",
    "503",
    "502",
    "429",
  ];

  return retryablePatterns.some((pattern) => message.includes(pattern));
}
