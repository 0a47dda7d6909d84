import type { Logger } from "./logger.js";

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  logger?: Logger;
  /** Return false to rethrow immediately. Defaults to retrying everything. */
  retryIf?: (err: unknown) => boolean;
  label?: string;
}

/**
 * Retry an idempotent async read with exponential backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 250, logger, retryIf, label = "call" } = opts;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxRetries || (retryIf && !retryIf(err))) throw err;
      const delay = baseDelayMs * 2 ** attempt;
      logger?.warn({ label, attempt, delay, err }, "Retrying after error");
      await new Promise((r) => setTimeout(r, delay));
    }
  }
}
