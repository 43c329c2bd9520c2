// pattern: Imperative Shell

/**
 * Retry logic shared across all chat providers.
 * Each provider maps vendor errors to ModelError first, so the default
 * predicate only has to look at `retryable`.
 */

import { ModelError } from "./types.js";

export type RetryOptions = {
  maxAttempts?: number;
  initialBackoffMs?: number;
  isRetryableError?: (error: unknown) => boolean;
  onError?: (error: unknown, attempt: number) => void;
};

const MAX_ATTEMPTS = 3;
const INITIAL_BACKOFF_MS = 1000;

export function isRetryableModelError(error: unknown): boolean {
  return error instanceof ModelError && error.retryable;
}

/** Retry options for a provider, logging each failed attempt under its prefix. */
export function providerRetryOptions(
  provider: string,
  maxAttempts: number | undefined,
  initialBackoffMs: number | undefined
): RetryOptions {
  return {
    ...(maxAttempts !== undefined && { maxAttempts }),
    ...(initialBackoffMs !== undefined && { initialBackoffMs }),
    onError: (error, attempt) => {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[${provider}] attempt ${attempt + 1} failed: ${message}`);
    },
  };
}

export async function callWithRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS;
  const initialBackoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
  const isRetryableError = options.isRetryableError ?? isRetryableModelError;
  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (options.onError) {
        options.onError(error, attempt);
      }

      if (!isRetryableError(error)) {
        throw error;
      }

      if (attempt < maxAttempts - 1) {
        const backoffMs = initialBackoffMs * Math.pow(2, attempt);
        await new Promise((resolve) => setTimeout(resolve, backoffMs));
      }
    }
  }

  throw lastError;
}
