import { errorMessage, QuotaExhaustedError } from '@bridgesim/core';

/** Wait used after quota exhaustion when the provider gives no usable hint. */
export const DEFAULT_QUOTA_RETRY_DELAY_MS = 60_000;

/**
 * Extracts a provider-suggested retry delay (ms) from a failed call.
 * Returns `undefined` when the error carries no hint.
 */
export interface RetryDelayParser {
  parse(error: unknown): number | undefined;
}

// Matches `'retryDelay': '34s'` as well as `"retryDelay":"34s"`.
const RETRY_DELAY_PATTERN = /retryDelay['"]?\s*:\s*['"](\d+(?:\.\d+)?)s['"]/;

/**
 * Reads the structured `retryAfterMs` of a QuotaExhaustedError first, then
 * scrapes the `retryDelay` field out of the provider's error text.
 */
export class ProviderRetryDelayParser implements RetryDelayParser {
  parse(error: unknown): number | undefined {
    if (error instanceof QuotaExhaustedError) {
      if (error.retryAfterMs !== undefined) return error.retryAfterMs;
      return this.scrape(error.payload);
    }
    return this.scrape(errorMessage(error));
  }

  private scrape(text: string): number | undefined {
    const match = RETRY_DELAY_PATTERN.exec(text);
    if (!match?.[1]) return undefined;
    return Math.round(Number(match[1]) * 1000);
  }
}
