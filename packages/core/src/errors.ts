/**
 * Base error class for all bridgesim errors.
 */
export class BridgesimError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgesimError';
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * Transient / retryable generation failures (network issues, server errors, empty output).
 */
export class TransientError extends BridgesimError {
  constructor(message: string, code: string = 'TRANSIENT', options?: { cause?: unknown }) {
    super(message, code, true, options);
    this.name = 'TransientError';
  }
}

/**
 * The completion provider reported quota exhaustion.
 *
 * `payload` keeps the provider's raw error text so a retry-delay hint can be
 * scraped from it; `retryAfterMs` is set when the provider gave a structured hint.
 */
export class QuotaExhaustedError extends TransientError {
  public readonly payload: string;
  public readonly retryAfterMs: number | undefined;

  constructor(
    message: string,
    options?: { cause?: unknown; payload?: string; retryAfterMs?: number },
  ) {
    super(message, 'QUOTA_EXHAUSTED', options);
    this.name = 'QuotaExhaustedError';
    this.payload = options?.payload ?? message;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/**
 * LLM call failed (non-transient, e.g. invalid request or bad credentials).
 */
export class LLMError extends BridgesimError {
  constructor(message: string, code: string = 'LLM_ERROR', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'LLMError';
  }
}

/**
 * The local rate limiter refused admission and waiting cannot help.
 */
export class RateLimitError extends BridgesimError {
  constructor(message: string, code: string = 'RATE_LIMITED', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'RateLimitError';
  }
}

/**
 * Daily request ceiling reached. Terminal for the current run.
 */
export class DailyLimitError extends RateLimitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DAILY_LIMIT', options);
    this.name = 'DailyLimitError';
  }
}

/**
 * Configuration-fatal problem: nothing to run, or an invalid configuration.
 */
export class ConfigurationError extends BridgesimError {
  constructor(message: string, code: string = 'CONFIGURATION', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A profile file could not be parsed.
 */
export class ProfileParseError extends BridgesimError {
  public readonly source: string;
  public readonly line: number | undefined;

  constructor(message: string, source: string, line?: number, options?: { cause?: unknown }) {
    super(
      line === undefined ? `${source}: ${message}` : `${source}:${line}: ${message}`,
      'PROFILE_PARSE',
      false,
      options,
    );
    this.name = 'ProfileParseError';
    this.source = source;
    this.line = line;
  }
}

/** Render any thrown value as a one-line message. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
