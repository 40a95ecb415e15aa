import {
  createLogger,
  DailyLimitError,
  RateLimitConfigSchema,
  RateLimitError,
  sleep as timerSleep,
} from '@bridgesim/core';
import type { Logger, RateLimitConfig, Sleep } from '@bridgesim/core';

/** Token estimate used when a caller has nothing better. */
export const DEFAULT_ESTIMATED_TOKENS = 500;

export type AdmissionKind = 'ok' | 'daily_limit' | 'request_rate' | 'token_rate';

/** Outcome of an admission check. `retryAfterMs` is set for per-minute blocks. */
export interface AdmissionDecision {
  allowed: boolean;
  reason: string;
  kind: AdmissionKind;
  retryAfterMs?: number;
}

export interface RateLimiterStatus {
  dailyRequestsUsed: number;
  dailyRequestsLimit: number;
  recentRequestsPerMinute: number;
  requestsPerMinuteLimit: number;
  recentTokensPerMinute: number;
  tokensPerMinuteLimit: number;
  canMakeRequest: boolean;
}

export interface RateLimiterOptions {
  config?: RateLimitConfig;
  /** Epoch milliseconds. */
  now?: () => number;
  sleep?: Sleep;
  logger?: Logger;
}

interface TokenEntry {
  at: number;
  tokens: number;
}

/**
 * Client-side admission control for the completion provider's quotas:
 * requests per trailing minute, tokens per trailing minute and requests per day.
 *
 * Token counts are caller-supplied estimates, not the provider's own accounting,
 * so the token ceiling is approximate.
 */
export class RateLimiter {
  private readonly config: RateLimitConfig;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  private requestTimes: number[] = [];
  private tokenLog: TokenEntry[] = [];
  private dailyCount = 0;
  private lastDailyReset: number;

  constructor(options: RateLimiterOptions = {}) {
    this.config = options.config ?? RateLimitConfigSchema.parse({});
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? timerSleep;
    this.log = options.logger ?? createLogger('rate-limiter');
    this.lastDailyReset = this.now();
  }

  /** Check admission for one call. Never throws. */
  canMakeRequest(estimatedTokens: number = DEFAULT_ESTIMATED_TOKENS): AdmissionDecision {
    const now = this.now();
    this.rollDay(now);

    const { requestsPerDay, requestsPerMinute, tokensPerMinute, windowMs } = this.config;

    if (this.dailyCount >= requestsPerDay) {
      return {
        allowed: false,
        kind: 'daily_limit',
        reason: `Daily limit reached (${requestsPerDay} requests)`,
      };
    }

    const windowStart = now - windowMs;
    const recent = this.requestTimes.filter((t) => t > windowStart);
    if (recent.length >= requestsPerMinute) {
      const retryAfterMs = Math.max(0, recent[0] + windowMs - now);
      return {
        allowed: false,
        kind: 'request_rate',
        reason: `Rate limit: wait ${Math.ceil(retryAfterMs / 1000)} seconds`,
        retryAfterMs,
      };
    }

    const recentTokens = this.tokenLog.filter((e) => e.at > windowStart);
    const used = recentTokens.reduce((sum, e) => sum + e.tokens, 0);
    if (used + estimatedTokens > tokensPerMinute) {
      const oldest = recentTokens[0];
      const retryAfterMs = oldest ? Math.max(0, oldest.at + windowMs - now) : 0;
      return {
        allowed: false,
        kind: 'token_rate',
        reason: `Token limit would be exceeded (${used + estimatedTokens} > ${tokensPerMinute})`,
        retryAfterMs,
      };
    }

    return { allowed: true, kind: 'ok', reason: 'OK' };
  }

  /**
   * Block until the call is admissible. Per-minute blocks are waited out;
   * the daily ceiling throws DailyLimitError.
   */
  async waitIfNeeded(estimatedTokens: number = DEFAULT_ESTIMATED_TOKENS): Promise<void> {
    if (estimatedTokens > this.config.tokensPerMinute) {
      throw new RateLimitError(
        `Estimated ${estimatedTokens} tokens exceeds the per-minute ceiling of ${this.config.tokensPerMinute}`,
      );
    }

    for (;;) {
      const decision = this.canMakeRequest(estimatedTokens);
      if (decision.allowed) return;

      if (decision.kind === 'daily_limit') {
        throw new DailyLimitError(decision.reason);
      }

      const waitMs = (decision.retryAfterMs ?? 0) + this.config.safetyMarginMs;
      this.log.info({ kind: decision.kind, waitMs }, decision.reason);
      await this.sleep(waitMs);
    }
  }

  /** Record a call that was (or is about to be) sent. */
  recordRequest(tokensUsed: number = DEFAULT_ESTIMATED_TOKENS): void {
    const now = this.now();
    this.rollDay(now);
    this.prune(now);

    this.requestTimes.push(now);
    this.tokenLog.push({ at: now, tokens: tokensUsed });
    this.dailyCount++;

    if (this.dailyCount % 10 === 0) {
      this.log.info(
        { used: this.dailyCount, limit: this.config.requestsPerDay },
        `Progress: ${this.dailyCount}/${this.config.requestsPerDay} daily requests used`,
      );
    }
  }

  getStatus(): RateLimiterStatus {
    const windowStart = this.now() - this.config.windowMs;
    const recentRequests = this.requestTimes.filter((t) => t > windowStart).length;
    const recentTokens = this.tokenLog
      .filter((e) => e.at > windowStart)
      .reduce((sum, e) => sum + e.tokens, 0);

    return {
      dailyRequestsUsed: this.dailyCount,
      dailyRequestsLimit: this.config.requestsPerDay,
      recentRequestsPerMinute: recentRequests,
      requestsPerMinuteLimit: this.config.requestsPerMinute,
      recentTokensPerMinute: recentTokens,
      tokensPerMinuteLimit: this.config.tokensPerMinute,
      canMakeRequest: this.canMakeRequest().allowed,
    };
  }

  private rollDay(now: number): void {
    if (now - this.lastDailyReset > this.config.dayMs) {
      this.dailyCount = 0;
      this.lastDailyReset = now;
      this.log.info('Daily limit reset');
    }
  }

  private prune(now: number): void {
    const windowStart = now - this.config.windowMs;
    this.requestTimes = this.requestTimes.filter((t) => t > windowStart);
    this.tokenLog = this.tokenLog.filter((e) => e.at > windowStart);
  }
}
