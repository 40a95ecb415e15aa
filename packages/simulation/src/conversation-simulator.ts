import {
  ConversationConfigSchema,
  createLogger,
  errorMessage,
  QuotaExhaustedError,
  RateLimitError,
  sleep as timerSleep,
  TransientError,
  withRetry,
} from '@bridgesim/core';
import type {
  Conversation,
  ConversationConfig,
  EndingReason,
  GenerationParams,
  InterventionId,
  Logger,
  Phase,
  RetryStrategy,
  Sleep,
  SubjectProfile,
  Turn,
  TurnRole,
} from '@bridgesim/core';
import { ProviderRetryDelayParser } from '@bridgesim/mind';
import type { Mind, RetryDelayParser } from '@bridgesim/mind';

import type { ArtifactStore } from './artifact-store.js';
import {
  AGENT_FALLBACKS,
  AGENT_OPENINGS,
  DEFAULT_SUBJECT_OPENING,
  getIntervention,
  SUBJECT_CLOSINGS,
  SUBJECT_FALLBACKS,
} from './interventions.js';
import { decideEnding, phaseFor } from './phases.js';
import { AGENT_PARAMS, buildAgentPrompt, buildSubjectPrompt, SUBJECT_PARAMS } from './prompts.js';
import type { RateLimiter } from './rate-limiter.js';

/** What the experiment controller needs from a simulator. */
export interface ConversationRunner {
  simulate(profile: SubjectProfile, interventionId: InterventionId): Promise<Conversation>;
  save(conversation: Conversation): Promise<string>;
}

export interface ConversationSimulatorOptions {
  mind: Mind;
  rateLimiter: RateLimiter;
  store: ArtifactStore;
  config?: ConversationConfig;
  retryDelayParser?: RetryDelayParser;
  random?: () => number;
  sleep?: Sleep;
  now?: () => Date;
  logger?: Logger;
}

export function pick<T>(items: readonly T[], random: () => number): T {
  if (items.length === 0) {
    throw new RangeError('pick() from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

/**
 * Drives one dialogue between the intervention agent and a simulated subject.
 *
 * Provider failures never abort a conversation: each turn is retried and then
 * degrades to canned fallback text. Only the daily quota (and requests the
 * limiter can never admit) propagate.
 */
export class ConversationSimulator implements ConversationRunner {
  private readonly mind: Mind;
  private readonly rateLimiter: RateLimiter;
  private readonly store: ArtifactStore;
  private readonly config: ConversationConfig;
  private readonly retryDelayParser: RetryDelayParser;
  private readonly random: () => number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly retryStrategy: RetryStrategy;

  constructor(options: ConversationSimulatorOptions) {
    this.mind = options.mind;
    this.rateLimiter = options.rateLimiter;
    this.store = options.store;
    this.config = options.config ?? ConversationConfigSchema.parse({});
    this.retryDelayParser = options.retryDelayParser ?? new ProviderRetryDelayParser();
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? timerSleep;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger('conversation-simulator');
    this.retryStrategy = {
      maxRetries: this.config.maxAttempts - 1,
      backoff: 'exponential',
      baseDelayMs: this.config.retryBaseDelayMs,
      maxDelayMs: Math.max(this.config.retryBaseDelayMs, this.config.retryMaxDelayMs),
    };
  }

  async simulate(profile: SubjectProfile, interventionId: InterventionId): Promise<Conversation> {
    const intervention = getIntervention(interventionId);
    const startTime = this.now().toISOString();
    const turns: Turn[] = [];

    const append = (role: TurnRole, text: string): EndingReason | null => {
      turns.push({ role, text, timestamp: this.now().toISOString() });
      return decideEnding(turns.length, turns[turns.length - 1], this.random, this.config);
    };

    let ending = append('agent', pick(AGENT_OPENINGS, this.random));
    if (!ending) {
      ending = append(
        'subject',
        profile.conversationStyle.openingResponse ?? DEFAULT_SUBJECT_OPENING,
      );
    }

    let role: TurnRole = 'agent';
    while (!ending) {
      const phase = phaseFor(turns.length);
      const text =
        role === 'agent'
          ? await this.generateTurn(
              'agent',
              buildAgentPrompt({
                intervention,
                profile,
                phase,
                history: turns.slice(-this.config.agentHistoryWindow),
              }),
              AGENT_PARAMS,
              () => AGENT_FALLBACKS[phase],
            )
          : await this.generateTurn(
              'subject',
              buildSubjectPrompt({
                profile,
                phase,
                history: turns.slice(-this.config.subjectHistoryWindow),
              }),
              SUBJECT_PARAMS,
              () => this.subjectFallback(profile, phase),
            );
      ending = append(role, text);
      role = role === 'agent' ? 'subject' : 'agent';
    }

    if (ending !== 'hard_limit') {
      turns.push({
        role: 'subject',
        text: pick(SUBJECT_CLOSINGS, this.random),
        timestamp: this.now().toISOString(),
      });
    }

    this.log.info(
      { profileId: profile.id, interventionId, turns: turns.length, endingReason: ending },
      'Conversation finished',
    );

    return {
      profileId: profile.id,
      interventionId,
      turns,
      metadata: {
        startTime,
        endTime: this.now().toISOString(),
        messageCount: turns.length,
        endingReason: ending,
      },
      profile,
    };
  }

  save(conversation: Conversation): Promise<string> {
    return this.store.saveConversation(conversation);
  }

  private subjectFallback(profile: SubjectProfile, phase: Phase): string {
    const phrases = profile.conversationStyle.typicalPhrases;
    return phrases.length > 0 ? pick(phrases, this.random) : SUBJECT_FALLBACKS[phase];
  }

  /**
   * One generated turn: admission, accounting and the provider call, retried.
   * Quota errors wait for the provider's hint (or the fallback delay) plus a
   * buffer; other transient errors back off per the retry strategy.
   */
  private async generateTurn(
    role: TurnRole,
    prompt: string,
    params: GenerationParams,
    fallback: () => string,
  ): Promise<string> {
    const estimate = this.config.estimatedTokensPerCall;
    const generationParams: GenerationParams = this.config.grounding
      ? { ...params, grounding: true }
      : params;

    try {
      return await withRetry(
        async () => {
          await this.rateLimiter.waitIfNeeded(estimate);
          this.rateLimiter.recordRequest(estimate);
          const text = (await this.mind.generate(prompt, generationParams)).trim();
          if (!text) {
            throw new TransientError('Provider returned empty text', 'EMPTY_RESPONSE');
          }
          return text;
        },
        this.retryStrategy,
        {
          sleep: this.sleep,
          delayFor: (error) =>
            error instanceof QuotaExhaustedError
              ? (this.retryDelayParser.parse(error) ?? this.config.quotaFallbackDelayMs) +
                this.config.quotaBufferMs
              : undefined,
          onRetry: (error, attempt, delayMs) => {
            this.log.warn(
              { role, attempt: attempt + 1, delayMs, err: errorMessage(error) },
              'Generation attempt failed, retrying',
            );
          },
        },
      );
    } catch (err) {
      if (err instanceof RateLimitError) throw err;
      this.log.warn({ role, err: errorMessage(err) }, 'Generation failed, using fallback text');
      return fallback();
    }
  }
}
