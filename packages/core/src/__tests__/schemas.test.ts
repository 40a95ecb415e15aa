import { describe, expect, it } from 'vitest';

import {
  ConversationSchema,
  GenerationParamsSchema,
  PhaseSchema,
  RetryStrategySchema,
  RunConfigSchema,
} from '../schemas.js';

describe('RunConfigSchema', () => {
  it('fills every default from an empty object', () => {
    const config = RunConfigSchema.parse({});
    expect(config.provider).toBe('gemini');
    expect(config.model).toBeUndefined();
    expect(config.rateLimits).toEqual({
      requestsPerMinute: 10,
      tokensPerMinute: 4_000_000,
      requestsPerDay: 1500,
      windowMs: 60_000,
      dayMs: 86_400_000,
      safetyMarginMs: 1_000,
    });
    expect(config.conversation.hardLimit).toBe(24);
    expect(config.conversation.minTurnsForNaturalEnding).toBe(18);
    expect(config.conversation.softEndingFrom).toBe(20);
    expect(config.conversation.softEndingProbability).toBe(0.3);
    expect(config.conversation.maxAttempts).toBe(3);
    expect(config.experiment.interConversationDelayMs).toBe(5_000);
    expect(config.experiment.longPauseMs).toBe(60_000);
    expect(config.experiment.rateLimitCooldownMs).toBe(300_000);
    expect(config.experiment.testModeGroups).toEqual(['left', 'center_left', 'center']);
  });

  it('keeps partial overrides and defaults the rest', () => {
    const config = RunConfigSchema.parse({
      provider: 'openai',
      conversation: { hardLimit: 4 },
    });
    expect(config.provider).toBe('openai');
    expect(config.conversation.hardLimit).toBe(4);
    expect(config.conversation.maxAttempts).toBe(3);
  });

  it('rejects a hard limit below the two opening turns', () => {
    expect(RunConfigSchema.safeParse({ conversation: { hardLimit: 1 } }).success).toBe(false);
  });

  it('rejects unknown providers', () => {
    expect(RunConfigSchema.safeParse({ provider: 'carrier-pigeon' }).success).toBe(false);
  });

  it('rejects token estimates the per-minute token ceiling can never admit', () => {
    const result = RunConfigSchema.safeParse({
      rateLimits: { tokensPerMinute: 1_000 },
      conversation: { estimatedTokensPerCall: 500 },
    });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((i) => i.path.join('.'))).toEqual(['experiment.estimatedTokensPerConversation']);
    expect(result.error?.issues[0]?.message).toBe('must not exceed rateLimits.tokensPerMinute (1000)');
  });
});

describe('RetryStrategySchema', () => {
  it('requires maxDelayMs >= baseDelayMs', () => {
    const result = RetryStrategySchema.safeParse({
      maxRetries: 2,
      backoff: 'constant',
      baseDelayMs: 100,
      maxDelayMs: 10,
    });
    expect(result.success).toBe(false);
  });
});

describe('PhaseSchema', () => {
  it('is the closed set of conversation phases', () => {
    expect(PhaseSchema.options).toEqual(['active', 'pre_closure', 'soft_closure', 'closure', 'final']);
  });
});

describe('GenerationParamsSchema', () => {
  it('accepts optional sampling fields', () => {
    expect(GenerationParamsSchema.parse({ temperature: 0.8, maxOutputTokens: 300 })).toEqual({
      temperature: 0.8,
      maxOutputTokens: 300,
    });
  });
});

describe('ConversationSchema', () => {
  it('rejects an unknown ending reason', () => {
    const result = ConversationSchema.safeParse({
      profileId: 'p',
      interventionId: 'control',
      turns: [],
      metadata: {
        startTime: '2025-01-01T10:00:00.000Z',
        endTime: '2025-01-01T10:05:00.000Z',
        messageCount: 0,
        endingReason: 'max_messages',
      },
    });
    expect(result.success).toBe(false);
  });
});
