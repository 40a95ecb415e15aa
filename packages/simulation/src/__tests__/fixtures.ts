import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ConversationConfigSchema, RateLimitConfigSchema } from '@bridgesim/core';
import type { ConversationConfig, SubjectProfile } from '@bridgesim/core';
import { vi } from 'vitest';

import { toSubjectProfile } from '../profile-loader.js';
import { RateLimiter } from '../rate-limiter.js';

export function makeProfile(
  id = 'left_profile_1',
  overrides: { stance?: number; phrases?: string[]; opening?: string } = {},
): SubjectProfile {
  return toSubjectProfile(id, {
    basic_info: { age: 30, gender: 'אישה', political_stance: overrides.stance ?? 1 },
    war_position: { war_priority_pre: 'החזרת החטופים', israel_action_pre: 'עסקה לשחרור חטופים' },
    conversation_style: {
      opening_response: overrides.opening ?? 'קשה לי לישון בלילות',
      typical_phrases: overrides.phrases ?? ['חייבים עסקה עכשיו'],
    },
  });
}

/** A limiter generous enough that tests never wait on it. */
export function openLimiter(): RateLimiter {
  return new RateLimiter({
    config: RateLimitConfigSchema.parse({ requestsPerMinute: 10_000, requestsPerDay: 100_000 }),
    sleep: vi.fn(async () => {}),
  });
}

export function conversationConfig(overrides: Partial<ConversationConfig> = {}): ConversationConfig {
  return ConversationConfigSchema.parse(overrides);
}

export function tempDir(prefix = 'bridgesim-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

/** Fixed clock, advancing one second per read. */
export function tickingClock(start = new Date(2025, 0, 2, 3, 4, 5)): () => Date {
  let t = start.getTime();
  return () => {
    const d = new Date(t);
    t += 1_000;
    return d;
  };
}
