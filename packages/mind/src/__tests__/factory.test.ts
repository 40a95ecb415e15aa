import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '@bridgesim/core';

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent: vi.fn() };
  },
  ApiError: class extends Error {},
}));

import { createMind, defaultModel } from '../factory.js';

describe('defaultModel', () => {
  it('has a model per provider', () => {
    expect(defaultModel('gemini')).toBe('gemini-2.0-flash');
    expect(defaultModel('openai')).toBe('gpt-4o-mini');
    expect(defaultModel('anthropic')).toBe('claude-3-5-haiku-latest');
  });
});

describe('createMind', () => {
  it('reads the key from the provider env var', () => {
    const mind = createMind({ provider: 'gemini', env: { GEMINI_API_KEY: 'test-key' } });
    expect(mind.provider).toBe('gemini');
    expect(mind.model).toBe('gemini-2.0-flash');
  });

  it('honours an explicit model and key', () => {
    const mind = createMind({ provider: 'gemini', model: 'gemini-1.5-pro', apiKey: 'test-key', env: {} });
    expect(mind.model).toBe('gemini-1.5-pro');
  });

  it('fails with ConfigurationError when no key is available', () => {
    expect(() => createMind({ provider: 'openai', env: {} })).toThrow(ConfigurationError);
    expect(() => createMind({ provider: 'openai', env: {} })).toThrow(
      'No API key for openai: pass --api-key or set OPENAI_API_KEY',
    );
  });
});
