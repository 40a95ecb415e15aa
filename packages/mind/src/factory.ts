import { ConfigurationError } from '@bridgesim/core';
import type { ProviderName } from '@bridgesim/core';

import { AnthropicMind, DEFAULT_ANTHROPIC_MODEL } from './anthropic.js';
import { DEFAULT_GEMINI_MODEL, GeminiMind } from './gemini.js';
import { DEFAULT_OPENAI_MODEL, OpenAIMind } from './openai.js';
import type { Mind } from './types.js';

const API_KEY_ENV: Record<ProviderName, string> = {
  gemini: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

export function defaultModel(provider: ProviderName): string {
  switch (provider) {
    case 'gemini':
      return DEFAULT_GEMINI_MODEL;
    case 'openai':
      return DEFAULT_OPENAI_MODEL;
    case 'anthropic':
      return DEFAULT_ANTHROPIC_MODEL;
  }
}

/**
 * Build the provider client once. A missing key is configuration-fatal:
 * every call would fail and degrade to fallback text.
 */
export function createMind(opts: {
  provider: ProviderName;
  model?: string;
  apiKey?: string;
  env?: NodeJS.ProcessEnv;
}): Mind {
  const env = opts.env ?? process.env;
  const apiKey = opts.apiKey ?? env[API_KEY_ENV[opts.provider]];
  if (!apiKey) {
    throw new ConfigurationError(
      `No API key for ${opts.provider}: pass --api-key or set ${API_KEY_ENV[opts.provider]}`,
    );
  }

  const model = opts.model ?? defaultModel(opts.provider);
  switch (opts.provider) {
    case 'gemini':
      return new GeminiMind(model, apiKey);
    case 'openai':
      return new OpenAIMind(model, apiKey);
    case 'anthropic':
      return new AnthropicMind(model, apiKey);
  }
}
