// Types
export type { GenerateCall, GenerationParams, Mind } from './types.js';

// Retry-delay hints
export { DEFAULT_QUOTA_RETRY_DELAY_MS, ProviderRetryDelayParser } from './retry-delay.js';
export type { RetryDelayParser } from './retry-delay.js';

// Providers
export { AnthropicMind, DEFAULT_ANTHROPIC_MODEL } from './anthropic.js';
export { DEFAULT_GEMINI_MODEL, GeminiMind } from './gemini.js';
export { DEFAULT_OPENAI_MODEL, OpenAIMind } from './openai.js';
export { MockMind } from './mock.js';
export type { MockResponder } from './mock.js';
export { createMind, defaultModel } from './factory.js';
