/**
 * AnthropicMind: Anthropic API provider for the Mind interface.
 */
import Anthropic from '@anthropic-ai/sdk';
import { LLMError, QuotaExhaustedError, TransientError } from '@bridgesim/core';

import type { GenerationParams, Mind } from './types.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-latest';

/**
 * Map Anthropic SDK errors to bridgesim error classes.
 */
function mapError(err: unknown): never {
  if (err instanceof Anthropic.RateLimitError) {
    throw new QuotaExhaustedError(`Anthropic rate limit: ${err.message}`, { cause: err, payload: err.message });
  }
  if (err instanceof Anthropic.InternalServerError) {
    throw new TransientError(`Anthropic server error: ${err.message}`, 'SERVER_ERROR', { cause: err });
  }
  if (err instanceof Anthropic.APIConnectionError) {
    throw new TransientError(`Anthropic connection error: ${err.message}`, 'CONNECTION_ERROR', {
      cause: err,
    });
  }
  if (err instanceof Anthropic.AuthenticationError) {
    throw new LLMError(`Anthropic auth error: ${err.message}`, 'AUTH_ERROR', { cause: err });
  }
  if (err instanceof Anthropic.APIError) {
    throw new LLMError(`Anthropic API error: ${err.message}`, 'LLM_ERROR', { cause: err });
  }
  if (err instanceof Error) {
    throw new TransientError(`Anthropic unknown error: ${err.message}`, 'UNKNOWN_ERROR', { cause: err });
  }
  throw new LLMError('Anthropic unknown error', 'UNKNOWN_ERROR');
}

export class AnthropicMind implements Mind {
  public readonly provider = 'anthropic';
  public readonly model: string;

  private readonly client: Anthropic;

  constructor(model: string = DEFAULT_ANTHROPIC_MODEL, apiKey?: string) {
    this.model = model;
    this.client = new Anthropic({
      apiKey: apiKey ?? process.env['ANTHROPIC_API_KEY'],
    });
  }

  async generate(prompt: string, params: GenerationParams): Promise<string> {
    const request: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: params.maxOutputTokens,
      messages: [{ role: 'user', content: prompt }],
      temperature: params.temperature,
      ...(params.topP !== undefined && { top_p: params.topP }),
      ...(params.topK !== undefined && { top_k: params.topK }),
    };

    let response: Anthropic.Messages.Message;
    try {
      response = await this.client.messages.create(request);
    } catch (err) {
      mapError(err);
    }

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    text = text.trim();
    if (!text) {
      throw new TransientError('Anthropic returned no text', 'EMPTY_RESPONSE');
    }
    return text;
  }
}
