/**
 * OpenAIMind: OpenAI API provider for the Mind interface.
 */
import OpenAI from 'openai';
import { LLMError, QuotaExhaustedError, TransientError } from '@bridgesim/core';

import type { GenerationParams, Mind } from './types.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

/**
 * Map OpenAI SDK errors to bridgesim error classes.
 */
function mapError(err: unknown): never {
  if (err instanceof OpenAI.RateLimitError) {
    throw new QuotaExhaustedError(`OpenAI rate limit: ${err.message}`, { cause: err, payload: err.message });
  }
  if (err instanceof OpenAI.InternalServerError) {
    throw new TransientError(`OpenAI server error: ${err.message}`, 'SERVER_ERROR', { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionError) {
    throw new TransientError(`OpenAI connection error: ${err.message}`, 'CONNECTION_ERROR', { cause: err });
  }
  if (err instanceof OpenAI.AuthenticationError) {
    throw new LLMError(`OpenAI auth error: ${err.message}`, 'AUTH_ERROR', { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    throw new LLMError(`OpenAI API error: ${err.message}`, 'LLM_ERROR', { cause: err });
  }
  if (err instanceof Error) {
    throw new TransientError(`OpenAI unknown error: ${err.message}`, 'UNKNOWN_ERROR', { cause: err });
  }
  throw new LLMError('OpenAI unknown error', 'UNKNOWN_ERROR');
}

export class OpenAIMind implements Mind {
  public readonly provider = 'openai';
  public readonly model: string;

  private readonly client: OpenAI;

  constructor(model: string = DEFAULT_OPENAI_MODEL, apiKey?: string) {
    this.model = model;
    this.client = new OpenAI({
      apiKey: apiKey ?? process.env['OPENAI_API_KEY'],
    });
  }

  /** The prompt goes out as one user message; topK and grounding have no equivalent here. */
  async generate(prompt: string, params: GenerationParams): Promise<string> {
    const request: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      max_tokens: params.maxOutputTokens,
      temperature: params.temperature,
      ...(params.topP !== undefined && { top_p: params.topP }),
    };

    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(request);
    } catch (err) {
      mapError(err);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new LLMError('OpenAI returned no choices', 'NO_CHOICES');
    }

    const text = (choice.message.content ?? '').trim();
    if (!text) {
      throw new TransientError('OpenAI returned no text', 'EMPTY_RESPONSE');
    }
    return text;
  }
}
