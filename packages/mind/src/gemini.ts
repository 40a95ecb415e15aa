/**
 * GeminiMind: Google Gemini provider for the Mind interface.
 */
import { ApiError, GoogleGenAI } from '@google/genai';
import type { GenerateContentConfig, GenerateContentResponse } from '@google/genai';
import { LLMError, QuotaExhaustedError, TransientError } from '@bridgesim/core';

import type { GenerationParams, Mind } from './types.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

/**
 * Map GenerationParams to Gemini's GenerateContentConfig.
 * Grounding turns on the Google Search tool.
 */
export function mapConfig(params: GenerationParams): GenerateContentConfig {
  return {
    temperature: params.temperature,
    maxOutputTokens: params.maxOutputTokens,
    ...(params.topP !== undefined && { topP: params.topP }),
    ...(params.topK !== undefined && { topK: params.topK }),
    ...(params.grounding && { tools: [{ googleSearch: {} }] }),
  };
}

/**
 * Map Gemini SDK errors to bridgesim error classes.
 * HTTP 429 (RESOURCE_EXHAUSTED) keeps the raw message: it carries the
 * provider's `retryDelay` hint.
 */
function mapError(err: unknown): never {
  if (err instanceof ApiError) {
    if (err.status === 429) {
      throw new QuotaExhaustedError(`Gemini quota exhausted: ${err.message}`, { cause: err, payload: err.message });
    }
    if (err.status >= 500) {
      throw new TransientError(`Gemini server error: ${err.message}`, 'SERVER_ERROR', { cause: err });
    }
    if (err.status === 401 || err.status === 403) {
      throw new LLMError(`Gemini auth error: ${err.message}`, 'AUTH_ERROR', { cause: err });
    }
    throw new LLMError(`Gemini API error: ${err.message}`, 'LLM_ERROR', { cause: err });
  }
  if (err instanceof Error) {
    throw new TransientError(`Gemini unknown error: ${err.message}`, 'UNKNOWN_ERROR', { cause: err });
  }
  throw new LLMError('Gemini unknown error', 'UNKNOWN_ERROR');
}

export class GeminiMind implements Mind {
  public readonly provider = 'gemini';
  public readonly model: string;

  private readonly client: GoogleGenAI;

  constructor(model: string = DEFAULT_GEMINI_MODEL, apiKey?: string) {
    this.model = model;
    this.client = new GoogleGenAI({
      apiKey: apiKey ?? process.env['GEMINI_API_KEY'],
    });
  }

  async generate(prompt: string, params: GenerationParams): Promise<string> {
    let response: GenerateContentResponse;
    try {
      response = await this.client.models.generateContent({
        model: this.model,
        contents: prompt,
        config: mapConfig(params),
      });
    } catch (err) {
      mapError(err);
    }

    const text = response.text?.trim() ?? '';
    if (!text) {
      throw new TransientError('Gemini returned no text', 'EMPTY_RESPONSE');
    }
    return text;
  }
}
