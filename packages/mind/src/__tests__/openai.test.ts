import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LLMError, QuotaExhaustedError, TransientError } from '@bridgesim/core';

import { OpenAIMind } from '../openai.js';

// Mock the OpenAI SDK with error classes that mirror its hierarchy
const sdk = vi.hoisted(() => {
  const createMock = vi.fn();

  class APIError extends Error {
    status: number | undefined;
    constructor(status: number | undefined, message: string) {
      super(message);
      this.status = status;
    }
  }
  class RateLimitError extends APIError {
    constructor(message = "429 You exceeded your current quota") {
      super(429, message);
    }
  }
  class AuthenticationError extends APIError {
    constructor() {
      super(401, 'auth failed');
    }
  }
  class APIConnectionError extends APIError {
    constructor() {
      super(undefined, 'connection failed');
    }
  }
  class InternalServerError extends APIError {
    constructor() {
      super(500, 'server error');
    }
  }
  class BadRequestError extends APIError {
    constructor() {
      super(400, 'bad request');
    }
  }

  return {
    createMock,
    APIError,
    RateLimitError,
    AuthenticationError,
    APIConnectionError,
    InternalServerError,
    BadRequestError,
  };
});

vi.mock('openai', () => {
  class OpenAI {
    chat = { completions: { create: sdk.createMock } };
  }

  return {
    default: Object.assign(OpenAI, {
      APIError: sdk.APIError,
      RateLimitError: sdk.RateLimitError,
      AuthenticationError: sdk.AuthenticationError,
      APIConnectionError: sdk.APIConnectionError,
      InternalServerError: sdk.InternalServerError,
      BadRequestError: sdk.BadRequestError,
    }),
  };
});

function completion(content: string | null) {
  return {
    choices: [{ message: { role: 'assistant', content, refusal: null }, finish_reason: 'stop', index: 0 }],
    model: 'gpt-4o-mini',
  };
}

const params = { temperature: 0.8, topP: 0.9, maxOutputTokens: 300 };

describe('OpenAIMind', () => {
  let mind: OpenAIMind;

  beforeEach(() => {
    mind = new OpenAIMind('gpt-4o-mini', 'test-key');
    sdk.createMock.mockReset();
  });

  it('has correct provider and model', () => {
    expect(mind.provider).toBe('openai');
    expect(mind.model).toBe('gpt-4o-mini');
  });

  it('sends the prompt as a single user message with sampling params', async () => {
    sdk.createMock.mockResolvedValue(completion('שלום'));

    await mind.generate('hello prompt', params);

    expect(sdk.createMock).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'hello prompt' }],
      max_tokens: 300,
      temperature: 0.8,
      top_p: 0.9,
    });
  });

  it('omits top_p when not provided', async () => {
    sdk.createMock.mockResolvedValue(completion('ok'));

    await mind.generate('p', { temperature: 0.5, maxOutputTokens: 100 });

    expect(sdk.createMock.mock.calls[0]?.[0]).not.toHaveProperty('top_p');
  });

  it('returns trimmed text', async () => {
    sdk.createMock.mockResolvedValue(completion('  תשובה  \n'));
    await expect(mind.generate('p', params)).resolves.toBe('תשובה');
  });

  it('treats empty content as transient', async () => {
    sdk.createMock.mockResolvedValue(completion(null));
    await expect(mind.generate('p', params)).rejects.toThrow(TransientError);
  });

  it('throws LLMError when no choices returned', async () => {
    sdk.createMock.mockResolvedValue({ choices: [], model: 'gpt-4o-mini' });
    await expect(mind.generate('p', params)).rejects.toThrow('OpenAI returned no choices');
  });

  describe('error mapping', () => {
    it('maps rate limit to QuotaExhaustedError keeping the payload', async () => {
      sdk.createMock.mockRejectedValue(new sdk.RateLimitError('quota; retryDelay: "12s"'));

      const err = await mind.generate('p', params).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(QuotaExhaustedError);
      expect(err).toHaveProperty('payload', 'quota; retryDelay: "12s"');
    });

    it('maps server error to TransientError', async () => {
      sdk.createMock.mockRejectedValue(new sdk.InternalServerError());
      await expect(mind.generate('p', params)).rejects.toThrow(TransientError);
    });

    it('maps connection error to TransientError', async () => {
      sdk.createMock.mockRejectedValue(new sdk.APIConnectionError());
      await expect(mind.generate('p', params)).rejects.toThrow(TransientError);
    });

    it('maps auth error to LLMError', async () => {
      sdk.createMock.mockRejectedValue(new sdk.AuthenticationError());
      await expect(mind.generate('p', params)).rejects.toThrow(LLMError);
    });

    it('maps bad request to LLMError', async () => {
      sdk.createMock.mockRejectedValue(new sdk.BadRequestError());
      await expect(mind.generate('p', params)).rejects.toThrow(LLMError);
    });

    it('maps generic Error to TransientError', async () => {
      sdk.createMock.mockRejectedValue(new Error('kaboom'));
      await expect(mind.generate('p', params)).rejects.toThrow(TransientError);
    });
  });
});
