/**
 * MockMind: scriptable provider for testing.
 */
import { LLMError } from '@bridgesim/core';

import type { GenerateCall, GenerationParams, Mind } from './types.js';

/** Computes a reply (or throws) from the call and its 1-based call number. */
export type MockResponder = (call: GenerateCall, callNumber: number) => string | Promise<string>;

export class MockMind implements Mind {
  public readonly provider = 'mock';
  public readonly model: string;

  /** Recorded generate() calls for assertion. */
  public readonly calls: GenerateCall[] = [];

  private readonly queue: Array<string | Error> = [];
  private responder: MockResponder | null = null;
  private errorToThrow: Error | null = null;

  constructor(model: string = 'mock-model') {
    this.model = model;
  }

  /**
   * Enqueue replies or errors. They are consumed in FIFO order before any
   * responder is consulted.
   */
  enqueue(...outputs: Array<string | Error>): void {
    this.queue.push(...outputs);
  }

  /** Answer every call that finds the queue empty. */
  respondWith(responder: MockResponder): void {
    this.responder = responder;
  }

  /**
   * Set an error to throw on every call until clearError() is called.
   */
  setError(error: Error): void {
    this.errorToThrow = error;
  }

  clearError(): void {
    this.errorToThrow = null;
  }

  /**
   * Clear the queue, responder and call history.
   */
  reset(): void {
    this.queue.length = 0;
    this.calls.length = 0;
    this.responder = null;
    this.errorToThrow = null;
  }

  async generate(prompt: string, params: GenerationParams): Promise<string> {
    const call: GenerateCall = { prompt, params };
    this.calls.push(call);

    if (this.errorToThrow) {
      throw this.errorToThrow;
    }

    const next = this.queue.shift();
    if (next instanceof Error) {
      throw next;
    }
    if (next !== undefined) {
      return next;
    }

    if (this.responder) {
      return this.responder(call, this.calls.length);
    }

    throw new LLMError('MockMind: no responses queued', 'MOCK_EMPTY');
  }
}
