/**
 * Core types for the Mind abstraction layer.
 *
 * A Mind is a black-box text-completion provider: one prompt in, one text out.
 * Quota exhaustion surfaces as `QuotaExhaustedError`; other transient failures
 * as `TransientError`; everything fatal to the attempt as `LLMError`.
 */
import type { GenerationParams } from '@bridgesim/core';

export type { GenerationParams };

// --- Mind interface ---

export interface Mind {
  generate(prompt: string, params: GenerationParams): Promise<string>;
  readonly provider: string;
  readonly model: string;
}

/** Recorded `generate()` call, used by MockMind. */
export interface GenerateCall {
  prompt: string;
  params: GenerationParams;
}
