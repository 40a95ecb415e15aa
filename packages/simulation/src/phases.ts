import type { ConversationConfig, EndingReason, Phase, Turn } from '@bridgesim/core';

import { CLOSING_PHRASES } from './interventions.js';

// Upper bounds (exclusive) of each phase, by number of turns so far.
const PHASE_BOUNDS: ReadonlyArray<readonly [Phase, number]> = [
  ['active', 16],
  ['pre_closure', 18],
  ['soft_closure', 20],
  ['closure', 22],
];

export function phaseFor(turnCount: number): Phase {
  for (const [phase, upper] of PHASE_BOUNDS) {
    if (turnCount < upper) return phase;
  }
  return 'final';
}

export type EndingPolicy = Pick<
  ConversationConfig,
  'hardLimit' | 'minTurnsForNaturalEnding' | 'softEndingFrom' | 'softEndingProbability'
>;

export function containsClosingPhrase(text: string): boolean {
  return CLOSING_PHRASES.some((phrase) => text.includes(phrase));
}

/**
 * Decide whether the conversation ends after `turnCount` turns.
 *
 * Natural and soft endings append a subject acknowledgment, so they are only
 * considered while that extra turn still fits below the hard ceiling.
 * `random` is consulted only for the soft-ending draw.
 */
export function decideEnding(
  turnCount: number,
  lastTurn: Turn | undefined,
  random: () => number,
  policy: EndingPolicy,
): EndingReason | null {
  if (turnCount >= policy.hardLimit) return 'hard_limit';
  if (turnCount + 1 >= policy.hardLimit) return null;

  if (
    turnCount >= policy.minTurnsForNaturalEnding &&
    lastTurn !== undefined &&
    containsClosingPhrase(lastTurn.text)
  ) {
    return 'natural_ending';
  }

  if (turnCount >= policy.softEndingFrom && random() < policy.softEndingProbability) {
    return 'soft_ending';
  }

  return null;
}
