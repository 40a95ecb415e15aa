import type { GenerationParams, Phase, SubjectProfile, Turn } from '@bridgesim/core';

import type { Intervention } from './interventions.js';
import { PHASE_INSTRUCTIONS } from './interventions.js';
import { describeStance, summarizeStance } from './stance.js';

export const AGENT_PARAMS: GenerationParams = { temperature: 0.8, topP: 0.9, maxOutputTokens: 300 };
export const SUBJECT_PARAMS: GenerationParams = { temperature: 0.85, topP: 0.9, maxOutputTokens: 250 };

export function formatHistory(turns: readonly Turn[]): string {
  return turns.map((t) => `${t.role === 'agent' ? 'Agent' : 'User'}: ${t.text}`).join('\n');
}

export function buildAgentPrompt(input: {
  intervention: Intervention;
  profile: SubjectProfile;
  phase: Phase;
  history: readonly Turn[];
}): string {
  return [
    input.intervention.prompt,
    '',
    `Current conversation phase: ${input.phase}`,
    PHASE_INSTRUCTIONS[input.phase],
    '',
    'Conversation so far:',
    formatHistory(input.history),
    '',
    describeStance(summarizeStance(input.profile)),
    '',
    'Generate the next agent response in Hebrew. Keep it natural and conversational.',
    'Response should be 2-4 sentences maximum.',
  ].join('\n');
}

const WIND_DOWN_PHASES: ReadonlySet<Phase> = new Set<Phase>(['soft_closure', 'closure']);

export function buildSubjectPrompt(input: {
  profile: SubjectProfile;
  phase: Phase;
  history: readonly Turn[];
}): string {
  const { basicInfo, warPosition, conversationStyle } = input.profile;
  const lines = [
    'You are playing the role of an Israeli with these characteristics:',
    `- Age: ${basicInfo.age}`,
    `- Gender: ${basicInfo.gender}`,
    `- Political stance: ${basicInfo.politicalStance} (1=left, 5=right)`,
    `- War priority: ${warPosition.warPriorityPre}`,
    `- Preferred action: ${warPosition.israelActionPre}`,
  ];
  if (conversationStyle.tone) {
    lines.push(`- Tone: ${conversationStyle.tone}`);
  }
  lines.push(
    '',
    `Your typical phrases: ${conversationStyle.typicalPhrases.join(' | ')}`,
    '',
    'Recent conversation:',
    formatHistory(input.history),
    '',
    `Current phase: ${input.phase}`,
    '',
    'Generate your next response in Hebrew. Be consistent with your political position.',
    'Keep it natural and emotional. 2-3 sentences maximum.',
  );
  if (WIND_DOWN_PHASES.has(input.phase)) {
    lines.push('If the conversation is winding down, you can acknowledge this naturally.');
  }
  return lines.join('\n');
}
