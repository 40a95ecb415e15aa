import type { SubjectProfile } from '@bridgesim/core';

export type Camp = 'left' | 'center' | 'right';

export interface StanceSummary {
  camp: Camp;
  priority: 'hostages' | 'security' | 'unclear';
  preferredAction: 'deal' | 'military' | 'unclear';
}

const PRIORITY_HOSTAGES = 'החזרת החטופים';
const PRIORITY_SECURITY = 'מיטוט חמאס';
const ACTION_DEAL = 'עסקה לשחרור חטופים';
const ACTION_MILITARY = 'מבצע צבאי לכיבוש עזה';

/** Coarse targeting summary of a subject's position, derived from the profile alone. */
export function summarizeStance(profile: SubjectProfile): StanceSummary {
  const stance = profile.basicInfo.politicalStance;
  const { warPriorityPre, israelActionPre } = profile.warPosition;

  return {
    camp: stance >= 4 ? 'right' : stance <= 2 ? 'left' : 'center',
    priority:
      warPriorityPre === PRIORITY_HOSTAGES
        ? 'hostages'
        : warPriorityPre === PRIORITY_SECURITY
          ? 'security'
          : 'unclear',
    preferredAction:
      israelActionPre === ACTION_DEAL
        ? 'deal'
        : israelActionPre === ACTION_MILITARY
          ? 'military'
          : 'unclear',
  };
}

const PRIORITY_LABEL: Record<StanceSummary['priority'], string> = {
  hostages: 'Hostages',
  security: 'Security/Hamas elimination',
  unclear: 'Unclear',
};

const ACTION_LABEL: Record<StanceSummary['preferredAction'], string> = {
  deal: 'Negotiation/Deal',
  military: 'Military action',
  unclear: 'Unclear',
};

/** Render the stance block of the agent prompt. */
export function describeStance(summary: StanceSummary): string {
  return [
    'User profile context:',
    `- Political stance: ${summary.camp.toUpperCase()}`,
    `- Prioritizes: ${PRIORITY_LABEL[summary.priority]}`,
    `- Prefers: ${ACTION_LABEL[summary.preferredAction]}`,
    '',
    'IMPORTANT: Present the OPPOSITE view from theirs while building bridges.',
  ].join('\n');
}
