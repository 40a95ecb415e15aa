import { readFile } from 'node:fs/promises';

import { mean } from 'simple-statistics';
import { z } from 'zod';
import { ConfigurationError, createLogger, errorMessage } from '@bridgesim/core';
import type { Conversation, EndingReason, InterventionId, Logger, Turn } from '@bridgesim/core';

import { ArtifactStore } from './artifact-store.js';
import { INTERVENTION_IDS } from './interventions.js';

export const LexiconsSchema = z.object({
  agreement: z.array(z.string().min(1)),
  disagreement: z.array(z.string().min(1)),
  empathy: z.array(z.string().min(1)),
  sharedIdentity: z.array(z.string().min(1)),
  emotionMarkers: z.array(z.string().min(1)),
  topicKeywords: z.array(z.string().min(1)),
});

export type Lexicons = z.infer<typeof LexiconsSchema>;

export const DEFAULT_LEXICONS_URL = new URL('../data/lexicons.json', import.meta.url);

export async function loadLexicons(source: URL | string = DEFAULT_LEXICONS_URL): Promise<Lexicons> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(source, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read lexicons from ${String(source)}: ${errorMessage(err)}`);
  }
  const parsed = LexiconsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid lexicons in ${String(source)}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** One flat row per conversation. */
export interface ConversationMetrics {
  profileId: string;
  interventionId: InterventionId;
  politicalStance: number;
  age: number;
  gender: string;
  militaryService: string;
  warPriority: string;
  israelAction: string;
  totalMessages: number;
  subjectMessages: number;
  agentMessages: number;
  endingReason: EndingReason;
  agreementSignals: number;
  disagreementSignals: number;
  empathyExpressions: number;
  sharedIdentityRefs: number;
  emotionLevel: number;
  avgMessageLength: number;
  backAndForthRatio: number;
  topicConsistency: number;
}

export const NUMERIC_METRICS = [
  'totalMessages',
  'subjectMessages',
  'agentMessages',
  'agreementSignals',
  'disagreementSignals',
  'empathyExpressions',
  'sharedIdentityRefs',
  'emotionLevel',
  'avgMessageLength',
  'backAndForthRatio',
  'topicConsistency',
] as const;

export type NumericMetric = (typeof NUMERIC_METRICS)[number];

export interface InterventionSummary {
  interventionId: InterventionId;
  count: number;
  means: Record<NumericMetric, number>;
  effectivenessScore: number;
  /** Share of conversations that ended before the hard ceiling. */
  naturalEndingRate: number;
  topicConsistency: number;
}

export interface StanceCount {
  politicalStance: number;
  label: string;
  count: number;
}

export const STANCE_LABELS: Readonly<Record<number, string>> = {
  1: 'Left',
  2: 'Center-Left',
  3: 'Center',
  4: 'Center-Right',
  5: 'Right',
};

/** Non-overlapping occurrences of `needle` in `text`. */
export function countOccurrences(text: string, needle: string): number {
  if (!needle) return 0;
  return text.split(needle).length - 1;
}

/** Per turn, per phrase: +1 when the phrase appears in the turn. */
function countSignals(turns: readonly Turn[], phrases: readonly string[]): number {
  let count = 0;
  for (const turn of turns) {
    for (const phrase of phrases) {
      if (turn.text.includes(phrase)) count++;
    }
  }
  return count;
}

function codePointLength(text: string): number {
  return [...text].length;
}

export interface MetricsAnalyzerOptions {
  lexicons: Lexicons;
  logger?: Logger;
}

/**
 * Lexicon-based scoring of conversation artifacts and per-intervention
 * aggregation.
 */
export class MetricsAnalyzer {
  private readonly lexicons: Lexicons;
  private readonly log: Logger;

  constructor(options: MetricsAnalyzerOptions) {
    this.lexicons = options.lexicons;
    this.log = options.logger ?? createLogger('metrics-analyzer');
  }

  /** Analyzer over the lexicons shipped with the package. */
  static async create(options: { logger?: Logger } = {}): Promise<MetricsAnalyzer> {
    return new MetricsAnalyzer({ lexicons: await loadLexicons(), logger: options.logger });
  }

  analyzeConversation(conversation: Conversation): ConversationMetrics {
    const { turns, profile } = conversation;
    const n = turns.length;

    let markers = 0;
    let roleChanges = 0;
    let onTopic = 0;
    let totalLength = 0;
    turns.forEach((turn, i) => {
      for (const marker of this.lexicons.emotionMarkers) {
        markers += countOccurrences(turn.text, marker);
      }
      if (i > 0 && turns[i - 1].role !== turn.role) roleChanges++;
      if (this.lexicons.topicKeywords.some((k) => turn.text.includes(k))) onTopic++;
      totalLength += codePointLength(turn.text);
    });

    return {
      profileId: conversation.profileId,
      interventionId: conversation.interventionId,
      politicalStance: profile.basicInfo.politicalStance,
      age: profile.basicInfo.age,
      gender: profile.basicInfo.gender,
      militaryService: profile.politicalBehavior.militaryServiceRecent,
      warPriority: profile.warPosition.warPriorityPre,
      israelAction: profile.warPosition.israelActionPre,
      totalMessages: n,
      subjectMessages: turns.filter((t) => t.role === 'subject').length,
      agentMessages: turns.filter((t) => t.role === 'agent').length,
      endingReason: conversation.metadata.endingReason,
      agreementSignals: countSignals(turns, this.lexicons.agreement),
      disagreementSignals: countSignals(turns, this.lexicons.disagreement),
      empathyExpressions: countSignals(turns, this.lexicons.empathy),
      sharedIdentityRefs: countSignals(turns, this.lexicons.sharedIdentity),
      emotionLevel: Math.min(1, markers / Math.max(n, 1) / 2),
      avgMessageLength: n > 0 ? totalLength / n : 0,
      backAndForthRatio: n < 2 ? 0 : roleChanges / (n - 1),
      topicConsistency: onTopic / Math.max(n, 1),
    };
  }

  /** Per-intervention means, in the canonical intervention order. */
  summarize(rows: readonly ConversationMetrics[]): InterventionSummary[] {
    const summaries: InterventionSummary[] = [];
    for (const interventionId of INTERVENTION_IDS) {
      const group = rows.filter((r) => r.interventionId === interventionId);
      if (group.length === 0) continue;

      const avg = (metric: NumericMetric): number => mean(group.map((r) => r[metric]));
      const means: Record<NumericMetric, number> = {
        totalMessages: avg('totalMessages'),
        subjectMessages: avg('subjectMessages'),
        agentMessages: avg('agentMessages'),
        agreementSignals: avg('agreementSignals'),
        disagreementSignals: avg('disagreementSignals'),
        empathyExpressions: avg('empathyExpressions'),
        sharedIdentityRefs: avg('sharedIdentityRefs'),
        emotionLevel: avg('emotionLevel'),
        avgMessageLength: avg('avgMessageLength'),
        backAndForthRatio: avg('backAndForthRatio'),
        topicConsistency: avg('topicConsistency'),
      };

      const effectivenessScore =
        means.totalMessages > 0
          ? (2 * means.agreementSignals + 3 * means.empathyExpressions - means.disagreementSignals) /
            means.totalMessages
          : 0;

      summaries.push({
        interventionId,
        count: group.length,
        means,
        effectivenessScore,
        naturalEndingRate: group.filter((r) => r.endingReason !== 'hard_limit').length / group.length,
        topicConsistency: means.topicConsistency,
      });
    }
    return summaries;
  }

  countByStance(rows: readonly ConversationMetrics[]): StanceCount[] {
    const counts = new Map<number, number>();
    for (const row of rows) {
      counts.set(row.politicalStance, (counts.get(row.politicalStance) ?? 0) + 1);
    }
    return [...counts.entries()]
      .sort(([a], [b]) => a - b)
      .map(([politicalStance, count]) => ({
        politicalStance,
        label: STANCE_LABELS[politicalStance] ?? String(politicalStance),
        count,
      }));
  }

  async analyzeDirectory(resultsDir: string): Promise<{
    rows: ConversationMetrics[];
    summaries: InterventionSummary[];
    byStance: StanceCount[];
  }> {
    const store = new ArtifactStore(resultsDir, { logger: this.log });
    const conversations = await store.loadConversations();
    const rows = conversations.map((c) => this.analyzeConversation(c));
    this.log.info({ resultsDir, conversations: rows.length }, 'Conversations analyzed');
    return { rows, summaries: this.summarize(rows), byStance: this.countByStance(rows) };
  }
}

const CSV_COLUMNS: ReadonlyArray<readonly [string, keyof ConversationMetrics]> = [
  ['profile_id', 'profileId'],
  ['intervention', 'interventionId'],
  ['political_stance', 'politicalStance'],
  ['age', 'age'],
  ['gender', 'gender'],
  ['military_service', 'militaryService'],
  ['war_priority', 'warPriority'],
  ['israel_action', 'israelAction'],
  ['total_messages', 'totalMessages'],
  ['user_messages', 'subjectMessages'],
  ['agent_messages', 'agentMessages'],
  ['ending_reason', 'endingReason'],
  ['agreement_signals', 'agreementSignals'],
  ['disagreement_signals', 'disagreementSignals'],
  ['empathy_expressions', 'empathyExpressions'],
  ['shared_identity_refs', 'sharedIdentityRefs'],
  ['emotion_level', 'emotionLevel'],
  ['avg_message_length', 'avgMessageLength'],
  ['back_and_forth_ratio', 'backAndForthRatio'],
  ['topic_consistency', 'topicConsistency'],
];

function csvField(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** RFC 4180 CSV, one row per conversation. `bom` prepends a UTF-8 BOM for spreadsheet tools. */
export function toCsv(rows: readonly ConversationMetrics[], options: { bom?: boolean } = {}): string {
  const lines = [CSV_COLUMNS.map(([header]) => header).join(',')];
  for (const row of rows) {
    lines.push(CSV_COLUMNS.map(([, key]) => csvField(row[key])).join(','));
  }
  return `${options.bom ? '\uFEFF' : ''}${lines.join('\r\n')}\r\n`;
}
