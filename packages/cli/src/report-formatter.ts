/**
 * Terminal renderings of experiment results, balance checks, analysis
 * summaries, profile listings and limiter status.
 */
import type { ExperimentResult, SubjectProfile } from '@bridgesim/core';
import { STANCE_LABELS } from '@bridgesim/simulation';
import type {
  BalanceReport,
  InterventionSummary,
  RateLimiterStatus,
  StanceCount,
} from '@bridgesim/simulation';

const CHECK = '✓';
const CROSS = '✗';

/**
 * Format elapsed time between two ISO timestamps.
 */
export function formatDuration(startIso: string, endIso: string): string {
  const elapsedMs = new Date(endIso).getTime() - new Date(startIso).getTime();
  if (!(elapsedMs > 0)) return '0s';

  const seconds = Math.floor(elapsedMs / 1000);
  if (seconds < 60) return `${seconds}s`;

  const minutes = Math.floor(seconds / 60);
  const remainingSec = seconds % 60;
  if (minutes < 60) return `${minutes}m ${remainingSec}s`;

  const hours = Math.floor(minutes / 60);
  const remainingMin = minutes % 60;
  return `${hours}h ${remainingMin}m`;
}

function table(rows: ReadonlyArray<readonly [string, string]>, indent = '  '): string[] {
  const width = Math.max(...rows.map(([label]) => label.length));
  return rows.map(([label, value]) => `${indent}${label.padEnd(width)}  ${value}`);
}

/**
 * Example output:
 *   Planned:    9
 *   Successful: 8
 *   Failed:     1
 *   Duration:   12m 5s
 *   Avg turns:  19.5
 *
 *   By intervention:
 *     shared_identity           3
 *     control                   2
 *
 *   Failures:
 *     ✗  left_profile_1 × control: boom
 */
export function formatExperimentSummary(result: ExperimentResult): string {
  const { metadata, successful, failed } = result;
  const lines: string[] = [];

  lines.push(`Planned:    ${metadata.totalPlanned}`);
  lines.push(`Successful: ${successful.length}`);
  lines.push(`Failed:     ${failed.length}`);
  if (metadata.endTime) {
    lines.push(`Duration:   ${formatDuration(metadata.startTime, metadata.endTime)}`);
  }
  if (successful.length > 0) {
    const avg = successful.reduce((sum, s) => sum + s.messageCount, 0) / successful.length;
    lines.push(`Avg turns:  ${avg.toFixed(1)}`);
  }
  if (metadata.abortReason) {
    lines.push(`Aborted:    ${metadata.abortReason}`);
  }

  const perIntervention = new Map<string, number>();
  for (const s of successful) {
    perIntervention.set(s.interventionId, (perIntervention.get(s.interventionId) ?? 0) + 1);
  }
  if (perIntervention.size > 0) {
    lines.push('', 'By intervention:');
    lines.push(...table([...perIntervention.entries()].map(([id, n]) => [id, String(n)])));
  }

  if (failed.length > 0) {
    lines.push('', 'Failures:');
    for (const f of failed) {
      lines.push(`  ${CROSS}  ${f.profileId} × ${f.interventionId}: ${f.error}`);
    }
  }

  return lines.join('\n');
}

export function formatBalance(report: BalanceReport): string {
  const verdict = report.isBalanced ? `${CHECK}  balanced` : `${CROSS}  unbalanced`;
  const lines = [`Balance:    ${verdict} (counts: ${report.uniqueCounts.join(', ') || 'none'})`];
  const cells = Object.entries(report.counts).sort(([a], [b]) => a.localeCompare(b));
  if (cells.length > 0) {
    lines.push(...table(cells.map(([cell, n]) => [cell, String(n)])));
  }
  return lines.join('\n');
}

/**
 * Example output:
 *   Conversations: 9
 *
 *   By political stance:
 *     Left    6
 *     Right   3
 *
 *   Interventions:
 *     shared_identity  n=3  effectiveness=0.412  natural=33.3%  topic=0.80  agree=1.33  empathy=0.67
 */
export function formatAnalysis(
  rowCount: number,
  summaries: readonly InterventionSummary[],
  byStance: readonly StanceCount[],
): string {
  const lines = [`Conversations: ${rowCount}`];

  if (byStance.length > 0) {
    lines.push('', 'By political stance:');
    lines.push(...table(byStance.map((s) => [s.label, String(s.count)])));
  }

  if (summaries.length > 0) {
    lines.push('', 'Interventions:');
    lines.push(
      ...table(
        summaries.map((s) => [
          s.interventionId,
          [
            `n=${s.count}`,
            `effectiveness=${s.effectivenessScore.toFixed(3)}`,
            `natural=${(s.naturalEndingRate * 100).toFixed(1)}%`,
            `topic=${s.topicConsistency.toFixed(2)}`,
            `agree=${s.means.agreementSignals.toFixed(2)}`,
            `empathy=${s.means.empathyExpressions.toFixed(2)}`,
          ].join('  '),
        ]),
      ),
    );
  }

  return lines.join('\n');
}

export function formatProfiles(profiles: readonly SubjectProfile[]): string {
  if (profiles.length === 0) return 'No profiles found.';
  return table(
    profiles.map((p) => {
      const stance = p.basicInfo.politicalStance;
      return [p.id, `${p.group.padEnd(12)}  ${stance} ${STANCE_LABELS[stance] ?? ''}`.trimEnd()];
    }),
    '',
  ).join('\n');
}

export function formatLimiterStatus(status: RateLimiterStatus): string {
  return [
    `Requests/day:    ${status.dailyRequestsUsed}/${status.dailyRequestsLimit}`,
    `Requests/minute: ${status.recentRequestsPerMinute}/${status.requestsPerMinuteLimit}`,
    `Tokens/minute:   ${status.recentTokensPerMinute}/${status.tokensPerMinuteLimit}`,
    `Can request:     ${status.canMakeRequest ? 'yes' : 'no'}`,
  ].join('\n');
}
