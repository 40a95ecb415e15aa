import {
  ConfigurationError,
  createLogger,
  DailyLimitError,
  errorMessage,
  ExperimentConfigSchema,
  getMeter,
  getTracer,
  QuotaExhaustedError,
  RateLimitError,
  sleep as timerSleep,
  withSpan,
} from '@bridgesim/core';
import type {
  Combination,
  ExperimentConfig,
  ExperimentResult,
  InterventionId,
  Logger,
  Sleep,
  SubjectProfile,
  SuccessRecord,
} from '@bridgesim/core';

import type { ArtifactStore } from './artifact-store.js';
import type { ConversationRunner } from './conversation-simulator.js';
import { INTERVENTION_IDS } from './interventions.js';
import { groupOf } from './profile-loader.js';
import type { ProfileSource } from './profile-loader.js';
import type { RateLimiter } from './rate-limiter.js';

const tracer = getTracer('bridgesim-simulation');
const conversationCounter = getMeter('bridgesim-simulation').createCounter(
  'bridgesim.conversations',
  { description: 'Conversations attempted, by outcome and intervention' },
);

export interface RunOptions {
  testMode?: boolean;
  profileIds?: readonly string[];
}

export interface BalanceReport {
  isBalanced: boolean;
  /** Successful conversations per `${group}_${interventionId}` cell. */
  counts: Record<string, number>;
  uniqueCounts: number[];
}

export interface ExperimentControllerOptions {
  simulator: ConversationRunner;
  rateLimiter: RateLimiter;
  profiles: ProfileSource;
  store: ArtifactStore;
  interventions?: readonly InterventionId[];
  config?: ExperimentConfig;
  random?: () => number;
  sleep?: Sleep;
  now?: () => Date;
  logger?: Logger;
}

/** In-place Fisher–Yates shuffle. */
export function shuffle<T>(items: T[], random: () => number): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

/**
 * Successful conversations per (group, intervention) cell. Every planned
 * cell is counted, so a cell whose conversations all failed shows as 0.
 */
export function validateBalance(result: ExperimentResult, tolerance: number = 1): BalanceReport {
  const counts: Record<string, number> = {};
  const cell = (c: Combination): string => `${groupOf(c.profileId)}_${c.interventionId}`;

  for (const planned of result.planned) {
    counts[cell(planned)] = 0;
  }
  for (const success of result.successful) {
    const key = cell(success);
    counts[key] = (counts[key] ?? 0) + 1;
  }

  const values = Object.values(counts);
  const uniqueCounts = [...new Set(values)].sort((a, b) => a - b);
  const isBalanced =
    values.length === 0 || Math.max(...values) - Math.min(...values) <= tolerance;

  return { isBalanced, counts, uniqueCounts };
}

function isRateLimitSignal(err: unknown): boolean {
  return (
    err instanceof QuotaExhaustedError ||
    err instanceof RateLimitError ||
    errorMessage(err).toLowerCase().includes('rate limit')
  );
}

/**
 * Runs the profile × intervention cross-product sequentially, in random
 * order, pacing itself to stay inside the provider's quotas.
 *
 * A failed conversation is recorded and the run moves on. The daily quota is
 * the only failure that stops scheduling.
 */
export class ExperimentController {
  private readonly simulator: ConversationRunner;
  private readonly rateLimiter: RateLimiter;
  private readonly profiles: ProfileSource;
  private readonly store: ArtifactStore;
  private readonly interventions: readonly InterventionId[];
  private readonly config: ExperimentConfig;
  private readonly random: () => number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: ExperimentControllerOptions) {
    this.simulator = options.simulator;
    this.rateLimiter = options.rateLimiter;
    this.profiles = options.profiles;
    this.store = options.store;
    this.interventions = options.interventions ?? INTERVENTION_IDS;
    this.config = options.config ?? ExperimentConfigSchema.parse({});
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? timerSleep;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger('experiment-controller');
  }

  async runExperiment(options: RunOptions = {}): Promise<ExperimentResult> {
    const testMode = options.testMode ?? false;
    const selectedIds = this.selectProfileIds(await this.profiles.listIds(), testMode, options.profileIds);

    if (selectedIds.length === 0) {
      throw new ConfigurationError('No profiles selected for the experiment');
    }
    if (this.interventions.length === 0) {
      throw new ConfigurationError('No interventions configured for the experiment');
    }

    const { loaded, loadErrors } = await this.loadProfiles(selectedIds);
    if (loaded.size === 0) {
      throw new ConfigurationError(
        `None of the selected profiles could be loaded: ${[...loadErrors.values()].join('; ')}`,
      );
    }

    let plan: Combination[] = [];
    for (const profileId of selectedIds) {
      for (const interventionId of this.interventions) {
        plan.push({ profileId, interventionId });
      }
    }
    shuffle(plan, this.random);
    if (testMode) {
      plan = plan.slice(0, this.config.testModeLimit);
    }

    const result: ExperimentResult = {
      planned: plan,
      successful: [],
      failed: [],
      metadata: {
        startTime: this.now().toISOString(),
        totalPlanned: plan.length,
        testMode,
      },
    };

    this.log.info(
      { profiles: selectedIds.length, unloadable: loadErrors.size, conversations: plan.length, testMode },
      'Starting experiment',
    );

    for (let i = 0; i < plan.length; i++) {
      const { profileId, interventionId } = plan[i];
      const position = i + 1;
      this.log.info(`[${position}/${plan.length}] Running: ${profileId} × ${interventionId}`);

      const profile = loaded.get(profileId);
      if (!profile) {
        const error = loadErrors.get(profileId) ?? 'Profile not loaded';
        await this.recordFailure(result, { profileId, interventionId }, error);
        continue;
      }

      try {
        const success = await this.runOne(profile, interventionId);
        result.successful.push(success);
        conversationCounter.add(1, { outcome: 'success', intervention: interventionId });
        this.log.info(
          { messageCount: success.messageCount, endingReason: success.endingReason },
          `Success: ${success.messageCount} messages`,
        );

        if (position < plan.length) {
          await this.sleep(
            position % this.config.longPauseEvery === 0
              ? this.config.longPauseMs
              : this.config.interConversationDelayMs,
          );
        }
      } catch (err) {
        await this.recordFailure(result, { profileId, interventionId }, errorMessage(err));

        if (err instanceof DailyLimitError) {
          result.metadata.abortReason = 'daily_limit';
          this.log.error('Daily request limit reached, stopping the experiment');
          break;
        }

        if (isRateLimitSignal(err)) {
          this.log.warn({ cooldownMs: this.config.rateLimitCooldownMs }, 'Rate limit hit, cooling down');
          await this.sleep(this.config.rateLimitCooldownMs);
        }
      }
    }

    result.metadata.endTime = this.now().toISOString();
    result.metadata.totalSuccessful = result.successful.length;
    result.metadata.totalFailed = result.failed.length;

    await this.store.saveExperimentLog(result);
    this.logSummary(result);
    return result;
  }

  validateBalance(result: ExperimentResult): BalanceReport {
    return validateBalance(result, this.config.balanceTolerance);
  }

  private async runOne(profile: SubjectProfile, interventionId: InterventionId): Promise<SuccessRecord> {
    const estimate = this.config.estimatedTokensPerConversation;
    return withSpan(
      tracer,
      'conversation',
      { 'bridgesim.profile_id': profile.id, 'bridgesim.intervention': interventionId },
      async () => {
        await this.rateLimiter.waitIfNeeded(estimate);
        const conversation = await this.simulator.simulate(profile, interventionId);
        const filePath = await this.simulator.save(conversation);
        this.rateLimiter.recordRequest(estimate);
        return {
          profileId: profile.id,
          interventionId,
          messageCount: conversation.turns.length,
          endingReason: conversation.metadata.endingReason,
          filePath,
        };
      },
    );
  }

  private async recordFailure(result: ExperimentResult, combination: Combination, error: string): Promise<void> {
    result.failed.push({ ...combination, error });
    conversationCounter.add(1, { outcome: 'failure', intervention: combination.interventionId });
    this.log.warn({ ...combination, err: error }, 'Conversation failed');

    if (result.failed.length >= this.config.failureCheckpointThreshold) {
      this.log.warn({ failed: result.failed.length }, 'Multiple failures, saving partial results');
      await this.store.saveExperimentLog(result);
    }
  }

  /** Load each selected profile on its own; an unreadable one fails only its own combinations. */
  private async loadProfiles(
    ids: readonly string[],
  ): Promise<{ loaded: Map<string, SubjectProfile>; loadErrors: Map<string, string> }> {
    const loaded = new Map<string, SubjectProfile>();
    const loadErrors = new Map<string, string>();
    for (const id of ids) {
      try {
        loaded.set(id, await this.profiles.load(id));
      } catch (err) {
        const message = errorMessage(err);
        loadErrors.set(id, message);
        this.log.warn({ profileId: id, err: message }, 'Profile could not be loaded');
      }
    }
    return { loaded, loadErrors };
  }

  private selectProfileIds(
    available: readonly string[],
    testMode: boolean,
    profileIds: readonly string[] | undefined,
  ): string[] {
    if (profileIds && profileIds.length > 0) {
      const known = new Set(available);
      const selected: string[] = [];
      for (const id of profileIds) {
        if (known.has(id)) {
          selected.push(id);
        } else {
          this.log.warn({ profileId: id }, 'Unknown profile id, skipping');
        }
      }
      if (selected.length === 0) {
        throw new ConfigurationError(`None of the requested profiles exist: ${profileIds.join(', ')}`);
      }
      return selected;
    }

    if (!testMode) return [...available];

    const byGroup = this.config.testModeGroups
      .map((group) => available.find((id) => groupOf(id) === group))
      .filter((id): id is string => id !== undefined);
    return byGroup.length > 0 ? byGroup : available.slice(0, this.config.testModeLimit);
  }

  private logSummary(result: ExperimentResult): void {
    const { successful } = result;
    const avgMessages =
      successful.length > 0
        ? successful.reduce((sum, s) => sum + s.messageCount, 0) / successful.length
        : 0;
    const byIntervention = Object.fromEntries(
      this.interventions.map((id) => [id, successful.filter((s) => s.interventionId === id).length]),
    );

    this.log.info(
      {
        planned: result.metadata.totalPlanned,
        successful: result.metadata.totalSuccessful,
        failed: result.metadata.totalFailed,
        avgMessages: Number(avgMessages.toFixed(1)),
        byIntervention,
        abortReason: result.metadata.abortReason,
      },
      'Experiment finished',
    );
  }
}
