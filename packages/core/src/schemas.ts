import { z } from 'zod';

// --- RetryStrategy ---

export const RetryStrategySchema = z.object({
  maxRetries: z.number().int().nonnegative(),
  backoff: z.enum(['exponential', 'linear', 'constant']),
  baseDelayMs: z.number().int().nonnegative(),
  maxDelayMs: z.number().int().nonnegative(),
}).refine(
  (data) => data.maxDelayMs >= data.baseDelayMs,
  { message: 'maxDelayMs must be >= baseDelayMs' },
);

// --- Dialogue vocabulary ---

export const PhaseSchema = z.enum(['active', 'pre_closure', 'soft_closure', 'closure', 'final']);

export const EndingReasonSchema = z.enum(['hard_limit', 'natural_ending', 'soft_ending']);

export const TurnRoleSchema = z.enum(['agent', 'subject']);

export const InterventionIdSchema = z.enum(['shared_identity', 'misperception_correction', 'control']);

export const ProviderNameSchema = z.enum(['gemini', 'openai', 'anthropic']);

// --- SubjectProfile ---

export const BasicInfoSchema = z.object({
  age: z.number().int().nonnegative(),
  gender: z.string(),
  maritalStatus: z.string(),
  region: z.string(),
  religiosity: z.number().int(),
  education: z.string(),
  politicalStance: z.number().int().min(1).max(5),
});

export const PoliticalBehaviorSchema = z.object({
  lastElectionVote: z.string(),
  polarizationPerception: z.string(),
  protestParticipation: z.string(),
  militaryServiceRecent: z.string(),
  votingFrequency: z.string(),
  politicalDiscussions: z.string(),
  socialMediaActivity: z.string(),
});

export const CivicDataSchema = z.object({
  influenceSources: z.array(z.string()),
  trustPoliticalSystem: z.number(),
  politicalEfficacy: z.number(),
  politicalAnxiety: z.number(),
});

export const WarPositionSchema = z.object({
  warPriorityPre: z.string(),
  israelActionPre: z.string(),
});

export const ConversationStyleSchema = z.object({
  openingResponse: z.string().optional(),
  typicalPhrases: z.array(z.string()),
  tone: z.string(),
});

export const SubjectProfileSchema = z.object({
  id: z.string().min(1),
  group: z.string().min(1),
  basicInfo: BasicInfoSchema,
  politicalBehavior: PoliticalBehaviorSchema,
  civicData: CivicDataSchema,
  warPosition: WarPositionSchema,
  feelingThermometerPre: z.record(z.string(), z.number()),
  socialDistancePre: z.record(z.string(), z.number()),
  conversationStyle: ConversationStyleSchema,
});

// --- Conversation ---

export const TurnSchema = z.object({
  role: TurnRoleSchema,
  text: z.string(),
  timestamp: z.string().datetime({ offset: true }),
});

export const ConversationMetadataSchema = z.object({
  startTime: z.string().datetime({ offset: true }),
  endTime: z.string().datetime({ offset: true }),
  messageCount: z.number().int().nonnegative(),
  endingReason: EndingReasonSchema,
});

export const ConversationSchema = z.object({
  profileId: z.string().min(1),
  interventionId: InterventionIdSchema,
  turns: z.array(TurnSchema),
  metadata: ConversationMetadataSchema,
  profile: SubjectProfileSchema,
});

// --- Generation ---

export const GenerationParamsSchema = z.object({
  temperature: z.number().min(0).max(2),
  topP: z.number().min(0).max(1).optional(),
  topK: z.number().int().positive().optional(),
  maxOutputTokens: z.number().int().positive(),
  grounding: z.boolean().optional(),
});

// --- Experiment ---

export const CombinationSchema = z.object({
  profileId: z.string().min(1),
  interventionId: InterventionIdSchema,
});

export const SuccessRecordSchema = CombinationSchema.extend({
  messageCount: z.number().int().nonnegative(),
  endingReason: EndingReasonSchema,
  filePath: z.string(),
});

export const FailureRecordSchema = CombinationSchema.extend({
  error: z.string(),
});

export const ExperimentMetadataSchema = z.object({
  startTime: z.string().datetime({ offset: true }),
  endTime: z.string().datetime({ offset: true }).optional(),
  totalPlanned: z.number().int().nonnegative(),
  totalSuccessful: z.number().int().nonnegative().optional(),
  totalFailed: z.number().int().nonnegative().optional(),
  testMode: z.boolean(),
  abortReason: z.enum(['daily_limit']).optional(),
});

export const ExperimentResultSchema = z.object({
  planned: z.array(CombinationSchema),
  successful: z.array(SuccessRecordSchema),
  failed: z.array(FailureRecordSchema),
  metadata: ExperimentMetadataSchema,
});

// --- RunConfig ---

export const RateLimitConfigSchema = z.object({
  requestsPerMinute: z.number().int().positive().default(10),
  tokensPerMinute: z.number().int().positive().default(4_000_000),
  requestsPerDay: z.number().int().positive().default(1500),
  windowMs: z.number().int().positive().default(60_000),
  dayMs: z.number().int().positive().default(86_400_000),
  safetyMarginMs: z.number().int().nonnegative().default(1_000),
});

export const ConversationConfigSchema = z.object({
  hardLimit: z.number().int().min(2).default(24),
  minTurnsForNaturalEnding: z.number().int().nonnegative().default(18),
  softEndingFrom: z.number().int().nonnegative().default(20),
  softEndingProbability: z.number().min(0).max(1).default(0.3),
  maxAttempts: z.number().int().positive().default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(2_000),
  retryMaxDelayMs: z.number().int().nonnegative().default(30_000),
  quotaFallbackDelayMs: z.number().int().nonnegative().default(60_000),
  quotaBufferMs: z.number().int().nonnegative().default(2_000),
  agentHistoryWindow: z.number().int().positive().default(8),
  subjectHistoryWindow: z.number().int().positive().default(4),
  estimatedTokensPerCall: z.number().int().positive().default(500),
  grounding: z.boolean().default(false),
});

export const ExperimentConfigSchema = z.object({
  interConversationDelayMs: z.number().int().nonnegative().default(5_000),
  longPauseEvery: z.number().int().positive().default(5),
  longPauseMs: z.number().int().nonnegative().default(60_000),
  rateLimitCooldownMs: z.number().int().nonnegative().default(300_000),
  failureCheckpointThreshold: z.number().int().positive().default(3),
  estimatedTokensPerConversation: z.number().int().positive().default(2_000),
  testModeLimit: z.number().int().positive().default(3),
  testModeGroups: z.array(z.string().min(1)).default(['left', 'center_left', 'center']),
  balanceTolerance: z.number().int().nonnegative().default(1),
});

export const RunConfigSchema = z.object({
  provider: ProviderNameSchema.default('gemini'),
  model: z.string().min(1).optional(),
  rateLimits: RateLimitConfigSchema.default({}),
  conversation: ConversationConfigSchema.default({}),
  experiment: ExperimentConfigSchema.default({}),
}).superRefine((data, ctx) => {
  const ceiling = data.rateLimits.tokensPerMinute;
  if (data.conversation.estimatedTokensPerCall > ceiling) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['conversation', 'estimatedTokensPerCall'],
      message: `must not exceed rateLimits.tokensPerMinute (${ceiling})`,
    });
  }
  if (data.experiment.estimatedTokensPerConversation > ceiling) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['experiment', 'estimatedTokensPerConversation'],
      message: `must not exceed rateLimits.tokensPerMinute (${ceiling})`,
    });
  }
});
