import type { z } from 'zod';

import type {
  CombinationSchema,
  ConversationConfigSchema,
  ConversationMetadataSchema,
  ConversationSchema,
  EndingReasonSchema,
  ExperimentConfigSchema,
  ExperimentMetadataSchema,
  ExperimentResultSchema,
  FailureRecordSchema,
  GenerationParamsSchema,
  InterventionIdSchema,
  PhaseSchema,
  ProviderNameSchema,
  RateLimitConfigSchema,
  RetryStrategySchema,
  RunConfigSchema,
  SubjectProfileSchema,
  SuccessRecordSchema,
  TurnRoleSchema,
  TurnSchema,
} from './schemas.js';

export type RetryStrategy = z.infer<typeof RetryStrategySchema>;
export type Phase = z.infer<typeof PhaseSchema>;
export type EndingReason = z.infer<typeof EndingReasonSchema>;
export type TurnRole = z.infer<typeof TurnRoleSchema>;
export type InterventionId = z.infer<typeof InterventionIdSchema>;
export type ProviderName = z.infer<typeof ProviderNameSchema>;
export type SubjectProfile = z.infer<typeof SubjectProfileSchema>;
export type Turn = z.infer<typeof TurnSchema>;
export type ConversationMetadata = z.infer<typeof ConversationMetadataSchema>;
export type Conversation = z.infer<typeof ConversationSchema>;
export type GenerationParams = z.infer<typeof GenerationParamsSchema>;
export type Combination = z.infer<typeof CombinationSchema>;
export type SuccessRecord = z.infer<typeof SuccessRecordSchema>;
export type FailureRecord = z.infer<typeof FailureRecordSchema>;
export type ExperimentMetadata = z.infer<typeof ExperimentMetadataSchema>;
export type ExperimentResult = z.infer<typeof ExperimentResultSchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type ConversationConfig = z.infer<typeof ConversationConfigSchema>;
export type ExperimentConfig = z.infer<typeof ExperimentConfigSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;
