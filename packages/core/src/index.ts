// Zod schemas
export {
  BasicInfoSchema,
  CivicDataSchema,
  CombinationSchema,
  ConversationConfigSchema,
  ConversationMetadataSchema,
  ConversationSchema,
  ConversationStyleSchema,
  EndingReasonSchema,
  ExperimentConfigSchema,
  ExperimentMetadataSchema,
  ExperimentResultSchema,
  FailureRecordSchema,
  GenerationParamsSchema,
  InterventionIdSchema,
  PhaseSchema,
  PoliticalBehaviorSchema,
  ProviderNameSchema,
  RateLimitConfigSchema,
  RetryStrategySchema,
  RunConfigSchema,
  SubjectProfileSchema,
  SuccessRecordSchema,
  TurnRoleSchema,
  TurnSchema,
  WarPositionSchema,
} from './schemas.js';

// TypeScript types (inferred from Zod)
export type {
  Combination,
  Conversation,
  ConversationConfig,
  ConversationMetadata,
  EndingReason,
  ExperimentConfig,
  ExperimentMetadata,
  ExperimentResult,
  FailureRecord,
  GenerationParams,
  InterventionId,
  Phase,
  ProviderName,
  RateLimitConfig,
  RetryStrategy,
  RunConfig,
  SubjectProfile,
  SuccessRecord,
  Turn,
  TurnRole,
} from './types.js';

// Errors
export {
  BridgesimError,
  ConfigurationError,
  DailyLimitError,
  errorMessage,
  LLMError,
  ProfileParseError,
  QuotaExhaustedError,
  RateLimitError,
  TransientError,
} from './errors.js';

// Retry
export { computeDelay, sleep, withRetry } from './retry.js';
export type { RetryOptions, Sleep } from './retry.js';

// Logger
export { logger, createLogger } from './logger.js';
export type { Logger } from 'pino';

// Telemetry
export { initTelemetry, shutdownTelemetry, getTracer, getMeter, withSpan } from './telemetry.js';
