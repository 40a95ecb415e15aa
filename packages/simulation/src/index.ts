// Rate limiting
export { DEFAULT_ESTIMATED_TOKENS, RateLimiter } from './rate-limiter.js';
export type {
  AdmissionDecision,
  AdmissionKind,
  RateLimiterOptions,
  RateLimiterStatus,
} from './rate-limiter.js';

// Profiles
export {
  DEFAULT_PROFILES_DIR,
  groupOf,
  parseProfileText,
  PROFILE_SECTIONS,
  ProfileLoader,
  toSubjectProfile,
} from './profile-loader.js';
export type {
  ProfileLoadFailure,
  ProfileLoadReport,
  ProfileSection,
  ProfileSource,
  RawProfile,
  RawSection,
  RawValue,
} from './profile-loader.js';

// Interventions, stance, phases, prompts
export {
  AGENT_FALLBACKS,
  AGENT_OPENINGS,
  CLOSING_PHRASES,
  DEFAULT_SUBJECT_OPENING,
  getIntervention,
  INTERVENTION_IDS,
  INTERVENTIONS,
  PHASE_INSTRUCTIONS,
  SUBJECT_CLOSINGS,
  SUBJECT_FALLBACKS,
} from './interventions.js';
export type { Intervention } from './interventions.js';
export { describeStance, summarizeStance } from './stance.js';
export type { Camp, StanceSummary } from './stance.js';
export { containsClosingPhrase, decideEnding, phaseFor } from './phases.js';
export type { EndingPolicy } from './phases.js';
export { AGENT_PARAMS, buildAgentPrompt, buildSubjectPrompt, formatHistory, SUBJECT_PARAMS } from './prompts.js';

// Simulation and experiments
export { ConversationSimulator, pick } from './conversation-simulator.js';
export type { ConversationRunner, ConversationSimulatorOptions } from './conversation-simulator.js';
export { ExperimentController, shuffle, validateBalance } from './experiment-controller.js';
export type { BalanceReport, ExperimentControllerOptions, RunOptions } from './experiment-controller.js';

// Artifacts, analysis, configuration
export { ArtifactStore, fileTimestamp } from './artifact-store.js';
export type { ArtifactStoreOptions } from './artifact-store.js';
export {
  countOccurrences,
  DEFAULT_LEXICONS_URL,
  LexiconsSchema,
  loadLexicons,
  MetricsAnalyzer,
  NUMERIC_METRICS,
  STANCE_LABELS,
  toCsv,
} from './metrics-analyzer.js';
export type {
  ConversationMetrics,
  InterventionSummary,
  Lexicons,
  MetricsAnalyzerOptions,
  NumericMetric,
  StanceCount,
} from './metrics-analyzer.js';
export { loadRunConfig } from './config.js';
