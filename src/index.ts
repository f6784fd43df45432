/**
 * crosscheck - Creator / Reviewer / Critic feedback loop over stateless
 * coding-agent CLIs
 */

export {
  FeedbackLoopOrchestrator,
  DEFAULT_ITERATIONS,
  DEFAULT_TIMEOUT_MS,
  type AgentStep,
  type FeedbackLoopOptions,
  type LoopObserver,
  type LoopResult,
  type RunStartInfo,
} from './orchestrators/feedback-loop/orchestrator.js';
export {
  FeedbackSession,
  CycleDraft,
  createSessionId,
  currentCode,
  previousReview,
  priorCritique,
} from './orchestrators/feedback-loop/session.js';
export {
  selectCreatorInitialInputs,
  selectReviewInputs,
  selectCritiqueInputs,
  selectRevisionInputs,
  type ReviewInputs,
  type CritiqueInputs,
  type RevisionInputs,
} from './orchestrators/feedback-loop/context.js';
export {
  runTestCommand,
  CODE_FILE_PLACEHOLDER,
  CODE_FILE_ENV,
  type TestRunReport,
} from './orchestrators/feedback-loop/test-command.js';
export {
  TranscriptSchema,
  toTranscript,
  saveTranscript,
  loadTranscript,
  type Transcript,
} from './orchestrators/feedback-loop/transcript.js';
export type {
  CycleRecord,
  LoopPhase,
  RunFailure,
  SessionSnapshot,
  SessionStatus,
  SessionView,
} from './orchestrators/feedback-loop/types.js';
export { CliAgentInvoker, selectOutput } from './agents/invoker.js';
export { DEFAULT_TOOLS, buildInvocation } from './agents/tools.js';
export { checkAvailability, requiredTools } from './agents/availability.js';
export {
  DEFAULT_ROLES,
  ROLES,
  TOOL_KEYS,
  type AgentInvoker,
  type AgentRequest,
  type AgentResponse,
  type Role,
  type RoleAssignment,
  type ToolKey,
} from './agents/types.js';
export { MAX_TIMEOUT_MS } from './core/execution/process-runner.js';
export { resolveConfig, type CrosscheckConfig } from './core/config/crosscheck-config.js';
export * from './core/errors/index.js';
export { logger, Logger, LogLevel } from './core/monitoring/logger.js';
