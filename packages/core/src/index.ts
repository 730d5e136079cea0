/**
 * StrataMem Core - temporal memory lifecycle engine
 *
 * Tiered memory store with layered content, temporally weighted recall,
 * a review state machine, batch consolidation and an offline write buffer.
 * Storage is behind the MemoryStore port; the server package provides the SQL adapter.
 */

export const version = '0.1.0';

export * from './types';

export {
  MemoryError,
  ValidationError,
  InvalidTransitionError,
  NotFoundError,
  TransientIOError,
  ExternalServiceError,
  isMemoryError,
} from './errors';
export type { MemoryErrorCode } from './errors';

export { createConsoleLogger, silentLogger } from './logger';
export type { Logger } from './logger';

export {
  temporalLayerSchema,
  memoryTypeSchema,
  memoryDomainSchema,
  contentLayerSchema,
  DEFAULT_AGENT_NAME,
  rememberInputSchema,
  recallInputSchema,
  decideInputSchema,
  pendingQuerySchema,
  bufferedMemorySchema,
  formatIssues,
} from './schemas';
export type {
  ParsedRememberInput,
  ParsedRecallInput,
  ParsedDecideInput,
  PendingQuery,
  BufferedMemory,
} from './schemas';

// Memory
export * from './memory';

// Storage port
export { PENDING_STATUSES } from './store/memoryStore';
export type { MemoryStore, ScoredMemory, TransitionPatch } from './store/memoryStore';
export { buildRecallPredicates, matchesPredicate, matchesAll } from './store/predicates';
export type { MemoryPredicate, PredicateKind, RecallFilter } from './store/predicates';
export { emptyLayerCounts, emptyStatusCounts } from './store/stats';
export { InMemoryMemoryStore } from './store/inMemoryStore';
export type { InMemoryStoreSnapshot } from './store/inMemoryStore';

// Lifecycle
export {
  isReviewDecision,
  parseReviewDecision,
  planTransition,
  summarizeTransition,
} from './lifecycle/transitions';
export type { TransitionRequest, TransitionPlan } from './lifecycle/transitions';
export { LifecycleManager } from './lifecycle/lifecycleManager';
export type { LifecycleManagerOptions } from './lifecycle/lifecycleManager';

// Consolidation
export {
  PROMPT_CONTENT_CHARS,
  CONSOLIDATION_CATEGORIES,
  consolidationDecisionSchema,
  consolidationResponseSchema,
  buildDecisionItems,
  buildConsolidationPrompt,
  parseDecisions,
} from './consolidation/decisionService';
export type {
  ConsolidationCategory,
  ConsolidationDecision,
  DecisionParseResult,
  DecisionRequest,
  DecisionRequestItem,
  DecisionService,
} from './consolidation/decisionService';
export {
  SleepCycle,
  CATEGORY_DECISIONS,
  DEFAULT_BATCH_SIZE,
  DEFAULT_CYCLE_LIMIT,
} from './consolidation/sleepCycle';
export type {
  ConsolidationReport,
  PlannedDecision,
  SleepCycleOptions,
  SleepCycleRunOptions,
} from './consolidation/sleepCycle';

// Offline buffer
export {
  OfflineBuffer,
  toRememberInput,
  createHttpDelivery,
  engineDelivery,
} from './offline/offlineBuffer';
export type { BufferDelivery, EnqueueInput, RemoveByTagResult, SyncResult } from './offline/offlineBuffer';
export { CAPTURE_TYPES, CAPTURE_RULES, AUTO_CAPTURE_TAG, captureEvent } from './offline/autoCapture';
export type { CaptureType, CaptureRule, CaptureOptions } from './offline/autoCapture';
export { rememberOrBuffer } from './offline/rememberOrBuffer';
export type { RememberOutcome } from './offline/rememberOrBuffer';
