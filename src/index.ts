/**
 * Holdgate - permission escalation and adaptive auto-approval for agent sessions
 * Public API Exports
 */

// Core Components
export { Engine, FAIL_SAFE_ASSESSMENT, SYSTEM_ACTOR } from './core/Engine';
export type { EngineOptions } from './core/Engine';
export { EscalationRouter, MAX_CONFIDENCE_BOOST, CONFIDENCE_BOOST_PER_OBSERVATION } from './core/Router';
export {
  ConditionalRuleSet,
  inConditionalBand,
  CONDITIONAL_MAX_RISK,
  CONDITIONAL_MIN_CONFIDENCE,
} from './core/ConditionalRules';
export type { ConditionalMatch } from './core/ConditionalRules';
export { TaskDispatcher } from './core/TaskDispatcher';
export type { DispatcherDeps, EscalationRequest } from './core/TaskDispatcher';
export { HeldStateTracker } from './core/HeldStateTracker';
export type { HeldLimits } from './core/HeldStateTracker';
export { TimeoutWatchdog } from './core/TimeoutWatchdog';
export { DeadlineQueue } from './core/DeadlineQueue';
export type { DeadlineEntry } from './core/DeadlineQueue';
export { ReviewQueue } from './core/ReviewQueue';
export type { ReviewEntry } from './core/ReviewQueue';
export { StatusChannel } from './core/StatusChannel';
export type { StatusListener } from './core/StatusChannel';
export { LogTransport } from './core/Notifier';
export { KeyedLock } from './core/KeyedLock';
export {
  HoldgateError,
  InteractionNotFoundError,
  InvalidDecisionError,
  StoreError,
} from './core/errors';
export { logger, LOG_PATH, HOLDGATE_DATA_DIR } from './core/Logger';

// Storage
export { MemoryDecisionStore, FileDecisionStore, isLiveTask } from './storage/DecisionStore';
export type { DecisionStore, TransitionGuard, InteractionFilter } from './storage/DecisionStore';
export {
  DecisionCache,
  MemoryDecisionCacheStore,
  FileDecisionCacheStore,
  cacheKey,
  qualifiesForAutoApprove,
  isValidCacheEntry,
} from './storage/DecisionCache';
export type { DecisionCacheStore } from './storage/DecisionCache';
export { DecisionLog } from './storage/DecisionLog';
export type { DecisionRecord, DecisionEvent } from './storage/DecisionLog';
export { StatsTracker } from './storage/StatsTracker';
export type { Stats } from './storage/StatsTracker';
export { ConfigStore, mergeConfig } from './storage/ConfigStore';
export type { PersistedConfig } from './storage/ConfigStore';

// Configuration
export { DEFAULT_CONFIG, targetForTier } from './config';
export type { EngineConfig, TierTarget, ConditionalRuleConfig } from './config';

// Types
export * from './types';
