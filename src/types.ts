/**
 * Holdgate Type Definitions
 * Vocabulary shared by the router, dispatcher, watchdog and stores
 */

/**
 * Operation kinds an agent session may ask permission for
 */
export type Operation =
  | 'file-edit'
  | 'commit'
  | 'shell-exec'
  | 'destructive-op'
  | 'test-run'
  | 'network'
  | 'other';

export const OPERATIONS: readonly Operation[] = [
  'file-edit',
  'commit',
  'shell-exec',
  'destructive-op',
  'test-run',
  'network',
  'other',
];

/**
 * Interaction lifecycle
 * - PENDING: created, not yet routed
 * - AUTO_APPROVED / CONDITIONAL_APPROVED: terminal, no reviewer involved
 * - HELD: waiting on a reviewer tier (the owning session keeps running)
 * - APPROVED / DENIED: terminal, by a reviewer or by tier exhaustion
 */
export type InteractionStatus =
  | 'PENDING'
  | 'AUTO_APPROVED'
  | 'CONDITIONAL_APPROVED'
  | 'HELD'
  | 'APPROVED'
  | 'DENIED';

export const TERMINAL_STATUSES: readonly InteractionStatus[] = [
  'AUTO_APPROVED',
  'CONDITIONAL_APPROVED',
  'APPROVED',
  'DENIED',
];

export type Resolution = 'approved' | 'denied' | 'timed-out-exhausted';

export const REASON_ESCALATION_EXHAUSTED = 'escalation exhausted';
export const REASON_REVIEWER_DENIED = 'reviewer denied';
export const REASON_REVIEWER_APPROVED = 'reviewer approved';

export interface Interaction {
  id: string;
  operation: Operation;
  scope: string; // path, branch or target
  session: string;
  riskScore: number;
  confidence: number;
  status: InteractionStatus;
  tier?: number;
  escalationTarget?: string;
  escalationTaskId?: string;
  escalationReason?: string;
  escalationCount: number;
  createdAt: number;
  heldAt?: number;
  // Write-once once the interaction leaves PENDING/HELD
  resolvedAt?: number;
  resolution?: Resolution;
  reasonCode?: string;
  resolvedBy?: string;
  safeguards?: Safeguards;
}

export type TaskStatus = 'queued' | 'delivered' | 'answered' | 'expired';

export interface EscalationTask {
  id: string;
  interactionId: string;
  target: string;
  tier: number;
  priority: number; // 0-10
  reason: string;
  createdAt: number;
  deadline: number;
  status: TaskStatus;
}

export interface DecisionCacheEntry {
  key: string;
  operation: Operation;
  scope: string;
  observedCount: number;
  successCount: number;
  failureCount: number;
  successRate: number;
  lastUsedAt: number;
}

export type Outcome = 'success' | 'failure';

/**
 * Non-blocking controls attached to a conditionally approved operation
 */
export interface Safeguards {
  extraLogging: boolean;
  monitoring: boolean;
}

/**
 * Router output
 */
export type Decision =
  | { kind: 'AUTO_APPROVE'; confidenceBoost: number; reason: string }
  | { kind: 'CONDITIONAL_APPROVE'; safeguards: Safeguards; rule: string; reason: string }
  | { kind: 'ESCALATE'; tier: number; priority: number; reason: string };

export type DecisionKind = Decision['kind'];

/**
 * What the engine hands back to the caller of decide()
 */
export type EngineDecision =
  | (Decision & { interactionId: string })
  | { kind: 'ADMISSION_DENIED'; reason: string };

export interface RiskAssessment {
  riskScore: number;
  confidence: number;
}

export interface RouterContext {
  operation: Operation;
  scope: string;
  session: string;
}

export type CacheLookup = (operation: Operation, scope: string) => DecisionCacheEntry | undefined;

/**
 * A permission request raised by an agent session.
 * riskScore/confidence may be omitted when a classifier is configured.
 */
export interface InteractionRequest {
  operation: Operation;
  scope: string;
  session: string;
  riskScore?: number;
  confidence?: number;
  sessionContext?: Record<string, unknown>;
}

export type ReviewerDecision = 'approve' | 'deny';

// ---------------------------------------------------------------------------
// External collaborators
// ---------------------------------------------------------------------------

export interface RiskClassifier {
  classify(
    operation: Operation,
    scope: string,
    sessionContext: Record<string, unknown>
  ): Promise<RiskAssessment> | RiskAssessment;
}

export interface ReviewPayload {
  interactionId: string;
  operation: Operation;
  scope: string;
  session: string;
  riskScore: number;
  confidence: number;
  reason: string;
  expectedResponse: Array<'APPROVE' | 'DENY'>;
}

export interface NotificationTransport {
  notify(target: string, payload: ReviewPayload): Promise<void> | void;
}

/**
 * Status change published on the engine's notify channel
 */
export interface StatusEvent {
  interaction: Interaction;
  previousStatus: InteractionStatus;
}
