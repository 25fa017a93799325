/**
 * Holdgate Engine
 * The caller-facing API: decide, resolve, status.
 *
 * decide() classifies (if needed), routes, and either approves on the spot or
 * hands the interaction to the TaskDispatcher. It never waits on a reviewer.
 * resolve() and the TimeoutWatchdog both try to move a HELD interaction out of
 * HELD; the DecisionStore compare-and-set decides which one wins and the other
 * one logs and walks away.
 */

import { randomUUID } from 'crypto';
import chalk from 'chalk';
import {
  Decision,
  DecisionCacheEntry,
  EngineDecision,
  EscalationTask,
  Interaction,
  InteractionRequest,
  InteractionStatus,
  NotificationTransport,
  OPERATIONS,
  Outcome,
  REASON_ESCALATION_EXHAUSTED,
  REASON_REVIEWER_APPROVED,
  REASON_REVIEWER_DENIED,
  ReviewerDecision,
  RiskAssessment,
  RiskClassifier,
  StatusEvent,
} from '../types';
import { DEFAULT_CONFIG, EngineConfig, targetForTier } from '../config';
import { DecisionStore, FileDecisionStore } from '../storage/DecisionStore';
import { DecisionCache, FileDecisionCacheStore } from '../storage/DecisionCache';
import { DecisionEvent, DecisionLog, DecisionRecord } from '../storage/DecisionLog';
import { StatsTracker } from '../storage/StatsTracker';
import { ConfigStore } from '../storage/ConfigStore';
import { EscalationRouter } from './Router';
import { ConditionalRuleSet } from './ConditionalRules';
import { TaskDispatcher, reviewPayloadFor } from './TaskDispatcher';
import { HeldStateTracker } from './HeldStateTracker';
import { TimeoutWatchdog } from './TimeoutWatchdog';
import { DeadlineEntry } from './DeadlineQueue';
import { ReviewQueue } from './ReviewQueue';
import { StatusChannel, StatusListener } from './StatusChannel';
import { KeyedLock } from './KeyedLock';
import { LogTransport } from './Notifier';
import { HoldgateError, InteractionNotFoundError, InvalidDecisionError } from './errors';
import { HOLDGATE_DATA_DIR, logger } from './Logger';

/** Assessment used whenever classification is missing or unusable */
export const FAIL_SAFE_ASSESSMENT: RiskAssessment = { riskScore: 1.0, confidence: 0.0 };

/** Actor recorded on transitions the engine makes by itself */
export const SYSTEM_ACTOR = 'holdgate';

/** Delay before a timeout whose handling failed is tried again (ms) */
export const EXPIRY_RETRY_MS = 30_000;

export interface EngineOptions {
  config?: Partial<EngineConfig>;
  store?: DecisionStore;
  cache?: DecisionCache;
  classifier?: RiskClassifier;
  transport?: NotificationTransport;
  reviewQueue?: ReviewQueue;
  /** Audit trail; null disables it */
  decisionLog?: DecisionLog | null;
  /** Counters; null disables them */
  stats?: StatsTracker | null;
  clock?: () => number;
  idFactory?: () => string;
}

export class Engine {
  readonly config: EngineConfig;
  readonly reviewQueue: ReviewQueue;

  private readonly store: DecisionStore;
  private readonly cache: DecisionCache;
  private readonly classifier?: RiskClassifier;
  private readonly decisionLog: DecisionLog | null;
  private readonly stats: StatsTracker | null;
  private readonly clock: () => number;
  private readonly idFactory: () => string;

  private readonly router: EscalationRouter;
  private readonly channel = new StatusChannel();
  private readonly tracker: HeldStateTracker;
  private readonly watchdog: TimeoutWatchdog;
  private readonly dispatcher: TaskDispatcher;
  private readonly locks = new KeyedLock();
  private readonly sideEffects = new Set<Promise<void>>();
  private started = false;
  private recovery: Promise<void> | null = null;

  constructor(options: EngineOptions = {}) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.clock = options.clock ?? (() => Date.now());
    this.idFactory = options.idFactory ?? randomUUID;
    this.store = options.store ?? new FileDecisionStore();
    this.cache = options.cache ?? new DecisionCache(new FileDecisionCacheStore(), this.clock);
    this.classifier = options.classifier;
    this.reviewQueue = options.reviewQueue ?? new ReviewQueue(this.clock);
    this.decisionLog = options.decisionLog === undefined ? new DecisionLog() : options.decisionLog;
    this.stats = options.stats === undefined ? new StatsTracker() : options.stats;

    this.router = new EscalationRouter(new ConditionalRuleSet(this.config.conditionalRules));
    this.tracker = new HeldStateTracker(
      { maxHeldPerSession: this.config.maxHeldPerSession, criticalRisk: this.config.criticalRisk },
      this.store,
      this.channel
    );
    this.watchdog = new TimeoutWatchdog((entry) => this.handleExpiry(entry), this.clock);
    this.dispatcher = new TaskDispatcher({
      store: this.store,
      watchdog: this.watchdog,
      reviewQueue: this.reviewQueue,
      transport: options.transport ?? new LogTransport(),
      timeoutMs: this.config.timeoutMs,
      reviewTtlMs: this.config.reviewTtlMs,
      clock: this.clock,
      idFactory: this.idFactory,
    });
  }

  /**
   * Engine backed by the files of a data directory, configured from its config.json
   */
  static fromDataDir(dataDir: string = HOLDGATE_DATA_DIR, options: EngineOptions = {}): Engine {
    const config = new ConfigStore(dataDir).loadSync();
    const clock = options.clock ?? (() => Date.now());
    return new Engine({
      ...options,
      clock,
      config: { ...config, ...options.config },
      store: options.store ?? new FileDecisionStore(dataDir),
      cache: options.cache ?? new DecisionCache(new FileDecisionCacheStore(dataDir), clock),
      decisionLog: options.decisionLog === undefined ? new DecisionLog(dataDir) : options.decisionLog,
      stats: options.stats === undefined ? new StatsTracker(dataDir) : options.stats,
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Recover held interactions (see recover()), then start the scheduling loop.
   */
  async start(): Promise<void> {
    if (this.started) return;
    await this.recover();
    this.watchdog.start();
    this.started = true;
  }

  /**
   * Stop the scheduling loop and wait for in-flight work to settle.
   * Pending deadlines stay queued and are re-armed by the next start().
   */
  async stop(): Promise<void> {
    this.watchdog.stop();
    await this.settle();
    this.started = false;
  }

  /**
   * Load the stores and bring held interactions back under management: count
   * them against their session, re-arm their deadlines and re-queue them for
   * review. Runs once, before the first call that touches state, whether or not
   * start() was called.
   */
  private recover(): Promise<void> {
    if (!this.recovery) {
      this.recovery = this.restoreHeld().catch((error: unknown) => {
        // Unreadable stores: the next call tries again
        this.recovery = null;
        throw error;
      });
    }
    return this.recovery;
  }

  private async restoreHeld(): Promise<void> {
    await this.store.load();
    await this.cache.load();

    const held = await this.store.listInteractions({ status: 'HELD' });
    for (const interaction of held) {
      this.tracker.restore(interaction.session, interaction.id, interaction.riskScore);

      const live = await this.store.liveTaskFor(interaction.id);
      if (live && live.id === interaction.escalationTaskId) {
        this.watchdog.schedule(live.id, interaction.id, live.deadline);
        this.reviewQueue.enqueue(
          live.target,
          reviewPayloadFor(interaction, live.reason),
          live.priority,
          this.config.reviewTtlMs
        );
        continue;
      }

      if (live) {
        await this.store.updateTaskStatus(live.id, ['queued', 'delivered'], 'expired');
      }
      if (interaction.escalationTaskId) {
        // No live task behind the hold: time it out now so it re-escalates or exhausts
        logger.warn('Engine: held interaction has no live task, timing out now', {
          interactionId: interaction.id,
          taskId: interaction.escalationTaskId,
        });
        this.watchdog.schedule(interaction.escalationTaskId, interaction.id, this.clock());
      } else {
        logger.warn('Engine: held interaction has no escalation task, awaiting a reviewer', {
          interactionId: interaction.id,
        });
      }
    }
    if (held.length > 0) {
      logger.info('Engine: recovered held interactions', { count: held.length });
    }
  }

  /** Wait for background notifications, expiry handlers and audit writes */
  async settle(): Promise<void> {
    await this.watchdog.idle();
    await this.dispatcher.flushNotifications();
    await Promise.all(Array.from(this.sideEffects));
    await this.store.flush();
  }

  // ---------------------------------------------------------------------------
  // Caller API
  // ---------------------------------------------------------------------------

  /**
   * Route a permission request. Returns without waiting on any reviewer.
   */
  async decide(request: InteractionRequest): Promise<EngineDecision> {
    validateRequest(request);
    await this.recover();

    const assessment = await this.assess(request);
    const riskBearing = assessment.riskScore > 0;

    if (riskBearing && !this.tracker.canAdmit(request.session)) {
      return this.refuseAdmission(request, assessment);
    }

    const learned = await this.cache.get(request.operation, request.scope);
    const decision = this.router.decide(
      assessment.riskScore,
      assessment.confidence,
      { operation: request.operation, scope: request.scope, session: request.session },
      () => learned
    );

    const interaction: Interaction = {
      id: this.idFactory(),
      operation: request.operation,
      scope: request.scope,
      session: request.session,
      riskScore: assessment.riskScore,
      confidence: assessment.confidence,
      status: 'PENDING',
      escalationCount: 0,
      createdAt: this.clock(),
    };

    // Re-check and reserve in one step: a concurrent decide() may have taken the last slot
    if (
      decision.kind === 'ESCALATE' &&
      !this.tracker.tryHold(request.session, interaction.id, assessment.riskScore)
    ) {
      return this.refuseAdmission(request, assessment);
    }

    this.logRouting(interaction, decision);

    switch (decision.kind) {
      case 'AUTO_APPROVE':
        await this.store.insertInteraction(interaction);
        await this.finishImmediately(interaction, 'AUTO_APPROVED', decision.reason);
        break;

      case 'CONDITIONAL_APPROVE':
        await this.store.insertInteraction(interaction);
        await this.finishImmediately(
          interaction,
          'CONDITIONAL_APPROVED',
          decision.reason,
          decision.safeguards
        );
        break;

      case 'ESCALATE':
        try {
          await this.store.insertInteraction(interaction);
          await this.locks.run(interaction.id, () =>
            this.dispatcher.createEscalation(
              interaction,
              targetForTier(this.config, decision.tier),
              decision.priority,
              decision.reason,
              decision.tier
            )
          );
        } catch (error) {
          this.tracker.release(interaction.session, interaction.id);
          throw error;
        }
        this.publish(await this.mustGet(interaction.id), 'PENDING');
        this.record('ESCALATED', interaction, {
          tier: decision.tier,
          priority: decision.priority,
          reason: decision.reason,
        });
        break;
    }

    return { ...decision, interactionId: interaction.id };
  }

  /**
   * Apply a reviewer decision to a HELD interaction. Idempotent: once the
   * interaction has left HELD, later calls change nothing and return the stored state.
   */
  async resolve(
    interactionId: string,
    decision: ReviewerDecision,
    actor: string
  ): Promise<Interaction> {
    if (decision !== 'approve' && decision !== 'deny') {
      throw new InvalidDecisionError(decision);
    }

    await this.recover();
    return this.locks.run(interactionId, async () => {
      const current = await this.store.getInteraction(interactionId);
      if (!current) {
        throw new InteractionNotFoundError(interactionId);
      }
      if (current.status !== 'HELD') {
        logger.warn('Engine: resolve ignored, interaction is not held', {
          interactionId,
          status: current.status,
          attempted: decision,
          actor,
        });
        return current;
      }

      const approved = decision === 'approve';
      const resolved = await this.store.transition(
        interactionId,
        { status: 'HELD' },
        {
          status: approved ? 'APPROVED' : 'DENIED',
          resolution: approved ? 'approved' : 'denied',
          reasonCode: approved ? REASON_REVIEWER_APPROVED : REASON_REVIEWER_DENIED,
          resolvedAt: this.clock(),
          resolvedBy: actor,
        }
      );
      if (!resolved) {
        logger.warn('Engine: resolve lost the race, discarded', { interactionId, actor });
        return this.mustGet(interactionId);
      }

      await this.releaseHeld(resolved, 'answered');
      this.publish(resolved, 'HELD');
      this.record(approved ? 'APPROVED' : 'DENIED', resolved, {
        tier: resolved.tier,
        actor,
        reason: resolved.reasonCode,
        decisionTime: (resolved.resolvedAt ?? this.clock()) - resolved.createdAt,
      });
      this.learn(resolved, approved ? 'success' : 'failure');

      logger.info(
        `${chalk.cyan('Holdgate:')} ${resolved.operation} ${resolved.scope} → ` +
          (approved ? chalk.green('APPROVED') : chalk.red('DENIED')),
        { interactionId, actor, tier: resolved.tier }
      );
      return resolved;
    });
  }

  /** Current state of an interaction, or undefined if unknown */
  async status(interactionId: string): Promise<Interaction | undefined> {
    await this.recover();
    return this.store.getInteraction(interactionId);
  }

  /** Escalation tasks of an interaction, oldest first */
  async tasks(interactionId: string): Promise<EscalationTask[]> {
    await this.recover();
    return this.store.listTasks(interactionId);
  }

  /**
   * Feed the learning cache with the outcome of an executed operation.
   */
  async recordOutcome(
    operation: InteractionRequest['operation'],
    scope: string,
    outcome: Outcome
  ): Promise<DecisionCacheEntry> {
    await this.recover();
    return this.cache.recordOutcome(operation, scope, outcome);
  }

  canAdmit(session: string): boolean {
    return this.tracker.canAdmit(session);
  }

  heldCount(session: string): number {
    return this.tracker.heldCount(session);
  }

  observeOutcome(interactionId: string): AsyncGenerator<Interaction, void, undefined> {
    return this.tracker.observeOutcome(interactionId);
  }

  subscribe(listener: StatusListener): () => void {
    return this.channel.subscribe(listener);
  }

  /**
   * Fire every deadline due at `now` (defaults to the engine clock) and wait for
   * the resulting transitions
   */
  async runDueTimeouts(now?: number): Promise<void> {
    await this.recover();
    await this.watchdog.runDue(now);
  }

  // ---------------------------------------------------------------------------
  // Timeouts
  // ---------------------------------------------------------------------------

  private handleExpiry(entry: DeadlineEntry): Promise<void> {
    return this.locks.run(entry.interactionId, async () => {
      const current = await this.store.getInteraction(entry.interactionId);
      if (!current || current.status !== 'HELD' || current.escalationTaskId !== entry.taskId) {
        logger.warn('Engine: timeout discarded, interaction already moved on', {
          interactionId: entry.interactionId,
          taskId: entry.taskId,
          status: current?.status ?? 'missing',
        });
        return;
      }

      try {
        await this.expire(current, entry.taskId);
      } catch (error) {
        // The interaction is still held by this task; try the same deadline again later
        logger.error('Engine: timeout handling failed, will retry', {
          interactionId: current.id,
          taskId: entry.taskId,
          retryInMs: EXPIRY_RETRY_MS,
          error,
        });
        this.watchdog.schedule(entry.taskId, entry.interactionId, this.clock() + EXPIRY_RETRY_MS);
      }
    });
  }

  private async expire(current: Interaction, taskId: string): Promise<void> {
    const tier = current.tier ?? 1;
    const exhausted =
      tier >= this.config.maxTiers || current.escalationCount + 1 > this.config.maxTiers;

    if (exhausted) {
      await this.exhaust(current, taskId);
      return;
    }

    const nextTier = tier + 1;
    const reason = `timeout at tier ${tier}`;
    const newTaskId = await this.dispatcher.reEscalate(current, taskId, {
      target: targetForTier(this.config, nextTier),
      priority: 10,
      reason,
      tier: nextTier,
    });
    if (newTaskId === null) {
      return;
    }

    const updated = await this.mustGet(current.id);
    this.publish(updated, 'HELD');
    this.record('RE_ESCALATED', updated, { tier: nextTier, priority: 10, reason });
  }

  private async exhaust(current: Interaction, taskId: string): Promise<void> {
    const denied = await this.store.transition(
      current.id,
      { status: 'HELD', taskId },
      {
        status: 'DENIED',
        resolution: 'timed-out-exhausted',
        reasonCode: REASON_ESCALATION_EXHAUSTED,
        resolvedAt: this.clock(),
        resolvedBy: SYSTEM_ACTOR,
      }
    );
    if (!denied) {
      logger.warn('Engine: exhaustion lost the race, discarded', { interactionId: current.id });
      return;
    }

    await this.releaseHeld(denied, 'expired');
    this.publish(denied, 'HELD');
    this.record('EXHAUSTED', denied, { tier: denied.tier, reason: REASON_ESCALATION_EXHAUSTED });
    logger.warn(`${chalk.cyan('Holdgate:')} escalation exhausted → ${chalk.red('DENIED')}`, {
      interactionId: denied.id,
      tier: denied.tier,
      escalationCount: denied.escalationCount,
    });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async assess(request: InteractionRequest): Promise<RiskAssessment> {
    const supplied = { riskScore: request.riskScore, confidence: request.confidence };
    if (isValidAssessment(supplied)) {
      return supplied;
    }
    if (request.riskScore !== undefined || request.confidence !== undefined) {
      logger.warn('Engine: supplied risk assessment is invalid, failing safe', {
        operation: request.operation,
        scope: request.scope,
        riskScore: request.riskScore,
        confidence: request.confidence,
      });
      return FAIL_SAFE_ASSESSMENT;
    }
    if (!this.classifier) {
      logger.warn('Engine: no risk assessment and no classifier, failing safe', {
        operation: request.operation,
        scope: request.scope,
      });
      return FAIL_SAFE_ASSESSMENT;
    }

    try {
      const result: unknown = await this.classifier.classify(
        request.operation,
        request.scope,
        request.sessionContext ?? {}
      );
      if (isValidAssessment(result)) {
        return { riskScore: result.riskScore, confidence: result.confidence };
      }
      logger.warn('Engine: classifier returned an invalid assessment, failing safe', {
        operation: request.operation,
        scope: request.scope,
      });
    } catch (error) {
      logger.warn('Engine: classifier failed, failing safe', {
        operation: request.operation,
        scope: request.scope,
        error,
      });
    }
    return FAIL_SAFE_ASSESSMENT;
  }

  private refuseAdmission(
    request: InteractionRequest,
    assessment: RiskAssessment
  ): EngineDecision {
    const reason =
      `session ${request.session} holds ${this.tracker.heldCount(request.session)} ` +
      `interaction(s) awaiting review`;
    logger.warn('Engine: admission denied', {
      session: request.session,
      operation: request.operation,
      scope: request.scope,
    });
    this.audit({
      timestamp: new Date(this.clock()).toISOString(),
      event: 'ADMISSION_DENIED',
      session: request.session,
      operation: request.operation,
      scope: request.scope,
      riskScore: assessment.riskScore,
      confidence: assessment.confidence,
      reason,
    });
    return { kind: 'ADMISSION_DENIED', reason };
  }

  private async finishImmediately(
    interaction: Interaction,
    status: 'AUTO_APPROVED' | 'CONDITIONAL_APPROVED',
    reason: string,
    safeguards?: Interaction['safeguards']
  ): Promise<void> {
    const done = await this.store.transition(
      interaction.id,
      { status: 'PENDING' },
      {
        status,
        resolution: 'approved',
        reasonCode: reason,
        resolvedAt: this.clock(),
        resolvedBy: SYSTEM_ACTOR,
        safeguards,
      }
    );
    if (!done) {
      throw new HoldgateError('INVALID_STATE', `Interaction ${interaction.id} left PENDING unexpectedly`);
    }
    this.publish(done, 'PENDING');
    this.record(status, done, { reason });
  }

  /**
   * Runs after the interaction's terminal state is stored. The hold is released
   * first; the task record is only bookkeeping once the interaction is terminal.
   */
  private async releaseHeld(interaction: Interaction, taskStatus: 'answered' | 'expired'): Promise<void> {
    this.reviewQueue.remove(interaction.id);
    this.tracker.release(interaction.session, interaction.id);
    if (!interaction.escalationTaskId) {
      return;
    }
    this.watchdog.cancel(interaction.escalationTaskId);
    try {
      await this.store.updateTaskStatus(
        interaction.escalationTaskId,
        ['queued', 'delivered'],
        taskStatus
      );
    } catch (error) {
      logger.error('Engine: failed to close escalation task', {
        interactionId: interaction.id,
        taskId: interaction.escalationTaskId,
        taskStatus,
        error,
      });
    }
  }

  private learn(interaction: Interaction, outcome: Outcome): void {
    this.background(
      this.cache
        .recordOutcome(interaction.operation, interaction.scope, outcome)
        .then(() => undefined)
        .catch((error: unknown) => {
          logger.error('Engine: failed to record outcome in decision cache', {
            interactionId: interaction.id,
            error,
          });
        })
    );
  }

  private record(
    event: DecisionEvent,
    interaction: Interaction,
    extra: Partial<DecisionRecord> = {}
  ): void {
    this.audit({
      timestamp: new Date(this.clock()).toISOString(),
      event,
      interactionId: interaction.id,
      session: interaction.session,
      operation: interaction.operation,
      scope: interaction.scope,
      riskScore: interaction.riskScore,
      confidence: interaction.confidence,
      ...extra,
    });
  }

  /** Audit trail and counters are best-effort; they never fail a transition */
  private audit(record: DecisionRecord): void {
    if (this.decisionLog) {
      this.background(this.decisionLog.append(record));
    }
    if (this.stats) {
      this.background(
        this.stats.increment(record.event, record.decisionTime).catch((error: unknown) => {
          logger.error('Engine: failed to update stats', { event: record.event, error });
        })
      );
    }
  }

  private background(work: Promise<void>): void {
    this.sideEffects.add(work);
    void work.finally(() => this.sideEffects.delete(work));
  }

  private publish(interaction: Interaction, previousStatus: InteractionStatus): void {
    const event: StatusEvent = { interaction, previousStatus };
    this.channel.publish(event);
  }

  private logRouting(interaction: Interaction, decision: Decision): void {
    const label =
      decision.kind === 'AUTO_APPROVE'
        ? chalk.green(decision.kind)
        : decision.kind === 'CONDITIONAL_APPROVE'
          ? chalk.yellow(decision.kind)
          : chalk.red(`${decision.kind}(tier ${decision.tier}, p${decision.priority})`);

    logger.info(`${chalk.cyan('Holdgate:')} ${interaction.operation} ${interaction.scope} → ${label}`, {
      interactionId: interaction.id,
      session: interaction.session,
      riskScore: interaction.riskScore,
      confidence: interaction.confidence,
      reason: decision.reason,
    });
  }

  private async mustGet(interactionId: string): Promise<Interaction> {
    const found = await this.store.getInteraction(interactionId);
    if (!found) {
      throw new InteractionNotFoundError(interactionId);
    }
    return found;
  }
}

function isUnitInterval(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

function isValidAssessment(value: unknown): value is RiskAssessment {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const v: Record<string, unknown> = { ...value };
  return isUnitInterval(v.riskScore) && isUnitInterval(v.confidence);
}

function validateRequest(request: InteractionRequest): void {
  if (!OPERATIONS.includes(request.operation)) {
    throw new HoldgateError('INVALID_REQUEST', `Unknown operation: ${String(request.operation)}`);
  }
  if (typeof request.scope !== 'string' || typeof request.session !== 'string' || !request.session) {
    throw new HoldgateError('INVALID_REQUEST', 'Requests need a scope and a session');
  }
}
