/**
 * Holdgate TaskDispatcher
 * Turns an ESCALATE decision into a held interaction plus one live escalation task.
 *
 * createEscalation() returns as soon as the state is written and the deadline is
 * scheduled. The held transition is the only write that can fail an escalation;
 * task bookkeeping after it is logged on failure. Notifying the reviewer is
 * best-effort and runs in the background: a failed delivery is logged and leaves
 * the task `queued`, still governed by its deadline. Only the interaction is
 * held - the session that raised it is never waiting on this call.
 */

import { randomUUID } from 'crypto';
import {
  EscalationTask,
  Interaction,
  NotificationTransport,
  ReviewPayload,
} from '../types';
import { DecisionStore, TransitionGuard } from '../storage/DecisionStore';
import { ReviewQueue } from './ReviewQueue';
import { TimeoutWatchdog } from './TimeoutWatchdog';
import { StoreError } from './errors';
import { logger } from './Logger';

export interface DispatcherDeps {
  store: DecisionStore;
  watchdog: TimeoutWatchdog;
  reviewQueue: ReviewQueue;
  transport: NotificationTransport;
  timeoutMs: number;
  reviewTtlMs: number;
  clock?: () => number;
  idFactory?: () => string;
}

export interface EscalationRequest {
  target: string;
  priority: number;
  reason: string;
  tier: number;
}

/** What a reviewer is shown for a held interaction */
export function reviewPayloadFor(interaction: Interaction, reason: string): ReviewPayload {
  return {
    interactionId: interaction.id,
    operation: interaction.operation,
    scope: interaction.scope,
    session: interaction.session,
    riskScore: interaction.riskScore,
    confidence: interaction.confidence,
    reason,
    expectedResponse: ['APPROVE', 'DENY'],
  };
}

export class TaskDispatcher {
  private readonly clock: () => number;
  private readonly idFactory: () => string;
  private readonly inflight = new Set<Promise<void>>();

  constructor(private readonly deps: DispatcherDeps) {
    this.clock = deps.clock ?? (() => Date.now());
    this.idFactory = deps.idFactory ?? randomUUID;
  }

  /**
   * Hold a PENDING interaction at the requested tier.
   * @returns the id of the new escalation task
   */
  async createEscalation(
    interaction: Interaction,
    target: string,
    priority: number,
    reason: string,
    tier: number = 1
  ): Promise<string> {
    const now = this.clock();
    const taskId = await this.dispatch(
      interaction,
      { status: 'PENDING' },
      { target, priority, reason, tier },
      { heldAt: now, escalationCount: interaction.escalationCount }
    );
    if (taskId === null) {
      throw new StoreError(`Interaction ${interaction.id} is no longer PENDING`);
    }
    return taskId;
  }

  /**
   * Replace the live task of a HELD interaction with one at a higher tier.
   * The prior task is expired first. Returns null when the interaction was no
   * longer held by `expectedTaskId` (someone else already moved it).
   */
  async reEscalate(
    interaction: Interaction,
    expectedTaskId: string,
    request: EscalationRequest
  ): Promise<string | null> {
    return this.dispatch(
      interaction,
      { status: 'HELD', taskId: expectedTaskId },
      request,
      { escalationCount: interaction.escalationCount + 1 }
    );
  }

  /** Resolves once every background notification started so far has settled */
  async flushNotifications(): Promise<void> {
    await Promise.all(Array.from(this.inflight));
  }

  private async dispatch(
    interaction: Interaction,
    guard: TransitionGuard,
    request: EscalationRequest,
    extra: Partial<Interaction>
  ): Promise<string | null> {
    const now = this.clock();
    const task: EscalationTask = {
      id: this.idFactory(),
      interactionId: interaction.id,
      target: request.target,
      tier: request.tier,
      priority: request.priority,
      reason: request.reason,
      createdAt: now,
      deadline: now + this.deps.timeoutMs,
      status: 'queued',
    };

    // The interaction becomes held by the new task; this is the atomic step
    const held = await this.deps.store.transition(interaction.id, guard, {
      ...extra,
      status: 'HELD',
      tier: request.tier,
      escalationTarget: request.target,
      escalationTaskId: task.id,
      escalationReason: request.reason,
    });
    if (!held) {
      logger.warn('TaskDispatcher: interaction changed before escalation, discarded', {
        interactionId: interaction.id,
        expected: guard,
      });
      return null;
    }

    // Armed before any further write, so the hold times out even if one fails
    this.deps.watchdog.schedule(task.id, interaction.id, task.deadline);

    const priorTaskId = guard.taskId;
    if (priorTaskId !== undefined) {
      this.deps.watchdog.cancel(priorTaskId);
      await this.bestEffort('expire prior task', priorTaskId, () =>
        this.deps.store.updateTaskStatus(priorTaskId, ['queued', 'delivered'], 'expired')
      );
    }
    await this.bestEffort('store task', task.id, () => this.deps.store.insertTask(task));

    const payload = reviewPayloadFor(held, request.reason);
    this.deps.reviewQueue.enqueue(request.target, payload, request.priority, this.deps.reviewTtlMs);
    this.deliver(task, payload);

    logger.info(`TaskDispatcher: interaction held at tier ${request.tier}`, {
      interactionId: held.id,
      taskId: task.id,
      target: request.target,
      priority: request.priority,
      reason: request.reason,
      escalationCount: held.escalationCount,
      deadline: new Date(task.deadline).toISOString(),
    });
    return task.id;
  }

  /** Task bookkeeping after the hold is in place; a failure is logged and the escalation goes on */
  private async bestEffort(what: string, taskId: string, write: () => Promise<unknown>): Promise<void> {
    try {
      await write();
    } catch (error) {
      logger.error(`TaskDispatcher: failed to ${what}`, { taskId, error });
    }
  }

  private deliver(task: EscalationTask, payload: ReviewPayload): void {
    const delivery = (async () => {
      try {
        await this.deps.transport.notify(task.target, payload);
        await this.deps.store.updateTaskStatus(task.id, ['queued'], 'delivered');
      } catch (error) {
        logger.warn('TaskDispatcher: notification delivery failed, task stays queued', {
          taskId: task.id,
          interactionId: task.interactionId,
          target: task.target,
          error,
        });
      }
    })();
    this.inflight.add(delivery);
    void delivery.finally(() => this.inflight.delete(delivery));
  }
}
