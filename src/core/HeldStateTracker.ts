/**
 * Holdgate HeldStateTracker
 * Per-session accounting of HELD interactions - the only backpressure point.
 *
 * A session keeps working while some of its interactions are held. It stops
 * being admitted new risk-bearing operations when it already holds
 * maxHeldPerSession interactions, or when any held interaction is critical.
 * All checks and reservations are synchronous, so concurrent admits for one
 * session cannot overshoot the cap.
 */

import { Interaction, TERMINAL_STATUSES } from '../types';
import { DecisionStore } from '../storage/DecisionStore';
import { InteractionNotFoundError } from './errors';
import { StatusChannel } from './StatusChannel';
import { logger } from './Logger';

export interface HeldLimits {
  maxHeldPerSession: number;
  criticalRisk: number;
}

export class HeldStateTracker {
  private held = new Map<string, Map<string, number>>(); // session → interactionId → risk

  constructor(
    private readonly limits: HeldLimits,
    private readonly store: DecisionStore,
    private readonly channel: StatusChannel
  ) {}

  canAdmit(session: string): boolean {
    const forSession = this.held.get(session);
    if (!forSession) {
      return true;
    }
    if (forSession.size >= this.limits.maxHeldPerSession) {
      return false;
    }
    for (const risk of forSession.values()) {
      if (risk > this.limits.criticalRisk) {
        return false;
      }
    }
    return true;
  }

  /**
   * Check admission and reserve a held slot in one step. Operations with no
   * risk are never refused.
   */
  tryHold(session: string, interactionId: string, riskScore: number): boolean {
    if (riskScore > 0 && !this.canAdmit(session)) {
      logger.warn('HeldStateTracker: admission refused', {
        session,
        interactionId,
        held: this.heldCount(session),
      });
      return false;
    }
    this.add(session, interactionId, riskScore);
    return true;
  }

  /**
   * Re-register an interaction that was already held (restart recovery)
   */
  restore(session: string, interactionId: string, riskScore: number): void {
    this.add(session, interactionId, riskScore);
  }

  release(session: string, interactionId: string): void {
    const forSession = this.held.get(session);
    if (!forSession) return;
    forSession.delete(interactionId);
    if (forSession.size === 0) {
      this.held.delete(session);
    }
  }

  heldCount(session: string): number {
    return this.held.get(session)?.size ?? 0;
  }

  /**
   * Status snapshots of one interaction: the current state first, then every
   * change, ending with the first terminal state. Nothing runs until the first
   * value is pulled, and every call starts a fresh, independent sequence.
   */
  async *observeOutcome(interactionId: string): AsyncGenerator<Interaction, void, undefined> {
    const buffer: Interaction[] = [];
    let wake: (() => void) | null = null;

    // Subscribe before reading so no change can slip between the read and the subscription
    const unsubscribe = this.channel.subscribeTo(interactionId, (event) => {
      buffer.push(event.interaction);
      if (wake) {
        wake();
        wake = null;
      }
    });

    try {
      const current = await this.store.getInteraction(interactionId);
      if (!current) {
        throw new InteractionNotFoundError(interactionId);
      }

      let lastSeen = snapshotSignature(current);
      yield current;
      if (isTerminal(current)) {
        return;
      }

      for (;;) {
        while (buffer.length === 0) {
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
        }
        const next = buffer.shift();
        if (!next || snapshotSignature(next) === lastSeen) {
          continue;
        }
        lastSeen = snapshotSignature(next);
        yield next;
        if (isTerminal(next)) {
          return;
        }
      }
    } finally {
      unsubscribe();
    }
  }

  private add(session: string, interactionId: string, riskScore: number): void {
    let forSession = this.held.get(session);
    if (!forSession) {
      forSession = new Map();
      this.held.set(session, forSession);
    }
    forSession.set(interactionId, riskScore);
  }
}

function isTerminal(interaction: Interaction): boolean {
  return TERMINAL_STATUSES.includes(interaction.status);
}

function snapshotSignature(interaction: Interaction): string {
  return `${interaction.status}:${interaction.tier ?? 0}:${interaction.escalationCount}`;
}
