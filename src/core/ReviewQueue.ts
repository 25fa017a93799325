/**
 * Holdgate ReviewQueue
 * In-memory queue of review requests handed to reviewer targets.
 *
 * Flow:
 *  1. TaskDispatcher escalates → queue.enqueue(target, payload, priority, ttl)
 *  2. The reviewer side reads queue.pending(target), highest priority first
 *  3. Engine.resolve() or a re-escalation → queue.remove(interactionId)
 *
 * Entries past their ttl are dropped lazily; the authoritative state lives in the
 * DecisionStore, this queue only mirrors what a reviewer should be shown.
 */

import { ReviewPayload } from '../types';
import { logger } from './Logger';

export interface ReviewEntry {
  target: string;
  payload: ReviewPayload;
  priority: number;
  enqueuedAt: number;
  expiresAt: number;
}

/** Cleanup runs at most every 30 seconds. */
const CLEANUP_INTERVAL_MS = 30_000;

export class ReviewQueue {
  private entries = new Map<string, ReviewEntry>(); // interactionId → entry
  private lastCleanup: number;

  constructor(private readonly clock: () => number = () => Date.now()) {
    this.lastCleanup = clock();
  }

  // ---------------------------------------------------------------------------
  // Core API
  // ---------------------------------------------------------------------------

  /**
   * Queue a review request for a target. One entry per interaction: a newer
   * request (re-escalation) replaces the previous one.
   */
  enqueue(target: string, payload: ReviewPayload, priority: number, ttlMs: number): void {
    this.maybeCleanup();
    const now = this.clock();
    this.entries.set(payload.interactionId, {
      target,
      payload,
      priority,
      enqueuedAt: now,
      expiresAt: now + ttlMs,
    });
    logger.info(`ReviewQueue: request queued`, {
      target,
      interactionId: payload.interactionId,
      priority,
    });
  }

  /**
   * Drop the entry of an interaction (answered or superseded).
   */
  remove(interactionId: string): boolean {
    return this.entries.delete(interactionId);
  }

  /**
   * Live entries for a target, highest priority first, oldest first within a priority.
   */
  pending(target?: string): ReviewEntry[] {
    this.maybeCleanup();
    const now = this.clock();
    return Array.from(this.entries.values())
      .filter((e) => (target === undefined ? true : e.target === target))
      .filter((e) => now < e.expiresAt)
      .sort((a, b) => b.priority - a.priority || a.enqueuedAt - b.enqueuedAt);
  }

  /**
   * Count of live entries per target.
   */
  summary(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const entry of this.pending()) {
      counts[entry.target] = (counts[entry.target] ?? 0) + 1;
    }
    return counts;
  }

  // ---------------------------------------------------------------------------
  // Housekeeping
  // ---------------------------------------------------------------------------

  private maybeCleanup(): void {
    if (this.clock() - this.lastCleanup > CLEANUP_INTERVAL_MS) {
      this.cleanup();
    }
  }

  private cleanup(): void {
    const now = this.clock();
    for (const [k, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(k);
      }
    }
    this.lastCleanup = now;
  }
}
