/**
 * Holdgate StatusChannel
 * Subscribe/notify channel for interaction status changes.
 */

import { StatusEvent } from '../types';
import { logger } from './Logger';

export type StatusListener = (event: StatusEvent) => void;

export class StatusChannel {
  private readonly all = new Set<StatusListener>();
  private readonly byInteraction = new Map<string, Set<StatusListener>>();

  publish(event: StatusEvent): void {
    const scoped = this.byInteraction.get(event.interaction.id);
    for (const listener of [...this.all, ...(scoped ?? [])]) {
      try {
        listener(event);
      } catch (error) {
        logger.warn('Status listener threw', { interactionId: event.interaction.id, error });
      }
    }
  }

  /** Every status change. Returns the unsubscribe function. */
  subscribe(listener: StatusListener): () => void {
    this.all.add(listener);
    return () => {
      this.all.delete(listener);
    };
  }

  /** Status changes of one interaction. Returns the unsubscribe function. */
  subscribeTo(interactionId: string, listener: StatusListener): () => void {
    let listeners = this.byInteraction.get(interactionId);
    if (!listeners) {
      listeners = new Set();
      this.byInteraction.set(interactionId, listeners);
    }
    listeners.add(listener);

    return () => {
      const current = this.byInteraction.get(interactionId);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) {
        this.byInteraction.delete(interactionId);
      }
    };
  }

  get listenerCount(): number {
    let count = this.all.size;
    for (const listeners of this.byInteraction.values()) {
      count += listeners.size;
    }
    return count;
  }
}
