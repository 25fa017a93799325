/**
 * Holdgate TimeoutWatchdog
 * One deadline per held task, all of them in a single DeadlineQueue serviced by
 * a single timer. The timer is always armed for the earliest live deadline;
 * there is never one timer per held interaction.
 */

import { DeadlineEntry, DeadlineQueue } from './DeadlineQueue';
import { logger } from './Logger';

export type ExpiryHandler = (entry: DeadlineEntry) => Promise<void>;

/** Longest single setTimeout delay Node accepts */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export class TimeoutWatchdog {
  private readonly queue = new DeadlineQueue();
  private timer: NodeJS.Timeout | null = null;
  private armedFor: number | null = null;
  private running = false;
  private draining: Promise<void> = Promise.resolve();

  constructor(
    private readonly onExpire: ExpiryHandler,
    private readonly clock: () => number = () => Date.now()
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.arm();
  }

  stop(): void {
    this.running = false;
    this.disarm();
  }

  get pending(): number {
    return this.queue.size;
  }

  isScheduled(taskId: string): boolean {
    return this.queue.has(taskId);
  }

  schedule(taskId: string, interactionId: string, deadline: number): void {
    this.queue.push(taskId, interactionId, deadline);
    logger.debug('Watchdog: deadline scheduled', { taskId, interactionId, deadline });
    this.arm();
  }

  /**
   * Drop a task's deadline. Safe to call for tasks that already fired.
   */
  cancel(taskId: string): void {
    if (this.queue.cancel(taskId)) {
      logger.debug('Watchdog: deadline cancelled', { taskId });
      this.arm();
    }
  }

  /**
   * Fire every deadline that is due at `now`. Expiry handlers run one after
   * another, in deadline order; the returned promise settles when they are done.
   */
  runDue(now: number = this.clock()): Promise<void> {
    const run = this.draining.then(async () => {
      const due = this.queue.popDue(now);
      for (const entry of due) {
        try {
          await this.onExpire(entry);
        } catch (error) {
          logger.error('Watchdog: expiry handler failed', {
            taskId: entry.taskId,
            interactionId: entry.interactionId,
            error,
          });
        }
      }
    });
    this.draining = run;
    return run.finally(() => this.arm());
  }

  /** Resolves once every expiry already started has been handled */
  idle(): Promise<void> {
    return this.draining;
  }

  private arm(): void {
    if (!this.running) return;

    const next = this.queue.peekDeadline();
    if (next === undefined) {
      this.disarm();
      return;
    }
    if (this.timer && this.armedFor === next) {
      return;
    }

    this.disarm();
    const delay = Math.min(Math.max(0, next - this.clock()), MAX_TIMER_DELAY_MS);
    this.armedFor = next;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.armedFor = null;
      void this.runDue();
    }, delay);
    this.timer.unref();
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = null;
    this.armedFor = null;
  }
}
