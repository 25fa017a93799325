/**
 * Holdgate DeadlineQueue
 * Binary min-heap of deadlines keyed by task id.
 *
 * cancel() is O(1): it only marks the entry stale. Stale entries stay in the
 * heap until they reach the top, where popDue()/peek() discard them.
 */

export interface DeadlineEntry {
  taskId: string;
  interactionId: string;
  deadline: number;
  seq: number;
  stale: boolean;
}

export class DeadlineQueue {
  private heap: DeadlineEntry[] = [];
  private live = new Map<string, DeadlineEntry>();
  private nextSeq = 0;

  get size(): number {
    return this.live.size;
  }

  has(taskId: string): boolean {
    return this.live.has(taskId);
  }

  /**
   * Schedule (or reschedule) the deadline of a task
   */
  push(taskId: string, interactionId: string, deadline: number): void {
    this.cancel(taskId);
    const entry: DeadlineEntry = {
      taskId,
      interactionId,
      deadline,
      seq: this.nextSeq++,
      stale: false,
    };
    this.live.set(taskId, entry);
    this.heap.push(entry);
    this.siftUp(this.heap.length - 1);
  }

  cancel(taskId: string): boolean {
    const entry = this.live.get(taskId);
    if (!entry) {
      return false;
    }
    entry.stale = true;
    this.live.delete(taskId);
    return true;
  }

  /** Earliest live deadline, or undefined when nothing is scheduled */
  peekDeadline(): number | undefined {
    this.dropStaleHead();
    return this.heap[0]?.deadline;
  }

  /**
   * Remove and return every live entry whose deadline is <= now, earliest first
   */
  popDue(now: number): DeadlineEntry[] {
    const due: DeadlineEntry[] = [];
    for (;;) {
      this.dropStaleHead();
      const head = this.heap[0];
      if (!head || head.deadline > now) {
        break;
      }
      this.popHead();
      this.live.delete(head.taskId);
      due.push(head);
    }
    return due;
  }

  clear(): void {
    this.heap = [];
    this.live.clear();
  }

  private dropStaleHead(): void {
    while (this.heap.length > 0 && this.heap[0].stale) {
      this.popHead();
    }
  }

  private popHead(): void {
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
  }

  private less(a: DeadlineEntry, b: DeadlineEntry): boolean {
    return a.deadline < b.deadline || (a.deadline === b.deadline && a.seq < b.seq);
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(this.heap[i], this.heap[parent])) {
        break;
      }
      [this.heap[i], this.heap[parent]] = [this.heap[parent], this.heap[i]];
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    const n = this.heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.less(this.heap[left], this.heap[smallest])) {
        smallest = left;
      }
      if (right < n && this.less(this.heap[right], this.heap[smallest])) {
        smallest = right;
      }
      if (smallest === i) {
        break;
      }
      [this.heap[i], this.heap[smallest]] = [this.heap[smallest], this.heap[i]];
      i = smallest;
    }
  }
}
