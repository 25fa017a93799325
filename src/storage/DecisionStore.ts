/**
 * Holdgate DecisionStore
 * Interactions and escalation tasks (~/.holdgate/interactions.json, tasks.json)
 *
 * Status changes go through transition(), a compare-and-set on the stored status:
 * the check and the write happen in the same synchronous step, so two writers racing
 * for the same HELD interaction can never both succeed.
 */

import fs from 'fs-extra';
import path from 'path';
import {
  EscalationTask,
  Interaction,
  InteractionStatus,
  TaskStatus,
} from '../types';
import { HOLDGATE_DATA_DIR, logger } from '../core/Logger';
import { StoreError } from '../core/errors';

export interface TransitionGuard {
  status: InteractionStatus;
  /** Only succeed while this task is still the interaction's current one */
  taskId?: string;
}

export interface InteractionFilter {
  session?: string;
  status?: InteractionStatus;
}

export interface DecisionStore {
  load(): Promise<void>;
  insertInteraction(interaction: Interaction): Promise<void>;
  getInteraction(id: string): Promise<Interaction | undefined>;
  listInteractions(filter?: InteractionFilter): Promise<Interaction[]>;
  /** Returns the updated interaction, or null when the guard no longer holds */
  transition(
    id: string,
    guard: TransitionGuard,
    patch: Partial<Interaction>
  ): Promise<Interaction | null>;
  insertTask(task: EscalationTask): Promise<void>;
  getTask(id: string): Promise<EscalationTask | undefined>;
  /** Moves a task to `to` only if its current status is one of `from` */
  updateTaskStatus(id: string, from: TaskStatus[], to: TaskStatus): Promise<EscalationTask | null>;
  liveTaskFor(interactionId: string): Promise<EscalationTask | undefined>;
  listTasks(interactionId?: string): Promise<EscalationTask[]>;
  flush(): Promise<void>;
}

const LIVE_TASK_STATUSES: readonly TaskStatus[] = ['queued', 'delivered'];

export function isLiveTask(task: EscalationTask): boolean {
  return LIVE_TASK_STATUSES.includes(task.status);
}

export class MemoryDecisionStore implements DecisionStore {
  protected interactions = new Map<string, Interaction>();
  protected tasks = new Map<string, EscalationTask>();

  async load(): Promise<void> {
    // Nothing to restore
  }

  async insertInteraction(interaction: Interaction): Promise<void> {
    await this.ready();
    if (this.interactions.has(interaction.id)) {
      throw new StoreError(`Interaction ${interaction.id} already exists`);
    }
    this.interactions.set(interaction.id, structuredClone(interaction));
    await this.commit(`interaction ${interaction.id}`, () => {
      this.interactions.delete(interaction.id);
    });
  }

  async getInteraction(id: string): Promise<Interaction | undefined> {
    await this.ready();
    const found = this.interactions.get(id);
    return found ? structuredClone(found) : undefined;
  }

  async listInteractions(filter: InteractionFilter = {}): Promise<Interaction[]> {
    await this.ready();
    return Array.from(this.interactions.values())
      .filter((i) => (filter.session === undefined ? true : i.session === filter.session))
      .filter((i) => (filter.status === undefined ? true : i.status === filter.status))
      .map((i) => structuredClone(i));
  }

  async transition(
    id: string,
    guard: TransitionGuard,
    patch: Partial<Interaction>
  ): Promise<Interaction | null> {
    await this.ready();
    const current = this.interactions.get(id);
    if (!current || current.status !== guard.status) {
      return null;
    }
    if (guard.taskId !== undefined && current.escalationTaskId !== guard.taskId) {
      return null;
    }

    const next: Interaction = { ...current, ...patch, id: current.id };
    this.interactions.set(id, next);
    await this.commit(`interaction ${id}`, () => {
      if (this.interactions.get(id) === next) {
        this.interactions.set(id, current);
      }
    });
    return structuredClone(next);
  }

  async insertTask(task: EscalationTask): Promise<void> {
    await this.ready();
    const live = this.findLiveTask(task.interactionId);
    if (live) {
      throw new StoreError(
        `Interaction ${task.interactionId} already has live escalation task ${live.id}`
      );
    }
    this.tasks.set(task.id, structuredClone(task));
    await this.commit(`task ${task.id}`, () => {
      this.tasks.delete(task.id);
    });
  }

  async getTask(id: string): Promise<EscalationTask | undefined> {
    await this.ready();
    const found = this.tasks.get(id);
    return found ? structuredClone(found) : undefined;
  }

  async updateTaskStatus(
    id: string,
    from: TaskStatus[],
    to: TaskStatus
  ): Promise<EscalationTask | null> {
    await this.ready();
    const task = this.tasks.get(id);
    if (!task || !from.includes(task.status)) {
      return null;
    }
    const next: EscalationTask = { ...task, status: to };
    this.tasks.set(id, next);
    await this.commit(`task ${id}`, () => {
      if (this.tasks.get(id) === next) {
        this.tasks.set(id, task);
      }
    });
    return structuredClone(next);
  }

  async liveTaskFor(interactionId: string): Promise<EscalationTask | undefined> {
    await this.ready();
    const live = this.findLiveTask(interactionId);
    return live ? structuredClone(live) : undefined;
  }

  async listTasks(interactionId?: string): Promise<EscalationTask[]> {
    await this.ready();
    return Array.from(this.tasks.values())
      .filter((t) => (interactionId === undefined ? true : t.interactionId === interactionId))
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((t) => structuredClone(t));
  }

  async flush(): Promise<void> {
    // Writes are synchronous in memory
  }

  private findLiveTask(interactionId: string): EscalationTask | undefined {
    for (const task of this.tasks.values()) {
      if (task.interactionId === interactionId && isLiveTask(task)) {
        return task;
      }
    }
    return undefined;
  }

  /**
   * Persist a change already applied in memory; when that fails the change is
   * undone, so callers never observe state that was not written.
   */
  private async commit(what: string, undo: () => void): Promise<void> {
    try {
      await this.persist();
    } catch (error) {
      undo();
      throw new StoreError(`Failed to persist ${what}`, error);
    }
  }

  /** Resolves once the backing data is available; durable subclasses load on first use */
  protected async ready(): Promise<void> {
    // Always ready in memory
  }

  /** Hook for durable subclasses; called after every mutation */
  protected async persist(): Promise<void> {
    // In-memory only
  }
}

/**
 * Durable variant: the in-memory maps are authoritative while running and are
 * snapshotted to disk after every mutation through a serialized write chain.
 */
export class FileDecisionStore extends MemoryDecisionStore {
  private readonly interactionsFile: string;
  private readonly tasksFile: string;
  /** Serializes snapshot writes so an older snapshot never overwrites a newer one */
  private writeChain: Promise<void> = Promise.resolve();
  private loading: Promise<void> | null = null;

  constructor(private readonly dataDir: string = HOLDGATE_DATA_DIR) {
    super();
    this.interactionsFile = path.join(dataDir, 'interactions.json');
    this.tasksFile = path.join(dataDir, 'tasks.json');
  }

  /** (Re)read the snapshot files. Every other method loads them on first use. */
  load(): Promise<void> {
    this.loading = this.readSnapshot();
    return this.loading;
  }

  protected ready(): Promise<void> {
    if (!this.loading) {
      this.loading = this.readSnapshot();
    }
    return this.loading;
  }

  private async readSnapshot(): Promise<void> {
    try {
      await fs.ensureDir(this.dataDir);
      const interactions = await this.readArray<Interaction>(this.interactionsFile);
      const tasks = await this.readArray<EscalationTask>(this.tasksFile);

      this.interactions = new Map(interactions.map((i) => [i.id, i]));
      this.tasks = new Map(tasks.map((t) => [t.id, t]));

      logger.info('Decision store loaded from disk', {
        path: this.dataDir,
        interactions: this.interactions.size,
        tasks: this.tasks.size,
      });
    } catch (error) {
      logger.error('Failed to load decision store', { error });
      throw new StoreError(`Failed to load decision store: ${error}`, error);
    }
  }

  async flush(): Promise<void> {
    await this.writeChain;
  }

  protected async persist(): Promise<void> {
    const op = this.writeChain.then(async () => {
      await fs.ensureDir(this.dataDir);
      await fs.writeJson(this.interactionsFile, Array.from(this.interactions.values()), {
        spaces: 2,
      });
      await fs.writeJson(this.tasksFile, Array.from(this.tasks.values()), { spaces: 2 });
    });
    this.writeChain = op.catch((error: unknown) => {
      logger.error('Failed to persist decision store', { error });
    });
    return op;
  }

  private async readArray<T extends { id: string }>(file: string): Promise<T[]> {
    if (!(await fs.pathExists(file))) {
      return [];
    }
    const data: unknown = await fs.readJson(file);
    if (!Array.isArray(data)) {
      throw new StoreError(`${file} does not contain an array`);
    }
    return data.filter((row): row is T => hasStringId(row));
  }

  getPath(): string {
    return this.dataDir;
  }
}

function hasStringId(row: unknown): row is { id: string } {
  return typeof row === 'object' && row !== null && 'id' in row && typeof row.id === 'string';
}
