/**
 * Holdgate DecisionCache
 * Learned outcome aggregates per (operation, scope) (~/.holdgate/cache.json)
 *
 * The backing DecisionCacheStore is authoritative; the in-memory index is a
 * read-through layer in front of it. Counter updates for one key are serialized
 * through a per-key write chain, so concurrent outcome writes never lose an
 * increment and readers only ever see a complete entry.
 */

import fs from 'fs-extra';
import path from 'path';
import { DecisionCacheEntry, OPERATIONS, Operation, Outcome } from '../types';
import { HOLDGATE_DATA_DIR, logger } from '../core/Logger';
import { StoreError } from '../core/errors';
import { KeyedLock } from '../core/KeyedLock';

/** Minimum observations before an entry may auto-approve (exclusive) */
export const AUTO_APPROVE_MIN_OBSERVED = 3;
/** Minimum success rate before an entry may auto-approve (exclusive) */
export const AUTO_APPROVE_MIN_SUCCESS_RATE = 0.9;

const SUCCESS_RATE_TOLERANCE = 1e-9;

export interface DecisionCacheStore {
  load(): Promise<void>;
  get(key: string): Promise<unknown>;
  put(entry: DecisionCacheEntry): Promise<void>;
  all(): Promise<unknown[]>;
  clear(): Promise<void>;
}

export function cacheKey(operation: Operation, scope: string): string {
  return `${operation}::${scope}`;
}

export function qualifiesForAutoApprove(entry: DecisionCacheEntry): boolean {
  return (
    entry.observedCount > AUTO_APPROVE_MIN_OBSERVED &&
    entry.successRate > AUTO_APPROVE_MIN_SUCCESS_RATE
  );
}

/**
 * Structural check for entries read back from storage. Anything that fails is
 * treated as if no entry existed.
 */
export function isValidCacheEntry(value: unknown): value is DecisionCacheEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const e: Record<string, unknown> = { ...value };
  const counts = [e.observedCount, e.successCount, e.failureCount];
  if (!counts.every((n) => typeof n === 'number' && Number.isInteger(n) && n >= 0)) {
    return false;
  }
  if (typeof e.successRate !== 'number' || e.successRate < 0 || e.successRate > 1) {
    return false;
  }
  if (typeof e.operation !== 'string' || !OPERATIONS.some((op) => op === e.operation)) {
    return false;
  }
  const successCount = Number(e.successCount);
  const observedCount = Number(e.observedCount);
  if (observedCount !== successCount + Number(e.failureCount)) {
    return false;
  }
  // The stored rate must agree with the counts it was derived from
  const expectedRate = observedCount === 0 ? 0 : successCount / observedCount;
  if (Math.abs(e.successRate - expectedRate) > SUCCESS_RATE_TOLERANCE) {
    return false;
  }
  return typeof e.key === 'string' && typeof e.scope === 'string' && typeof e.lastUsedAt === 'number';
}

export class MemoryDecisionCacheStore implements DecisionCacheStore {
  protected entries = new Map<string, unknown>();

  async load(): Promise<void> {
    // Nothing to restore
  }

  async get(key: string): Promise<unknown> {
    await this.ready();
    const entry = this.entries.get(key);
    return entry === undefined ? undefined : structuredClone(entry);
  }

  async put(entry: DecisionCacheEntry): Promise<void> {
    await this.putRaw(entry.key, structuredClone(entry));
  }

  async all(): Promise<unknown[]> {
    await this.ready();
    return Array.from(this.entries.values()).map((e) => structuredClone(e));
  }

  async clear(): Promise<void> {
    await this.ready();
    const previous = this.entries;
    this.entries = new Map();
    try {
      await this.persist();
    } catch (error) {
      this.entries = previous;
      throw new StoreError('Failed to clear decision cache', error);
    }
  }

  /** Test and migration helper: store a raw value under a key */
  async putRaw(key: string, value: unknown): Promise<void> {
    await this.ready();
    const had = this.entries.has(key);
    const previous = this.entries.get(key);
    this.entries.set(key, value);
    try {
      await this.persist();
    } catch (error) {
      if (this.entries.get(key) === value) {
        if (had) {
          this.entries.set(key, previous);
        } else {
          this.entries.delete(key);
        }
      }
      throw new StoreError(`Failed to persist cache entry ${key}`, error);
    }
  }

  /** Resolves once the backing data is available; durable subclasses load on first use */
  protected async ready(): Promise<void> {
    // Always ready in memory
  }

  protected async persist(): Promise<void> {
    // In-memory only
  }
}

export class FileDecisionCacheStore extends MemoryDecisionCacheStore {
  private readonly cacheFile: string;
  private writeChain: Promise<void> = Promise.resolve();
  private loading: Promise<void> | null = null;

  constructor(private readonly dataDir: string = HOLDGATE_DATA_DIR) {
    super();
    this.cacheFile = path.join(dataDir, 'cache.json');
  }

  /** (Re)read cache.json. Every other method loads it on first use. */
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
      if (!(await fs.pathExists(this.cacheFile))) {
        this.entries = new Map();
        return;
      }
      const data: unknown = await fs.readJson(this.cacheFile);
      if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        throw new StoreError(`${this.cacheFile} does not contain an object`);
      }
      this.entries = new Map(Object.entries(data));
      logger.info('Decision cache loaded from disk', {
        path: this.cacheFile,
        entries: this.entries.size,
      });
    } catch (error) {
      logger.error('Failed to load decision cache', { error });
      throw new StoreError(`Failed to load decision cache: ${error}`, error);
    }
  }

  protected async persist(): Promise<void> {
    const op = this.writeChain.then(async () => {
      await fs.ensureDir(this.dataDir);
      await fs.writeJson(this.cacheFile, Object.fromEntries(this.entries), { spaces: 2 });
    });
    this.writeChain = op.catch((error: unknown) => {
      logger.error('Failed to persist decision cache', { error });
    });
    return op;
  }

  getPath(): string {
    return this.cacheFile;
  }
}

export class DecisionCache {
  private index = new Map<string, DecisionCacheEntry>();
  private readonly locks = new KeyedLock();

  constructor(
    private readonly store: DecisionCacheStore = new FileDecisionCacheStore(),
    private readonly clock: () => number = () => Date.now()
  ) {}

  async load(): Promise<void> {
    await this.store.load();
    this.index.clear();
  }

  /**
   * Returns the entry for (operation, scope) only when it is strong enough to
   * auto-approve. Misses, storage failures and corrupted entries all yield undefined.
   */
  async lookup(operation: Operation, scope: string): Promise<DecisionCacheEntry | undefined> {
    const entry = await this.get(operation, scope);
    return entry && qualifiesForAutoApprove(entry) ? entry : undefined;
  }

  /** Raw (validated) entry regardless of the auto-approve threshold */
  async get(operation: Operation, scope: string): Promise<DecisionCacheEntry | undefined> {
    const key = cacheKey(operation, scope);
    const cached = this.index.get(key);
    if (cached) {
      return { ...cached };
    }

    let stored: unknown;
    try {
      stored = await this.store.get(key);
    } catch (error) {
      logger.warn('Decision cache read failed, treating as miss', { key, error });
      return undefined;
    }
    if (stored === undefined) {
      return undefined;
    }
    if (!isValidCacheEntry(stored) || stored.key !== key) {
      logger.warn('Corrupted decision cache entry ignored', { key });
      return undefined;
    }
    this.index.set(key, stored);
    return { ...stored };
  }

  /**
   * Record the outcome of an (operation, scope) pair and recompute its success rate.
   */
  recordOutcome(operation: Operation, scope: string, outcome: Outcome): Promise<DecisionCacheEntry> {
    const key = cacheKey(operation, scope);
    return this.locks.run(key, async () => {
      const previous = await this.get(operation, scope);
      const successCount = (previous?.successCount ?? 0) + (outcome === 'success' ? 1 : 0);
      const failureCount = (previous?.failureCount ?? 0) + (outcome === 'failure' ? 1 : 0);
      const observedCount = successCount + failureCount;

      const next: DecisionCacheEntry = {
        key,
        operation,
        scope,
        observedCount,
        successCount,
        failureCount,
        successRate: successCount / observedCount,
        lastUsedAt: this.clock(),
      };

      await this.store.put(next);
      this.index.set(key, next);

      logger.debug('Decision cache updated', {
        key,
        outcome,
        observedCount,
        successRate: next.successRate,
      });
      return { ...next };
    });
  }

  /** Forget every learned entry */
  async clear(): Promise<void> {
    await this.store.clear();
    this.index.clear();
  }

  /** Every valid entry in the backing store */
  async entries(): Promise<DecisionCacheEntry[]> {
    const all = await this.store.all();
    return all.filter(isValidCacheEntry);
  }
}
