/**
 * Temporary data directories and engine fixtures for tests.
 */

import { mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { Engine, EngineOptions } from '../../core/Engine';
import { MemoryDecisionStore } from '../../storage/DecisionStore';
import { DecisionCache, MemoryDecisionCacheStore } from '../../storage/DecisionCache';

export interface TestDir {
  path: string;
  cleanup: () => void;
}

export function createTestDir(): TestDir {
  const dirPath = join(tmpdir(), `holdgate-test-${randomUUID().slice(0, 8)}`);
  mkdirSync(dirPath, { recursive: true });
  return {
    path: dirPath,
    cleanup: () => rmSync(dirPath, { recursive: true, force: true }),
  };
}

export interface ManualClock {
  now: () => number;
  advance: (ms: number) => void;
}

export const START_TIME = 1_700_000_000_000;

export function createClock(start: number = START_TIME): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export interface EngineFixture {
  engine: Engine;
  clock: ManualClock;
  store: MemoryDecisionStore;
  cacheStore: MemoryDecisionCacheStore;
  transport: { notify: Mock };
}

/**
 * Engine on in-memory stores with a manual clock; deadlines fire only through
 * engine.runDueTimeouts().
 */
export function createEngineFixture(overrides: EngineOptions = {}): EngineFixture {
  const clock = createClock();
  const store = new MemoryDecisionStore();
  const cacheStore = new MemoryDecisionCacheStore();
  const transport = { notify: vi.fn() };
  const engine = new Engine({
    store,
    cache: new DecisionCache(cacheStore, clock.now),
    transport,
    decisionLog: null,
    stats: null,
    clock: clock.now,
    ...overrides,
  });
  return { engine, clock, store, cacheStore, transport };
}
