/**
 * Holdgate ConfigStore
 * Manages persistence of the engine configuration in ~/.holdgate/config.json
 */

import fs from 'fs-extra';
import { readFileSync, existsSync, mkdirSync, writeFileSync } from 'fs';
import path from 'path';
import { ConditionalRuleConfig, DEFAULT_CONFIG, EngineConfig, TierTarget } from '../config';
import { OPERATIONS } from '../types';
import { HOLDGATE_DATA_DIR, logger } from '../core/Logger';
import { StoreError } from '../core/errors';

export interface PersistedConfig extends EngineConfig {
  version: string;
  createdAt: string;
  updatedAt: string;
}

function defaultPersisted(): PersistedConfig {
  return {
    ...structuredClone(DEFAULT_CONFIG),
    version: '1.0.0',
    createdAt: new Date().toISOString(),
    updatedAt: new Date().toISOString(),
  };
}

function isTierTarget(value: unknown): value is TierTarget {
  if (typeof value !== 'object' || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return typeof v.tier === 'number' && typeof v.target === 'string';
}

function isConditionalRule(value: unknown): value is ConditionalRuleConfig {
  if (typeof value !== 'object' || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  const safeguards: Record<string, unknown> =
    typeof v.safeguards === 'object' && v.safeguards !== null ? { ...v.safeguards } : {};
  return (
    typeof v.name === 'string' &&
    OPERATIONS.some((op) => op === v.operation) &&
    (v.scopePrefixes === undefined ||
      (Array.isArray(v.scopePrefixes) && v.scopePrefixes.every((p) => typeof p === 'string'))) &&
    (v.scopePattern === undefined || typeof v.scopePattern === 'string') &&
    typeof safeguards.extraLogging === 'boolean' &&
    typeof safeguards.monitoring === 'boolean'
  );
}

/**
 * Stored values win over defaults; anything missing or of the wrong type falls
 * back to the default.
 */
export function mergeConfig(stored: unknown): PersistedConfig {
  const base = defaultPersisted();
  if (typeof stored !== 'object' || stored === null) {
    return base;
  }
  const s: Record<string, unknown> = { ...stored };
  const num = (key: keyof EngineConfig, fallback: number): number => {
    const v = s[key];
    return typeof v === 'number' && Number.isFinite(v) && v > 0 ? v : fallback;
  };
  // Counts are floored before the lower bound is checked
  const count = (key: keyof EngineConfig, fallback: number): number => {
    const v = s[key];
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      return fallback;
    }
    const whole = Math.floor(v);
    return whole >= 1 ? whole : fallback;
  };

  return {
    ...base,
    timeoutMs: num('timeoutMs', base.timeoutMs),
    maxTiers: count('maxTiers', base.maxTiers),
    maxHeldPerSession: count('maxHeldPerSession', base.maxHeldPerSession),
    criticalRisk: num('criticalRisk', base.criticalRisk),
    reviewTtlMs: num('reviewTtlMs', base.reviewTtlMs),
    tiers: Array.isArray(s.tiers) ? s.tiers.filter(isTierTarget) : base.tiers,
    conditionalRules: Array.isArray(s.conditionalRules)
      ? s.conditionalRules.filter(isConditionalRule)
      : base.conditionalRules,
    version: typeof s.version === 'string' ? s.version : base.version,
    createdAt: typeof s.createdAt === 'string' ? s.createdAt : base.createdAt,
    updatedAt: typeof s.updatedAt === 'string' ? s.updatedAt : base.updatedAt,
  };
}

export class ConfigStore {
  private readonly file: string;

  constructor(private readonly dataDir: string = HOLDGATE_DATA_DIR) {
    this.file = path.join(dataDir, 'config.json');
  }

  /**
   * Load the configuration from disk, or create the default if it doesn't exist
   */
  async load(): Promise<PersistedConfig> {
    try {
      await fs.ensureDir(this.dataDir);

      if (await fs.pathExists(this.file)) {
        const data: unknown = await fs.readJson(this.file);
        logger.info('Config loaded from disk', { path: this.file });
        return mergeConfig(data);
      }
      logger.info('No existing config found, creating default');
      const config = defaultPersisted();
      await this.save(config);
      return config;
    } catch (error) {
      logger.error('Failed to load config', { error });
      throw new StoreError(`Failed to load config: ${error}`, error);
    }
  }

  /**
   * Save the configuration to disk
   */
  async save(config: PersistedConfig): Promise<void> {
    try {
      await fs.ensureDir(this.dataDir);
      config.updatedAt = new Date().toISOString();
      await fs.writeJson(this.file, config, { spaces: 2 });
      logger.info('Config saved to disk', { path: this.file });
    } catch (error) {
      logger.error('Failed to save config', { error });
      throw new StoreError(`Failed to save config: ${error}`, error);
    }
  }

  /**
   * Reset configuration to defaults
   */
  async reset(): Promise<void> {
    await this.save(defaultPersisted());
    logger.info('Config reset to defaults');
  }

  /**
   * Load the configuration synchronously (for embedders that construct the engine eagerly)
   */
  loadSync(): PersistedConfig {
    try {
      if (!existsSync(this.dataDir)) {
        mkdirSync(this.dataDir, { recursive: true });
      }

      if (existsSync(this.file)) {
        const data: unknown = JSON.parse(readFileSync(this.file, 'utf-8'));
        logger.info('Config loaded from disk (sync)', { path: this.file });
        return mergeConfig(data);
      }
      const config = defaultPersisted();
      writeFileSync(this.file, JSON.stringify(config, null, 2), 'utf-8');
      logger.info('Created default config (sync)', { path: this.file });
      return config;
    } catch (error) {
      logger.error('Failed to load config (sync)', { error });
      throw new StoreError(`Failed to load config: ${error}`, error);
    }
  }

  getPath(): string {
    return this.file;
  }
}
