/**
 * Holdgate StatsTracker
 * Running counters of routing decisions and resolutions (~/.holdgate/stats.json)
 */

import fs from 'fs-extra';
import path from 'path';
import { HOLDGATE_DATA_DIR, logger } from '../core/Logger';
import { DecisionEvent } from './DecisionLog';

export interface Stats {
  totalDecisions: number;
  autoApproved: number;
  conditionalApproved: number;
  escalated: number;
  reEscalated: number;
  approved: number;
  denied: number;
  exhausted: number;
  admissionDenied: number;
  avgResolutionTime: number; // ms, reviewer resolutions only
  lastReset: string;
}

function emptyStats(): Stats {
  return {
    totalDecisions: 0,
    autoApproved: 0,
    conditionalApproved: 0,
    escalated: 0,
    reEscalated: 0,
    approved: 0,
    denied: 0,
    exhausted: 0,
    admissionDenied: 0,
    avgResolutionTime: 0,
    lastReset: new Date().toISOString(),
  };
}

export class StatsTracker {
  private readonly file: string;
  /** Serializes concurrent writes to prevent lost increments. */
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly dataDir: string = HOLDGATE_DATA_DIR) {
    this.file = path.join(dataDir, 'stats.json');
  }

  /**
   * Load stats from disk
   */
  async load(): Promise<Stats> {
    try {
      await fs.ensureDir(this.dataDir);

      if (await fs.pathExists(this.file)) {
        return { ...emptyStats(), ...(await fs.readJson(this.file)) };
      }
      const initialStats = emptyStats();
      await this.save(initialStats);
      return initialStats;
    } catch (error) {
      logger.error('Failed to load stats', { error });
      throw error;
    }
  }

  /**
   * Save stats to disk
   */
  async save(stats: Stats): Promise<void> {
    try {
      await fs.ensureDir(this.dataDir);
      await fs.writeJson(this.file, stats, { spaces: 2 });
    } catch (error) {
      logger.error('Failed to save stats', { error });
      throw error;
    }
  }

  /**
   * Increment the counter of an event; reviewer resolutions also update the
   * rolling average resolution time
   */
  increment(event: DecisionEvent, resolutionTime?: number): Promise<void> {
    // Serialize writes to prevent concurrent load/modify/save from losing increments
    const op = this.writeChain.then(async () => {
      const stats = await this.load();

      switch (event) {
        case 'AUTO_APPROVED':
          stats.totalDecisions++;
          stats.autoApproved++;
          break;
        case 'CONDITIONAL_APPROVED':
          stats.totalDecisions++;
          stats.conditionalApproved++;
          break;
        case 'ESCALATED':
          stats.totalDecisions++;
          stats.escalated++;
          break;
        case 'ADMISSION_DENIED':
          stats.totalDecisions++;
          stats.admissionDenied++;
          break;
        case 'RE_ESCALATED':
          stats.reEscalated++;
          break;
        case 'APPROVED':
          stats.approved++;
          break;
        case 'DENIED':
          stats.denied++;
          break;
        case 'EXHAUSTED':
          stats.exhausted++;
          break;
      }

      if ((event === 'APPROVED' || event === 'DENIED') && resolutionTime !== undefined) {
        const resolved = stats.approved + stats.denied;
        const total = stats.avgResolutionTime * (resolved - 1) + resolutionTime;
        stats.avgResolutionTime = Math.round(total / resolved);
      }

      await this.save(stats);
    });
    this.writeChain = op.catch((error: unknown) => {
      logger.error('Stats update failed', { event, error });
    });
    return op;
  }

  /**
   * Reset all stats to zero
   */
  async reset(): Promise<void> {
    await this.save(emptyStats());
    logger.info('Stats reset');
  }

  getPath(): string {
    return this.file;
  }
}
