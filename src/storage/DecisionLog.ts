/**
 * Holdgate DecisionLog
 * Audit trail in JSON Lines format (~/.holdgate/decisions.jsonl)
 */

import fs from 'fs-extra';
import path from 'path';
import { Operation } from '../types';
import { HOLDGATE_DATA_DIR, logger } from '../core/Logger';

export type DecisionEvent =
  | 'AUTO_APPROVED'
  | 'CONDITIONAL_APPROVED'
  | 'ESCALATED'
  | 'RE_ESCALATED'
  | 'APPROVED'
  | 'DENIED'
  | 'EXHAUSTED'
  | 'ADMISSION_DENIED';

export interface DecisionRecord {
  timestamp: string;
  event: DecisionEvent;
  interactionId?: string;
  session: string;
  operation: Operation;
  scope: string;
  riskScore: number;
  confidence: number;
  tier?: number;
  priority?: number;
  actor?: string;
  reason?: string;
  decisionTime?: number; // milliseconds from creation to resolution
}

export class DecisionLog {
  private readonly file: string;

  constructor(private readonly dataDir: string = HOLDGATE_DATA_DIR) {
    this.file = path.join(dataDir, 'decisions.jsonl');
  }

  /**
   * Append a decision record to the log (JSON Lines format)
   */
  async append(record: DecisionRecord): Promise<void> {
    try {
      await fs.ensureDir(this.dataDir);

      // Append as JSON Lines (one JSON object per line)
      const line = JSON.stringify(record) + '\n';
      await fs.appendFile(this.file, line, 'utf8');

      logger.debug('Decision logged', { event: record.event, interactionId: record.interactionId });
    } catch (error) {
      logger.error('Failed to log decision', { error });
      // Don't throw - logging failures shouldn't break execution
    }
  }

  /**
   * Read all decisions from the log
   */
  async readAll(): Promise<DecisionRecord[]> {
    try {
      if (!(await fs.pathExists(this.file))) {
        return [];
      }

      const content = await fs.readFile(this.file, 'utf8');
      const lines = content.trim().split('\n').filter(Boolean);

      return lines.map((line) => JSON.parse(line));
    } catch (error) {
      logger.error('Failed to read decision log', { error });
      return [];
    }
  }

  /**
   * Read the last N decisions
   */
  async readLast(n: number): Promise<DecisionRecord[]> {
    const all = await this.readAll();
    return all.slice(-n);
  }

  /**
   * Records belonging to one interaction, oldest first
   */
  async forInteraction(interactionId: string): Promise<DecisionRecord[]> {
    const all = await this.readAll();
    return all.filter((r) => r.interactionId === interactionId);
  }

  getPath(): string {
    return this.file;
  }
}
