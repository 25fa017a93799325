/**
 * Holdgate Default Configuration
 * Philosophy: "Fail closed" - anything unrecognized goes to a human
 */

import { Operation, Safeguards } from './types';

export interface TierTarget {
  tier: number;
  target: string;
  description?: string;
}

export interface ConditionalRuleConfig {
  name: string;
  operation: Operation;
  /** Scope must start with one of these prefixes */
  scopePrefixes?: string[];
  /** Scope must match this regular expression (source form) */
  scopePattern?: string;
  safeguards: Safeguards;
}

export interface EngineConfig {
  /** Time a reviewer tier gets before re-escalation (ms) */
  timeoutMs: number;
  /** Highest tier; a timeout at this tier denies the interaction */
  maxTiers: number;
  /** HELD interactions a session may accumulate before admission is refused */
  maxHeldPerSession: number;
  /** Held risk above which a session is refused any further admission */
  criticalRisk: number;
  /** Review-queue entry lifetime (ms) */
  reviewTtlMs: number;
  tiers: TierTarget[];
  conditionalRules: ConditionalRuleConfig[];
}

export const DEFAULT_CONFIG: EngineConfig = {
  timeoutMs: 15 * 60_000,
  maxTiers: 2,
  maxHeldPerSession: 3,
  criticalRisk: 0.9,
  reviewTtlMs: 60 * 60_000,

  tiers: [
    { tier: 1, target: 'first-line-reviewer', description: 'On-call reviewer for the session' },
    { tier: 2, target: 'senior-reviewer', description: 'Higher authority after a missed deadline' },
  ],

  // Ordered: first match wins
  conditionalRules: [
    {
      name: 'safe-path-edit',
      operation: 'file-edit',
      scopePrefixes: ['/tmp/', '/workspace/scratch/', 'docs/'],
      safeguards: { extraLogging: true, monitoring: true },
    },
    {
      name: 'feature-branch-commit',
      operation: 'commit',
      scopePattern: '^(?:/|refs/heads/)?(?:feature|feat|fix|bugfix|chore)/[\\w./-]+$',
      safeguards: { extraLogging: true, monitoring: false },
    },
    {
      name: 'test-run',
      operation: 'test-run',
      safeguards: { extraLogging: true, monitoring: false },
    },
  ],
};

/**
 * Target identity for a tier; tiers past the configured list reuse the last one
 */
export function targetForTier(config: EngineConfig, tier: number): string {
  const match = config.tiers.find((t) => t.tier === tier);
  if (match) {
    return match.target;
  }
  const last = config.tiers[config.tiers.length - 1];
  return last ? last.target : `tier-${tier}`;
}
