/**
 * Holdgate Escalation Router
 * Maps (risk, confidence, context, cache) to a Decision.
 *
 * Rules are evaluated in a fixed order and the first match wins. The router
 * reads no clock and does no I/O; given the same inputs and the same cache
 * answer it always returns the same Decision.
 */

import { CacheLookup, Decision, DecisionCacheEntry, RouterContext } from '../types';
import { qualifiesForAutoApprove } from '../storage/DecisionCache';
import { ConditionalRuleSet, inConditionalBand } from './ConditionalRules';
import { DEFAULT_CONFIG } from '../config';
import { logger } from './Logger';

export const MAX_CONFIDENCE_BOOST = 0.3;
export const CONFIDENCE_BOOST_PER_OBSERVATION = 0.05;

export class EscalationRouter {
  private readonly rules: ConditionalRuleSet;

  constructor(rules: ConditionalRuleSet = new ConditionalRuleSet(DEFAULT_CONFIG.conditionalRules)) {
    this.rules = rules;
  }

  decide(
    risk: number,
    confidence: number,
    context: RouterContext,
    cacheLookup: CacheLookup
  ): Decision {
    if (risk > 0.9) {
      return { kind: 'ESCALATE', tier: 1, priority: 10, reason: 'critical' };
    }
    if (risk > 0.7) {
      return { kind: 'ESCALATE', tier: 1, priority: 9, reason: 'high risk' };
    }
    if (risk > 0.4) {
      return { kind: 'ESCALATE', tier: 2, priority: 8, reason: 'medium risk' };
    }
    if (confidence < 0.5) {
      return { kind: 'ESCALATE', tier: 2, priority: 7, reason: 'unknown pattern' };
    }

    const learned = safeLookup(cacheLookup, context);
    if (learned && qualifiesForAutoApprove(learned)) {
      return {
        kind: 'AUTO_APPROVE',
        confidenceBoost: Math.min(
          MAX_CONFIDENCE_BOOST,
          learned.observedCount * CONFIDENCE_BOOST_PER_OBSERVATION
        ),
        reason: `learned pattern (${learned.successCount}/${learned.observedCount} succeeded)`,
      };
    }

    if (inConditionalBand(risk, confidence)) {
      const match = this.rules.match(context.operation, context.scope);
      if (match) {
        return {
          kind: 'CONDITIONAL_APPROVE',
          safeguards: match.safeguards,
          rule: match.rule,
          reason: `conditional rule ${match.rule}`,
        };
      }
    }

    return { kind: 'ESCALATE', tier: 1, priority: 5, reason: 'fallback' };
  }
}

/**
 * A lookup that throws is a miss; the router never raises on cache trouble.
 */
function safeLookup(lookup: CacheLookup, context: RouterContext): DecisionCacheEntry | undefined {
  try {
    return lookup(context.operation, context.scope);
  } catch (error) {
    logger.warn('Cache lookup failed during routing, treating as miss', {
      operation: context.operation,
      scope: context.scope,
      error,
    });
    return undefined;
  }
}
