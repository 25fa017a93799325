/**
 * Holdgate Conditional Rules
 * Static allow-rules for low-risk operations that are approved with safeguards
 * instead of going to a reviewer.
 */

import { ConditionalRuleConfig } from '../config';
import { Operation, Safeguards } from '../types';

export const CONDITIONAL_MAX_RISK = 0.4;
export const CONDITIONAL_MIN_CONFIDENCE = 0.6;

export interface ConditionalMatch {
  rule: string;
  safeguards: Safeguards;
}

/**
 * Whether the (risk, confidence) pair is inside the band where conditional
 * approval is considered at all
 */
export function inConditionalBand(risk: number, confidence: number): boolean {
  return risk > 0 && risk <= CONDITIONAL_MAX_RISK && confidence >= CONDITIONAL_MIN_CONFIDENCE;
}

export class ConditionalRuleSet {
  private readonly compiled: Array<ConditionalRuleConfig & { regex?: RegExp }>;

  constructor(rules: ConditionalRuleConfig[]) {
    this.compiled = rules.map((rule) => ({
      ...rule,
      regex: rule.scopePattern ? new RegExp(rule.scopePattern) : undefined,
    }));
  }

  /**
   * First matching rule for the operation, or undefined
   */
  match(operation: Operation, scope: string): ConditionalMatch | undefined {
    for (const rule of this.compiled) {
      if (rule.operation !== operation) {
        continue;
      }
      if (rule.scopePrefixes && !rule.scopePrefixes.some((prefix) => isUnderPrefix(scope, prefix))) {
        continue;
      }
      if (rule.regex && !rule.regex.test(scope)) {
        continue;
      }
      return { rule: rule.name, safeguards: { ...rule.safeguards } };
    }
    return undefined;
  }
}

/**
 * Prefix test that refuses to follow `..` segments out of the allow-listed tree
 */
function isUnderPrefix(scope: string, prefix: string): boolean {
  if (!scope.startsWith(prefix)) {
    return false;
  }
  return !scope.split('/').includes('..');
}
