import { describe, it, expect } from 'vitest';
import { EscalationRouter } from '../core/Router';
import { ConditionalRuleSet } from '../core/ConditionalRules';
import { DEFAULT_CONFIG } from '../config';
import { cacheKey } from '../storage/DecisionCache';
import { CacheLookup, DecisionCacheEntry, Operation, RouterContext } from '../types';

const noCache: CacheLookup = () => undefined;

function ctx(operation: Operation, scope: string): RouterContext {
  return { operation, scope, session: 'agent-1' };
}

function entry(operation: Operation, scope: string, success: number, failure: number): DecisionCacheEntry {
  return {
    key: cacheKey(operation, scope),
    operation,
    scope,
    observedCount: success + failure,
    successCount: success,
    failureCount: failure,
    successRate: success / (success + failure),
    lastUsedAt: 0,
  };
}

describe('EscalationRouter', () => {
  const router = new EscalationRouter(new ConditionalRuleSet(DEFAULT_CONFIG.conditionalRules));

  describe('risk thresholds', () => {
    it('escalates critical risk to tier 1 with priority 10 whatever the confidence', () => {
      for (const risk of [0.91, 0.95, 0.999, 1]) {
        for (const confidence of [0, 0.3, 0.5, 0.8, 1]) {
          expect(router.decide(risk, confidence, ctx('destructive-op', 'main'), noCache)).toEqual({
            kind: 'ESCALATE',
            tier: 1,
            priority: 10,
            reason: 'critical',
          });
        }
      }
    });

    it('escalates high risk to tier 1 with priority 9', () => {
      expect(router.decide(0.8, 0.9, ctx('shell-exec', 'rm -rf build'), noCache)).toEqual({
        kind: 'ESCALATE',
        tier: 1,
        priority: 9,
        reason: 'high risk',
      });
    });

    it('treats exactly 0.9 as high risk, not critical', () => {
      const decision = router.decide(0.9, 0.9, ctx('shell-exec', 'x'), noCache);
      expect(decision).toMatchObject({ kind: 'ESCALATE', priority: 9 });
    });

    it('escalates medium risk to tier 2 with priority 8', () => {
      expect(router.decide(0.7, 0.9, ctx('file-edit', 'src/app.ts'), noCache)).toEqual({
        kind: 'ESCALATE',
        tier: 2,
        priority: 8,
        reason: 'medium risk',
      });
      expect(router.decide(0.41, 0.9, ctx('file-edit', 'src/app.ts'), noCache)).toMatchObject({
        tier: 2,
        priority: 8,
      });
    });

    it('escalates low-confidence assessments as unknown patterns', () => {
      expect(router.decide(0.2, 0.49, ctx('test-run', 'unit'), noCache)).toEqual({
        kind: 'ESCALATE',
        tier: 2,
        priority: 7,
        reason: 'unknown pattern',
      });
    });

    it('checks risk bands before the cache', () => {
      const lookup: CacheLookup = (op, scope) => entry(op, scope, 50, 0);
      expect(router.decide(0.75, 0.9, ctx('commit', 'main'), lookup)).toMatchObject({
        kind: 'ESCALATE',
        priority: 9,
      });
    });
  });

  describe('learned patterns', () => {
    it('auto-approves after five successes on a scratch file with a 0.25 boost', () => {
      const lookup: CacheLookup = (op, scope) => entry(op, scope, 5, 0);
      const decision = router.decide(0.2, 0.8, ctx('file-edit', '/tmp/scratch.txt'), lookup);

      expect(decision.kind).toBe('AUTO_APPROVE');
      if (decision.kind === 'AUTO_APPROVE') {
        expect(decision.confidenceBoost).toBeCloseTo(0.25, 10);
      }
    });

    it('caps the confidence boost at 0.3', () => {
      const lookup: CacheLookup = (op, scope) => entry(op, scope, 40, 0);
      const decision = router.decide(0.3, 0.7, ctx('shell-exec', 'npm run lint'), lookup);
      expect(decision).toMatchObject({ kind: 'AUTO_APPROVE', confidenceBoost: 0.3 });
    });

    it('requires more than three observations', () => {
      const lookup: CacheLookup = (op, scope) => entry(op, scope, 3, 0);
      const decision = router.decide(0.3, 0.7, ctx('shell-exec', 'npm run lint'), lookup);
      expect(decision).toEqual({ kind: 'ESCALATE', tier: 1, priority: 5, reason: 'fallback' });
    });

    it('requires a success rate above 0.9', () => {
      // 9 of 10 is exactly 0.9
      const lookup: CacheLookup = (op, scope) => entry(op, scope, 9, 1);
      const decision = router.decide(0.3, 0.7, ctx('shell-exec', 'npm run lint'), lookup);
      expect(decision.kind).toBe('ESCALATE');
    });

    it('falls through when the cache lookup throws', () => {
      const lookup: CacheLookup = () => {
        throw new Error('cache offline');
      };
      const decision = router.decide(0.2, 0.8, ctx('test-run', 'unit'), lookup);
      expect(decision.kind).toBe('CONDITIONAL_APPROVE');
    });

    it('returns the same decision for the same inputs', () => {
      const lookup: CacheLookup = (op, scope) => entry(op, scope, 6, 0);
      const first = router.decide(0.1, 0.9, ctx('file-edit', 'notes.md'), lookup);
      const second = router.decide(0.1, 0.9, ctx('file-edit', 'notes.md'), lookup);
      expect(second).toEqual(first);
    });
  });

  describe('conditional approval', () => {
    it('approves a feature-branch commit with extra logging', () => {
      const decision = router.decide(0.2, 0.8, ctx('commit', '/feature/x'), noCache);
      expect(decision).toEqual({
        kind: 'CONDITIONAL_APPROVE',
        safeguards: { extraLogging: true, monitoring: false },
        rule: 'feature-branch-commit',
        reason: 'conditional rule feature-branch-commit',
      });
    });

    it('approves edits under an allow-listed prefix with monitoring', () => {
      const decision = router.decide(0.3, 0.6, ctx('file-edit', '/tmp/out/report.txt'), noCache);
      expect(decision).toMatchObject({
        kind: 'CONDITIONAL_APPROVE',
        safeguards: { extraLogging: true, monitoring: true },
      });
    });

    it('approves test runs unconditionally inside the band', () => {
      const decision = router.decide(0.4, 0.6, ctx('test-run', 'anything'), noCache);
      expect(decision).toMatchObject({ kind: 'CONDITIONAL_APPROVE', rule: 'test-run' });
    });

    it('does not approve commits to main', () => {
      const decision = router.decide(0.2, 0.8, ctx('commit', 'main'), noCache);
      expect(decision).toEqual({ kind: 'ESCALATE', tier: 1, priority: 5, reason: 'fallback' });
    });

    it('needs confidence of at least 0.6', () => {
      const decision = router.decide(0.2, 0.55, ctx('test-run', 'unit'), noCache);
      expect(decision).toMatchObject({ kind: 'ESCALATE', reason: 'fallback' });
    });

    it('does not apply to zero-risk operations', () => {
      const decision = router.decide(0, 0.9, ctx('test-run', 'unit'), noCache);
      expect(decision).toMatchObject({ kind: 'ESCALATE', reason: 'fallback' });
    });
  });
});
