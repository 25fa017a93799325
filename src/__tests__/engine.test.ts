import { describe, it, expect, beforeEach } from 'vitest';
import { EngineFixture, START_TIME, createEngineFixture } from './helpers/test-dir';
import { cacheKey } from '../storage/DecisionCache';
import { InteractionNotFoundError } from '../core/errors';
import { EngineDecision, InteractionRequest } from '../types';

function heldId(decision: EngineDecision): string {
  if (decision.kind !== 'ESCALATE') {
    throw new Error(`expected ESCALATE, got ${decision.kind}`);
  }
  return decision.interactionId;
}

const lintRequest: InteractionRequest = {
  operation: 'shell-exec',
  scope: 'npm run lint',
  session: 'agent-1',
  riskScore: 0.3,
  confidence: 0.7,
};

describe('Engine.decide', () => {
  let fx: EngineFixture;

  beforeEach(() => {
    fx = createEngineFixture();
  });

  it('conditionally approves a low-risk feature-branch commit', async () => {
    const decision = await fx.engine.decide({
      operation: 'commit',
      scope: '/feature/x',
      session: 'agent-1',
      riskScore: 0.2,
      confidence: 0.8,
    });

    expect(decision).toMatchObject({
      kind: 'CONDITIONAL_APPROVE',
      safeguards: { extraLogging: true, monitoring: false },
    });
    if (decision.kind !== 'CONDITIONAL_APPROVE') return;

    expect(await fx.engine.status(decision.interactionId)).toMatchObject({
      status: 'CONDITIONAL_APPROVED',
      resolution: 'approved',
      resolvedBy: 'holdgate',
      safeguards: { extraLogging: true, monitoring: false },
    });
    expect(await fx.engine.tasks(decision.interactionId)).toEqual([]);
    expect(fx.transport.notify).not.toHaveBeenCalled();
  });

  it('holds a critical operation at tier 1 with priority 10', async () => {
    const decision = await fx.engine.decide({
      operation: 'destructive-op',
      scope: 'main',
      session: 'agent-1',
      riskScore: 0.95,
      confidence: 0.8,
    });
    expect(decision).toMatchObject({ kind: 'ESCALATE', tier: 1, priority: 10, reason: 'critical' });

    const id = heldId(decision);
    expect(await fx.engine.status(id)).toMatchObject({
      status: 'HELD',
      tier: 1,
      escalationTarget: 'first-line-reviewer',
      escalationCount: 0,
      heldAt: START_TIME,
    });

    const tasks = await fx.engine.tasks(id);
    expect(tasks).toHaveLength(1);
    expect(tasks[0]).toMatchObject({
      target: 'first-line-reviewer',
      tier: 1,
      priority: 10,
      deadline: START_TIME + 900_000,
    });
  });

  it('notifies the reviewer in the background and marks the task delivered', async () => {
    const id = heldId(
      await fx.engine.decide({ ...lintRequest, riskScore: 0.8, confidence: 0.9 })
    );
    await fx.engine.settle();

    expect(fx.transport.notify).toHaveBeenCalledWith(
      'first-line-reviewer',
      expect.objectContaining({
        interactionId: id,
        operation: 'shell-exec',
        reason: 'high risk',
        expectedResponse: ['APPROVE', 'DENY'],
      })
    );
    expect((await fx.engine.tasks(id))[0].status).toBe('delivered');
    expect(fx.engine.reviewQueue.pending('first-line-reviewer')).toHaveLength(1);
  });

  it('auto-approves a scratch-file edit after five successes', async () => {
    for (let i = 0; i < 5; i++) {
      await fx.engine.recordOutcome('file-edit', '/tmp/scratch.txt', 'success');
    }

    const decision = await fx.engine.decide({
      operation: 'file-edit',
      scope: '/tmp/scratch.txt',
      session: 'agent-1',
      riskScore: 0.2,
      confidence: 0.8,
    });

    expect(decision.kind).toBe('AUTO_APPROVE');
    if (decision.kind !== 'AUTO_APPROVE') return;
    expect(decision.confidenceBoost).toBeCloseTo(0.25, 10);
    expect((await fx.engine.status(decision.interactionId))?.status).toBe('AUTO_APPROVED');
  });

  it('holds a request whose stored history has a rate its counts contradict', async () => {
    await fx.cacheStore.putRaw(cacheKey('shell-exec', 'rm -rf build'), {
      key: 'shell-exec::rm -rf build',
      operation: 'shell-exec',
      scope: 'rm -rf build',
      observedCount: 5,
      successCount: 0,
      failureCount: 5,
      successRate: 1,
      lastUsedAt: START_TIME,
    });

    const decision = await fx.engine.decide({
      operation: 'shell-exec',
      scope: 'rm -rf build',
      session: 'agent-1',
      riskScore: 0.2,
      confidence: 0.8,
    });

    expect(decision).toMatchObject({ kind: 'ESCALATE', tier: 1, reason: 'fallback' });
  });

  it('rejects requests without a session', async () => {
    await expect(fx.engine.decide({ ...lintRequest, session: '' })).rejects.toMatchObject({
      code: 'INVALID_REQUEST',
    });
  });

  describe('risk assessment', () => {
    it('fails safe when no assessment and no classifier are available', async () => {
      const decision = await fx.engine.decide({
        operation: 'test-run',
        scope: 'unit',
        session: 'agent-1',
      });

      expect(decision).toMatchObject({ kind: 'ESCALATE', tier: 1, priority: 10 });
      expect(await fx.engine.status(heldId(decision))).toMatchObject({
        riskScore: 1,
        confidence: 0,
      });
    });

    it('fails safe when supplied scores are out of range', async () => {
      const decision = await fx.engine.decide({ ...lintRequest, riskScore: 1.5 });
      expect(decision).toMatchObject({ kind: 'ESCALATE', priority: 10, reason: 'critical' });
    });

    it('fails safe when the classifier throws', async () => {
      const failing = createEngineFixture({
        classifier: {
          classify: () => {
            throw new Error('model unavailable');
          },
        },
      });

      const decision = await failing.engine.decide({
        operation: 'test-run',
        scope: 'unit',
        session: 'agent-1',
      });
      expect(decision).toMatchObject({ kind: 'ESCALATE', tier: 1, priority: 10 });
    });

    it('fails safe when the classifier returns garbage', async () => {
      const garbage = createEngineFixture({
        classifier: { classify: async () => ({ riskScore: Number.NaN, confidence: 0.9 }) },
      });

      const decision = await garbage.engine.decide({
        operation: 'test-run',
        scope: 'unit',
        session: 'agent-1',
      });
      expect(decision).toMatchObject({ kind: 'ESCALATE', priority: 10 });
    });

    it('uses the classifier when no scores are supplied', async () => {
      const classified = createEngineFixture({
        classifier: { classify: async () => ({ riskScore: 0.2, confidence: 0.8 }) },
      });

      const decision = await classified.engine.decide({
        operation: 'commit',
        scope: 'feature/login',
        session: 'agent-1',
      });
      expect(decision.kind).toBe('CONDITIONAL_APPROVE');
    });
  });
});

describe('Engine.resolve', () => {
  let fx: EngineFixture;

  beforeEach(() => {
    fx = createEngineFixture();
  });

  it('approves a held interaction and answers its task', async () => {
    const id = heldId(await fx.engine.decide(lintRequest));
    fx.clock.advance(60_000);

    const resolved = await fx.engine.resolve(id, 'approve', 'alice');

    expect(resolved).toMatchObject({
      status: 'APPROVED',
      resolution: 'approved',
      reasonCode: 'reviewer approved',
      resolvedBy: 'alice',
      resolvedAt: START_TIME + 60_000,
    });
    expect((await fx.engine.tasks(id))[0].status).toBe('answered');
    expect(fx.engine.heldCount('agent-1')).toBe(0);
    expect(fx.engine.reviewQueue.pending()).toEqual([]);
  });

  it('denies with the reviewer reason', async () => {
    const id = heldId(await fx.engine.decide(lintRequest));

    expect(await fx.engine.resolve(id, 'deny', 'bob')).toMatchObject({
      status: 'DENIED',
      resolution: 'denied',
      reasonCode: 'reviewer denied',
    });
  });

  it('is idempotent once resolved', async () => {
    const id = heldId(await fx.engine.decide(lintRequest));
    await fx.engine.resolve(id, 'approve', 'alice');

    const again = await fx.engine.resolve(id, 'deny', 'bob');

    expect(again).toMatchObject({ status: 'APPROVED', resolvedBy: 'alice' });
    expect(await fx.engine.tasks(id)).toHaveLength(1);
  });

  it('throws for unknown interactions', async () => {
    await expect(fx.engine.resolve('missing', 'approve', 'alice')).rejects.toBeInstanceOf(
      InteractionNotFoundError
    );
  });

  it('learns from approvals until the pattern auto-approves', async () => {
    for (let i = 0; i < 4; i++) {
      const id = heldId(await fx.engine.decide(lintRequest));
      await fx.engine.resolve(id, 'approve', 'alice');
      await fx.engine.settle();
    }

    const decision = await fx.engine.decide(lintRequest);

    expect(decision.kind).toBe('AUTO_APPROVE');
    if (decision.kind !== 'AUTO_APPROVE') return;
    expect(decision.confidenceBoost).toBeCloseTo(0.2, 10);
  });

  it('records a denial as a failure', async () => {
    const id = heldId(await fx.engine.decide(lintRequest));
    await fx.engine.resolve(id, 'deny', 'bob');
    await fx.engine.settle();

    expect(await fx.cacheStore.get(cacheKey('shell-exec', 'npm run lint'))).toMatchObject({
      observedCount: 1,
      successCount: 0,
      failureCount: 1,
      successRate: 0,
    });
  });

  it('publishes status changes to subscribers', async () => {
    const seen: string[] = [];
    const unsubscribe = fx.engine.subscribe((event) => {
      seen.push(`${event.previousStatus}->${event.interaction.status}`);
    });

    const id = heldId(await fx.engine.decide(lintRequest));
    await fx.engine.resolve(id, 'approve', 'alice');
    unsubscribe();
    await fx.engine.decide({ ...lintRequest, operation: 'test-run', scope: 'unit' });

    expect(seen).toEqual(['PENDING->HELD', 'HELD->APPROVED']);
  });
});
