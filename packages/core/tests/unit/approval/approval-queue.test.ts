import { describe, it, expect, beforeEach } from 'vitest';
import { ApprovalQueue, APPROVALS_CHANNEL, workflowChannel } from '../../../src/approval/approval-queue.js';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../../../src/errors.js';
import type { BusMessage } from '../../../src/sse-bus.js';
import { makeProposal } from '../../helpers/proposals.js';

const START = Date.parse('2026-01-01T00:00:00.000Z');
const DAY = 24 * 3_600_000;

describe('ApprovalQueue', () => {
  let clock: number;
  let queue: ApprovalQueue;

  beforeEach(() => {
    clock = START;
    queue = new ApprovalQueue({ now: () => clock });
  });

  function submitThree() {
    return queue.submit('wf-1', [
      makeProposal({ id: 'low', riskLevel: 'LOW', confidence: 0.7 }),
      makeProposal({ id: 'high', riskLevel: 'HIGH', confidence: 0.4, priority: 'high' }),
      makeProposal({ id: 'medium', riskLevel: 'MEDIUM', confidence: 0.5, entityId: 'staging/web' }),
    ]);
  }

  // ===========================================================================
  // submit
  // ===========================================================================

  describe('submit', () => {
    it('stores records pending review in review order', () => {
      const records = submitThree();

      expect(records.map((r) => r.proposal.id)).toEqual(['high', 'medium', 'low']);
      const high = records[0];
      expect(high?.status).toBe('pending_review');
      expect(high?.proposal.status).toBe('pending_review');
      expect(high?.createdAt).toBe('2026-01-01T00:00:00.000Z');
      expect(high?.expiresAt).toBe('2026-01-02T00:00:00.000Z');
      expect(records[2]?.expiresAt).toBe('2026-01-08T00:00:00.000Z');
      expect(high?.audit).toEqual([{
        from: 'proposed', to: 'pending_review', actor: 'system', timestamp: '2026-01-01T00:00:00.000Z', feedback: null,
      }]);
    });

    it('stamps the workflow id onto every proposal', () => {
      const [record] = queue.submit('wf-9', [makeProposal({ workflowId: 'other' })]);
      expect(record?.proposal.workflowId).toBe('wf-9');
    });

    it('announces the submission on both channels', () => {
      const seen: Array<[string, BusMessage]> = [];
      queue.bus.subscribe(workflowChannel('wf-1'), (m) => seen.push(['wf', m]));
      queue.bus.subscribe(APPROVALS_CHANNEL, (m) => seen.push(['all', m]));

      submitThree();

      const expected: BusMessage = { event: 'submitted', data: { workflowId: 'wf-1', proposalIds: ['high', 'medium', 'low'], pendingCount: 3 } };
      expect(seen).toEqual([['wf', expected], ['all', expected]]);
    });

    it('stores nothing when any proposal is invalid', () => {
      const bad = makeProposal({ id: 'bad', rollbackAction: { command: [], description: '' } });
      expect(() => queue.submit('wf-1', [makeProposal(), bad])).toThrow(ValidationError);
      expect(queue.listByWorkflow('wf-1')).toEqual([]);
    });

    it('rejects empty batches and duplicate ids', () => {
      expect(() => queue.submit('wf-1', [])).toThrow('At least one proposal is required');
      expect(() => queue.submit('wf-1', [makeProposal(), makeProposal()])).toThrow('Duplicate proposal id: p-1');
      queue.submit('wf-1', [makeProposal()]);
      expect(() => queue.submit('wf-2', [makeProposal()])).toThrow('Duplicate proposal id: p-1');
    });
  });

  // ===========================================================================
  // decide
  // ===========================================================================

  describe('decide', () => {
    it('records the decision with actor, feedback and audit entry', async () => {
      submitThree();
      clock += 60_000;

      const record = await queue.decide('high', 'approved', 'alice', 'looks safe');

      expect(record.status).toBe('approved');
      expect(record.decidedBy).toBe('alice');
      expect(record.decidedAt).toBe('2026-01-01T00:01:00.000Z');
      expect(record.feedback).toBe('looks safe');
      expect(queue.auditTrail('high').map((e) => `${e.from}->${e.to} by ${e.actor}`)).toEqual([
        'proposed->pending_review by system',
        'pending_review->approved by alice',
      ]);
    });

    it('lets exactly one of many concurrent decisions win', async () => {
      submitThree();

      const results = await Promise.allSettled(
        Array.from({ length: 10 }, (_, i) => queue.decide('low', i % 2 === 0 ? 'approved' : 'rejected', `reviewer-${i}`)),
      );

      const winners = results.filter((r) => r.status === 'fulfilled');
      const losers = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(winners).toHaveLength(1);
      expect(losers).toHaveLength(9);
      for (const loser of losers) expect(loser.reason).toBeInstanceOf(InvalidTransitionError);
      expect(queue.auditTrail('low')).toHaveLength(2);
      expect(queue.get('low')?.decidedBy).toBe('reviewer-0');
    });

    it('fails for unknown proposals and missing actors', async () => {
      submitThree();
      await expect(queue.decide('nope', 'approved', 'alice')).rejects.toBeInstanceOf(NotFoundError);
      await expect(queue.decide('low', 'approved', '')).rejects.toThrow('actor is required');
    });

    it('expires a proposal whose window has passed instead of deciding it', async () => {
      submitThree();
      clock = START + 7 * DAY;

      const error = await queue.decide('low', 'approved', 'alice').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InvalidTransitionError);
      expect(error).toMatchObject({ from: 'expired', to: 'approved' });
      expect(queue.get('low')?.status).toBe('expired');
    });

    it('publishes the decision with the remaining pending count', async () => {
      submitThree();
      const events: BusMessage[] = [];
      queue.bus.subscribe(workflowChannel('wf-1'), (m) => events.push(m));

      await queue.decide('medium', 'rejected', 'bob');

      expect(events).toEqual([{
        event: 'decided',
        data: { proposalId: 'medium', decision: 'rejected', actor: 'bob', status: 'rejected', pendingCount: 2 },
      }]);
    });
  });

  // ===========================================================================
  // Batch, execution, expiry, cancellation
  // ===========================================================================

  it('decides all pending records of a workflow at once', async () => {
    submitThree();
    await queue.decide('low', 'rejected', 'bob');
    const events: BusMessage[] = [];
    queue.bus.subscribe(workflowChannel('wf-1'), (m) => events.push(m));

    const decided = await queue.decideBatch('wf-1', 'approved', 'alice');

    expect(decided.map((r) => r.proposal.id)).toEqual(['high', 'medium']);
    expect(events[0]).toEqual({
      event: 'batch_approved',
      data: { workflowId: 'wf-1', proposalIds: ['high', 'medium'], actor: 'alice', pendingCount: 0 },
    });
    await expect(queue.decideBatch('wf-unknown', 'approved', 'alice')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('walks approved proposals through execution', async () => {
    queue.submit('wf-1', [makeProposal()]);
    await queue.decide('p-1', 'approved', 'alice');

    await queue.markExecuting('p-1');
    const done = await queue.completeExecution('p-1', false, 'exit 1');

    expect(done.status).toBe('failed');
    expect(done.feedback).toBe('exit 1');
    expect(queue.auditTrail('p-1').map((e) => e.to)).toEqual(['pending_review', 'approved', 'executing', 'failed']);
  });

  it('refuses to execute a proposal nobody approved', async () => {
    queue.submit('wf-1', [makeProposal()]);
    await expect(queue.markExecuting('p-1')).rejects.toThrow('Invalid transition for p-1: pending_review → executing');
  });

  it('expires pending and approved records of a workflow', async () => {
    submitThree();
    await queue.decide('high', 'approved', 'alice');
    await queue.decide('low', 'rejected', 'bob');

    const expired = await queue.expireWorkflow('wf-1');

    expect(expired.map((r) => r.proposal.id).sort()).toEqual(['high', 'medium']);
    expect(queue.get('low')?.status).toBe('rejected');
    expect(queue.auditTrail('high').at(-1)).toMatchObject({ from: 'approved', to: 'expired', feedback: 'approval timeout' });
  });

  it('cancels approved records as rejections', async () => {
    submitThree();
    await queue.decide('high', 'approved', 'alice');

    const cancelled = await queue.cancelWorkflow('wf-1', 'carol');

    expect(cancelled).toHaveLength(3);
    expect(queue.get('high')?.status).toBe('rejected');
    expect(queue.auditTrail('high').at(-1)).toMatchObject({ from: 'approved', to: 'rejected', actor: 'carol', feedback: 'cancelled' });
    expect(await queue.cancelWorkflow('wf-1')).toEqual([]);
  });

  it('expires stale records across workflows', async () => {
    queue.submit('wf-1', [makeProposal({ id: 'urgent', priority: 'critical' })]);
    queue.submit('wf-2', [makeProposal({ id: 'relaxed', priority: 'low' })]);

    clock = START + DAY;
    const expired = await queue.expireStale();

    expect(expired.map((r) => r.proposal.id)).toEqual(['urgent']);
    expect(queue.get('relaxed')?.status).toBe('pending_review');
  });

  // ===========================================================================
  // Queries
  // ===========================================================================

  it('filters pending records by namespace, entity or workflow', () => {
    submitThree();
    queue.submit('wf-2', [makeProposal({ id: 'other', entityId: 'prod/db' })]);

    expect(queue.listPending({ scope: 'staging' }).map((r) => r.proposal.id)).toEqual(['medium']);
    expect(queue.listPending({ scope: 'prod/db' }).map((r) => r.proposal.id)).toEqual(['other']);
    expect(queue.listPending({ scope: 'wf-2' }).map((r) => r.proposal.id)).toEqual(['other']);
    expect(queue.listPending()).toHaveLength(4);
  });

  it('lists records in any state newest first, filtered and limited', async () => {
    submitThree();
    clock += 1_000;
    queue.submit('wf-2', [makeProposal({ id: 'other', entityId: 'prod/db' })]);
    await queue.decide('low', 'approved', 'alice');

    expect(queue.list().map((r) => r.proposal.id)).toEqual(['other', 'medium', 'high', 'low']);
    expect(queue.list({ status: 'approved' }).map((r) => r.proposal.id)).toEqual(['low']);
    expect(queue.list({ priority: 'high' }).map((r) => r.proposal.id)).toEqual(['high']);
    expect(queue.list({ status: 'pending_review', priority: 'medium', limit: 2 }).map((r) => r.proposal.id)).toEqual(['other', 'medium']);
    expect(queue.list({ limit: 0 })).toEqual([]);
  });

  it('reports workflow status ignoring needs_more_info and expired records', async () => {
    submitThree();
    expect(queue.status('wf-1')).toMatchObject({ allApproved: false, anyRejected: false, pendingCount: 3, total: 3 });

    await queue.decide('high', 'approved', 'alice');
    await queue.decide('medium', 'needs_more_info', 'alice', 'need logs');
    await queue.decide('low', 'approved', 'alice');

    const status = queue.status('wf-1');
    expect(status.allApproved).toBe(true);
    expect(status.pendingCount).toBe(0);
    expect(status.counts.needs_more_info).toBe(1);
    expect(status.counts.approved).toBe(2);
  });

  it('is never all-approved for an unknown workflow', () => {
    expect(queue.status('nothing')).toMatchObject({ allApproved: false, total: 0 });
  });

  it('summarises queue statistics', async () => {
    submitThree();
    clock += 1000;
    await queue.decide('high', 'approved', 'alice');
    clock += 2000;
    await queue.decide('low', 'rejected', 'alice');

    const stats = queue.stats();
    expect(stats.total).toBe(3);
    expect(stats.pending).toBe(1);
    expect(stats.byRisk).toEqual({ LOW: 1, MEDIUM: 1, HIGH: 1 });
    expect(stats.byPriority).toEqual({ critical: 0, high: 1, medium: 2, low: 0 });
    expect(stats.averageDecisionMs).toBe(2000);
  });

  it('greets subscribers with the current pending count', async () => {
    submitThree();
    const events: BusMessage[] = [];

    const unsubscribe = queue.subscribe('wf-1', (m) => events.push(m));
    await queue.decide('high', 'approved', 'alice');
    unsubscribe();
    await queue.decide('low', 'approved', 'alice');

    expect(events.map((e) => e.event)).toEqual(['connected', 'decided']);
    expect(events[0]?.data).toEqual({ workflowId: 'wf-1', pendingCount: 3 });
  });
});
