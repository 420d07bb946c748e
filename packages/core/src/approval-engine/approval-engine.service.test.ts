import { describe, it, expect, beforeEach } from 'vitest';
import { ApprovalEngine, COMMENT_MAX_LENGTH } from './approval-engine.service.js';
import { PurchaseOrderGenerator } from '../po-generator/po-generator.service.js';
import { RequestLedger } from '../request-ledger/request-ledger.service.js';
import { InMemoryProcurementStore } from '../store/memory-store.js';
import {
  AlreadyDecidedError,
  InvalidStateError,
  PermissionDeniedError,
  PurchaseOrderGenerationError,
  ValidationError,
} from '../shared/errors.js';
import type { UserProfile } from '../domain/types.js';

const NOW = new Date('2026-03-02T09:00:00Z');
const alice: UserProfile = { id: 'alice', role: 'staff' };
const bob: UserProfile = { id: 'bob', role: 'approver_level_1' };
const carol: UserProfile = { id: 'carol', role: 'approver_level_2' };

describe('ApprovalEngine', () => {
  let store: InMemoryProcurementStore;
  let engine: ApprovalEngine;
  let requestId: string;

  beforeEach(async () => {
    store = new InMemoryProcurementStore();
    engine = new ApprovalEngine(store, new PurchaseOrderGenerator({ clock: () => NOW }), { clock: () => NOW });
    const ledger = new RequestLedger(store, { clock: () => NOW });
    const request = await ledger.create(alice, {
      title: 'Pens',
      items: [{ description: 'Pens', quantity: 10, unit_price: 2 }],
    });
    requestId = request.id;
  });

  it('should move to pending level 2 after level 1 approval', async () => {
    const outcome = await engine.decide(bob, {
      request_id: requestId,
      level: 1,
      decision: 'approved',
      comment: '  fine  ',
    });

    expect(outcome.request.status).toBe('pending_level_2');
    expect(outcome.approval).toMatchObject({ level: 1, decider_id: 'bob', decision: 'approved', comment: 'fine' });
    expect(outcome.purchase_order).toBeNull();
  });

  it('should approve and generate the purchase order at level 2', async () => {
    await engine.decide(bob, { request_id: requestId, level: 1, decision: 'approved' });

    const outcome = await engine.decide(carol, { request_id: requestId, level: 2, decision: 'approved' });

    expect(outcome.request.status).toBe('approved');
    expect(outcome.request.approved_at).toEqual(NOW);
    expect(outcome.purchase_order?.po_number).toBe('PO-20260302-000001');
    expect(outcome.purchase_order?.total_amount).toBe(20);
    expect(await store.getApprovals(requestId)).toHaveLength(2);
  });

  it('should reject at level 1 and refuse level 2 afterwards', async () => {
    const rejected = await engine.decide(bob, { request_id: requestId, level: 1, decision: 'rejected' });
    expect(rejected.request.status).toBe('rejected');
    expect(rejected.request.rejected_at).toEqual(NOW);

    await expect(
      engine.decide(carol, { request_id: requestId, level: 2, decision: 'approved' }),
    ).rejects.toThrow(InvalidStateError);
  });

  it('should report a repeated level as already decided', async () => {
    await engine.decide(bob, { request_id: requestId, level: 1, decision: 'approved' });

    await expect(
      engine.decide(bob, { request_id: requestId, level: 1, decision: 'approved' }),
    ).rejects.toThrow(AlreadyDecidedError);
  });

  it('should refuse level 2 while level 1 is pending', async () => {
    await expect(
      engine.decide(carol, { request_id: requestId, level: 2, decision: 'approved' }),
    ).rejects.toThrow('Level 2 cannot be decided while the request is pending_level_1');
  });

  it('should refuse the wrong role', async () => {
    await expect(
      engine.decide(carol, { request_id: requestId, level: 1, decision: 'approved' }),
    ).rejects.toMatchObject({ code: 'PERMISSION_DENIED', precondition: 'role' });
  });

  it('should refuse self approval', async () => {
    const ledger = new RequestLedger(store, { clock: () => NOW });
    const own = await ledger.create(alice, { title: 'Chairs', items: [{ description: 'Chair', quantity: 1, unit_price: 80 }] });
    await engine.decide(bob, { request_id: own.id, level: 1, decision: 'approved' });

    const selfApprover: UserProfile = { id: 'alice', role: 'approver_level_2' };
    await expect(
      engine.decide(selfApprover, { request_id: own.id, level: 2, decision: 'approved' }),
    ).rejects.toThrow(PermissionDeniedError);
    expect((await store.getRequest(own.id))?.status).toBe('pending_level_2');
  });

  it('should reject overlong comments before touching the request', async () => {
    await expect(
      engine.decide(bob, {
        request_id: requestId,
        level: 1,
        decision: 'approved',
        comment: 'x'.repeat(COMMENT_MAX_LENGTH + 1),
      }),
    ).rejects.toThrow(ValidationError);
    expect(await store.getApprovals(requestId)).toEqual([]);
  });

  it('should roll back the final approval when the purchase order cannot be generated', async () => {
    const failing = new ApprovalEngine(
      store,
      new PurchaseOrderGenerator({ renderer: { render: async () => Promise.reject(new Error('renderer down')) } }),
      { clock: () => NOW },
    );
    await failing.decide(bob, { request_id: requestId, level: 1, decision: 'approved' });

    await expect(
      failing.decide(carol, { request_id: requestId, level: 2, decision: 'approved' }),
    ).rejects.toThrow(PurchaseOrderGenerationError);

    const request = await store.getRequest(requestId);
    expect(request?.status).toBe('pending_level_2');
    expect(request?.approved_at).toBeNull();
    expect((await store.getApprovals(requestId)).map((a) => a.level)).toEqual([1]);
    expect(await store.getPurchaseOrderByRequest(requestId)).toBeNull();

    const retried = await engine.decide(carol, { request_id: requestId, level: 2, decision: 'approved' });
    expect(retried.request.status).toBe('approved');
    expect(retried.purchase_order?.sequence).toBe(2);
  });

  it('should produce exactly one decision and one order under concurrent final approvals', async () => {
    await engine.decide(bob, { request_id: requestId, level: 1, decision: 'approved' });
    const dana: UserProfile = { id: 'dana', role: 'approver_level_2' };

    const results = await Promise.allSettled([
      engine.decide(carol, { request_id: requestId, level: 2, decision: 'approved' }),
      engine.decide(dana, { request_id: requestId, level: 2, decision: 'approved' }),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toBeInstanceOf(AlreadyDecidedError);
    expect((await store.getApprovals(requestId)).filter((a) => a.level === 2)).toHaveLength(1);
    expect(await store.getPurchaseOrderByRequest(requestId)).not.toBeNull();
  });
});
