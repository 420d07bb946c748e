import { describe, it, expect, beforeEach } from 'vitest';
import {
  InMemoryIdentityResolver,
  InMemoryProcurementStore,
  ProcurementService,
} from '@requisition/core';
import type { PurchaseRequest } from '@requisition/core';
import { createIntentPipeline } from '../create-pipeline.js';
import type { IntentPipeline } from '../intent-pipeline.js';
import type { Intent } from '../types.js';

function intent(actorId: string, intent_type: string, data: Record<string, unknown>): Intent {
  return { intent_type, actor: { type: 'human', id: actorId }, data };
}

function isRequest(value: unknown): value is PurchaseRequest {
  return typeof value === 'object' && value !== null && 'id' in value && 'status' in value;
}

describe('procurement intent handlers', () => {
  let pipeline: IntentPipeline;

  beforeEach(() => {
    const service = new ProcurementService(
      new InMemoryProcurementStore(),
      new InMemoryIdentityResolver([
        { id: 'alice', role: 'staff' },
        { id: 'bob', role: 'approver_level_1' },
        { id: 'carol', role: 'approver_level_2' },
      ]),
      { clock: () => new Date('2026-03-02T09:00:00Z') },
    );
    pipeline = createIntentPipeline(service);
  });

  async function submit(): Promise<PurchaseRequest> {
    const result = await pipeline.execute(
      intent('alice', 'procurement.request.submit', {
        title: 'Pens',
        items: [{ description: 'Pens', quantity: 10, unit_price: 2 }],
      }),
    );
    if (!isRequest(result.result)) throw new Error(`submit failed: ${result.error}`);
    return result.result;
  }

  it('should register every procurement intent', () => {
    expect(pipeline.intentTypes()).toEqual([
      'procurement.proforma.import',
      'procurement.request.decide',
      'procurement.request.edit',
      'procurement.request.submit',
      'procurement.request.withdraw',
    ]);
  });

  it('should submit a request', async () => {
    const request = await submit();

    expect(request.status).toBe('pending_level_1');
    expect(request.total_amount).toBe(20);
  });

  it('should report a missing title as a validation failure', async () => {
    const result = await pipeline.execute(intent('alice', 'procurement.request.submit', { items: [] }));

    expect(result).toMatchObject({
      success: false,
      error_code: 'VALIDATION_ERROR',
      field: 'title',
      error: 'title: title is required',
    });
  });

  it('should carry the failed precondition on permission errors', async () => {
    const request = await submit();

    const result = await pipeline.execute(
      intent('carol', 'procurement.request.decide', { request_id: request.id, level: 1, decision: 'approved' }),
    );

    expect(result).toMatchObject({ success: false, error_code: 'PERMISSION_DENIED', precondition: 'role' });
  });

  it('should carry the idempotency precondition on repeated decisions', async () => {
    const request = await submit();
    const decide = intent('bob', 'procurement.request.decide', {
      request_id: request.id,
      level: 1,
      decision: 'approved',
      comment: null,
    });

    expect((await pipeline.execute(decide)).success).toBe(true);
    expect(await pipeline.execute(decide)).toMatchObject({
      success: false,
      error_code: 'ALREADY_DECIDED',
      precondition: 'idempotency',
    });
  });

  it('should edit and withdraw', async () => {
    const request = await submit();

    const edited = await pipeline.execute(
      intent('alice', 'procurement.request.edit', {
        request_id: request.id,
        items: [{ description: 'Pens', quantity: 1, unit_price: 2 }],
      }),
    );
    expect(edited.success).toBe(true);

    const withdrawn = await pipeline.execute(
      intent('alice', 'procurement.request.withdraw', { request_id: request.id }),
    );
    expect(withdrawn).toMatchObject({ success: true, result: { request_id: request.id } });
  });

  it('should refuse proforma import when no extraction service is configured', async () => {
    const result = await pipeline.execute(
      intent('alice', 'procurement.proforma.import', {
        title: 'Toner',
        document: { file_name: 'q.pdf', content_type: 'application/pdf', content: 'JVBERi0=' },
      }),
    );

    expect(result).toMatchObject({
      success: false,
      error_code: 'VALIDATION_ERROR',
      error: 'Proforma extraction is not configured',
    });
  });
});
