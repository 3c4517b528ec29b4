import { afterEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { PaymentExecutionAdapter } from '@fxdesk/adapters';
import { PersistenceError } from '@fxdesk/domain';
import { buildPaymentsApiApp } from '../src/app.js';
import { createHarness, StubRateSource, TestClock, type HarnessOptions } from './support/harness.js';

const apps: FastifyInstance[] = [];

afterEach(async () => {
  await Promise.all(apps.splice(0).map((app) => app.close()));
});

async function setup(options: HarnessOptions & { ready?: boolean } = {}) {
  const clock = options.clock ?? new TestClock();
  const harness = createHarness({ ...options, clock, source: options.source ?? new StubRateSource([{ rate: '1.16' }], clock.now) });
  const app = await buildPaymentsApiApp({
    quoteService: harness.quoteService,
    paymentService: harness.paymentService,
    executionService: harness.executionService,
    auditTrail: harness.audit,
    logger: harness.logger,
    metrics: harness.metrics,
    readiness: async () => options.ready ?? true,
    clock: clock.now
  });
  apps.push(app);
  return { app, harness };
}

function actor(id: string) {
  return { 'x-actor-id': id };
}

async function createApprovedPayment(app: FastifyInstance): Promise<string> {
  const quote = await app.inject({
    method: 'POST',
    url: '/v1/quotes',
    headers: actor('user42'),
    payload: { sourceCurrency: 'GBP', targetCurrency: 'EUR' }
  });
  const payment = await app.inject({
    method: 'POST',
    url: '/v1/payments',
    headers: actor('user42'),
    payload: { quoteId: quote.json().quoteId, direction: 'send', amount: 1000 }
  });
  const paymentId: string = payment.json().paymentId;
  await app.inject({ method: 'POST', url: `/v1/payments/${paymentId}/submit`, headers: actor('user42') });
  await app.inject({ method: 'POST', url: `/v1/payments/${paymentId}/approve`, headers: actor('user7') });
  return paymentId;
}

describe('payments-api routes', () => {
  describe('health', () => {
    it('reports liveness and readiness', async () => {
      const { app } = await setup();

      const live = await app.inject({ method: 'GET', url: '/healthz' });
      const ready = await app.inject({ method: 'GET', url: '/readyz' });

      expect(live.json()).toEqual({ ok: true, service: 'payments-api' });
      expect(ready.statusCode).toBe(200);
    });

    it('answers 503 when the store is down', async () => {
      const { app } = await setup({ ready: false });

      const ready = await app.inject({ method: 'GET', url: '/readyz' });

      expect(ready.statusCode).toBe(503);
      expect(ready.json()).toEqual({ ok: false, service: 'payments-api', checks: { database: 'down' } });
    });
  });

  describe('quotes', () => {
    it('issues a quote with its rate breakdown', async () => {
      const { app } = await setup();

      const response = await app.inject({
        method: 'POST',
        url: '/v1/quotes',
        headers: actor('user42'),
        payload: { sourceCurrency: 'gbp', targetCurrency: 'eur' }
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({
        quoteId: 'q_1',
        sourceCurrency: 'GBP',
        targetCurrency: 'EUR',
        baseRate: '1.16000000',
        markupPct: '0.005',
        markupAmount: '0.00580000',
        finalRate: '1.16580000',
        inverseRate: '0.85778007',
        issuedAt: '2026-03-01T09:00:00.000Z',
        expiresAt: '2026-03-01T09:02:00.000Z',
        secondsRemaining: 120,
        expired: false,
        degraded: false,
        rateOrigin: 'source',
        rateSource: 'live',
        rateFetchedAt: '2026-03-01T09:00:00.000Z',
        used: false
      });
    });

    it('shows the remaining validity when a quote is read back', async () => {
      const { app, harness } = await setup();
      await app.inject({ method: 'POST', url: '/v1/quotes', headers: actor('user42'), payload: { sourceCurrency: 'GBP', targetCurrency: 'EUR' } });
      harness.clock.advance(31_000);

      const response = await app.inject({ method: 'GET', url: '/v1/quotes/q_1' });

      expect(response.json()).toMatchObject({ secondsRemaining: 89, expired: false });
    });

    it('requires an actor to issue a quote', async () => {
      const { app } = await setup();

      const response = await app.inject({ method: 'POST', url: '/v1/quotes', payload: { sourceCurrency: 'GBP', targetCurrency: 'EUR' } });

      expect(response.statusCode).toBe(401);
      expect(response.json().error).toMatchObject({ code: 'ACTOR_REQUIRED', message: 'x-actor-id header is required.' });
    });

    it('rejects unsupported currencies and malformed bodies', async () => {
      const { app } = await setup();

      const unsupported = await app.inject({
        method: 'POST',
        url: '/v1/quotes',
        headers: actor('user42'),
        payload: { sourceCurrency: 'GBP', targetCurrency: 'XAU' }
      });
      const malformed = await app.inject({ method: 'POST', url: '/v1/quotes', headers: actor('user42'), payload: {} });

      expect(unsupported.statusCode).toBe(400);
      expect(unsupported.json().error).toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Unsupported currency: XAU.',
        details: { currency: 'XAU' }
      });
      expect(malformed.statusCode).toBe(400);
      expect(malformed.json().error.code).toBe('INVALID_PAYLOAD');
    });

    it('answers 404 for an unknown quote', async () => {
      const { app } = await setup();

      const response = await app.inject({ method: 'GET', url: '/v1/quotes/q_missing' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error).toMatchObject({ code: 'QUOTE_NOT_FOUND', message: 'Quote q_missing was not found.' });
    });

    it('lists supported currencies', async () => {
      const { app } = await setup();

      const response = await app.inject({ method: 'GET', url: '/v1/fx/currencies' });

      expect(response.json()).toEqual({
        currencies: [
          { code: 'EUR', name: 'Euro', decimals: 2 },
          { code: 'GBP', name: 'British Pound Sterling', decimals: 2 }
        ],
        origin: 'source',
        degraded: false
      });
    });
  });

  describe('payments', () => {
    it('runs the maker-checker flow end to end', async () => {
      const { app } = await setup();
      const quote = await app.inject({
        method: 'POST',
        url: '/v1/quotes',
        headers: actor('user42'),
        payload: { sourceCurrency: 'GBP', targetCurrency: 'EUR' }
      });

      const created = await app.inject({
        method: 'POST',
        url: '/v1/payments',
        headers: actor('user42'),
        payload: { quoteId: quote.json().quoteId, direction: 'send', amount: '1000', reference: 'INV-1001' }
      });
      expect(created.statusCode).toBe(201);
      expect(created.json()).toMatchObject({
        paymentId: 'pay_2',
        sourceAmount: '1000.00',
        targetAmount: '1165.80',
        feeAmount: '5.00',
        totalDebit: '1005.00',
        status: 'draft',
        createdBy: 'user42',
        reference: 'INV-1001'
      });

      await app.inject({ method: 'POST', url: '/v1/payments/pay_2/submit', headers: actor('user42') });

      const selfApproval = await app.inject({ method: 'POST', url: '/v1/payments/pay_2/approve', headers: actor('user42') });
      expect(selfApproval.statusCode).toBe(403);
      expect(selfApproval.json().error).toMatchObject({
        code: 'SELF_APPROVAL_FORBIDDEN',
        message: 'Actor user42 created payment pay_2 and cannot approve or reject it.'
      });

      const approved = await app.inject({
        method: 'POST',
        url: '/v1/payments/pay_2/approve',
        headers: actor('user7'),
        payload: { comment: 'ok' }
      });
      expect(approved.statusCode).toBe(200);
      expect(approved.json()).toMatchObject({ status: 'approved', allowedActions: ['dispatch'], version: 2 });

      const events = await app.inject({ method: 'GET', url: '/v1/payments/pay_2/events' });
      expect(events.json().events.map((event: { action: string }) => event.action)).toEqual(['submit', 'approve']);

      const audit = await app.inject({ method: 'GET', url: '/v1/payments/pay_2/audit' });
      expect(audit.json().entries.map((entry: { action: string }) => entry.action)).toEqual([
        'payment_created',
        'payment_submit',
        'payment_approve'
      ]);
    });

    it('refuses to reject an approved payment', async () => {
      const { app } = await setup();
      const paymentId = await createApprovedPayment(app);

      const again = await app.inject({ method: 'POST', url: `/v1/payments/${paymentId}/reject`, headers: actor('user8') });

      expect(again.statusCode).toBe(409);
      expect(again.json().error).toMatchObject({
        code: 'INVALID_TRANSITION',
        message: 'Cannot reject a payment in status approved.'
      });
    });

    it('rejects an expired quote with 409', async () => {
      const { app, harness } = await setup();
      await app.inject({ method: 'POST', url: '/v1/quotes', headers: actor('user42'), payload: { sourceCurrency: 'GBP', targetCurrency: 'EUR' } });
      harness.clock.advance(121_000);

      const response = await app.inject({
        method: 'POST',
        url: '/v1/payments',
        headers: actor('user42'),
        payload: { quoteId: 'q_1', direction: 'send', amount: '1000' }
      });

      expect(response.statusCode).toBe(409);
      expect(response.json().error.code).toBe('QUOTE_EXPIRED');
    });

    it('rejects a non-positive amount', async () => {
      const { app } = await setup();
      await app.inject({ method: 'POST', url: '/v1/quotes', headers: actor('user42'), payload: { sourceCurrency: 'GBP', targetCurrency: 'EUR' } });

      const response = await app.inject({
        method: 'POST',
        url: '/v1/payments',
        headers: actor('user42'),
        payload: { quoteId: 'q_1', direction: 'send', amount: '0' }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toMatchObject({ code: 'VALIDATION_ERROR', message: 'amount must be greater than zero.' });
    });

    it('answers 404 for unknown payments', async () => {
      const { app } = await setup();

      const response = await app.inject({ method: 'GET', url: '/v1/payments/pay_missing/audit' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.code).toBe('PAYMENT_NOT_FOUND');
    });

    it('hides store failures behind the registry message', async () => {
      const { app, harness } = await setup();
      await app.inject({ method: 'POST', url: '/v1/quotes', headers: actor('user42'), payload: { sourceCurrency: 'GBP', targetCurrency: 'EUR' } });
      harness.paymentRepository.failNextWrite = new PersistenceError('payment_create', new Error('password authentication failed'));

      const response = await app.inject({
        method: 'POST',
        url: '/v1/payments',
        headers: actor('user42'),
        payload: { quoteId: 'q_1', direction: 'send', amount: '1000' }
      });

      expect(response.statusCode).toBe(503);
      expect(response.json().error).toEqual({
        code: 'PERSISTENCE_ERROR',
        message: 'The request could not be stored. No changes were made.',
        requestId: expect.any(String)
      });
      expect(harness.lines.find((line) => line.message === 'payments-api unhandled error')?.level).toBe('error');
    });
  });

  describe('listing', () => {
    it('serves the approval queue with filters', async () => {
      const { app } = await setup();
      await createApprovedPayment(app);
      const quote = await app.inject({
        method: 'POST',
        url: '/v1/quotes',
        headers: actor('user42'),
        payload: { sourceCurrency: 'GBP', targetCurrency: 'EUR' }
      });
      await app.inject({
        method: 'POST',
        url: '/v1/payments',
        headers: actor('user42'),
        payload: { quoteId: quote.json().quoteId, direction: 'send', amount: '250' }
      });
      await app.inject({ method: 'POST', url: '/v1/payments/pay_6/submit', headers: actor('user42') });

      const pending = await app.inject({ method: 'GET', url: '/v1/payments?status=pending_approval' });
      const byCreator = await app.inject({ method: 'GET', url: '/v1/payments?createdBy=user42&currency=eur' });
      const idsOf = (body: { payments: Array<{ paymentId: string }> }) => body.payments.map((payment) => payment.paymentId);

      expect(pending.statusCode).toBe(200);
      expect(idsOf(pending.json())).toEqual(['pay_6']);
      expect(pending.json().payments[0]).toMatchObject({ status: 'pending_approval', sourceAmount: '250.00', allowedActions: ['approve', 'reject'] });
      expect(idsOf(byCreator.json())).toEqual(['pay_6', 'pay_2']);
    });

    it('rejects an unknown status filter', async () => {
      const { app } = await setup();

      const response = await app.inject({ method: 'GET', url: '/v1/payments?status=settled' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('INVALID_PAYLOAD');
    });

    it('lists active quotes with their remaining validity', async () => {
      const { app, harness } = await setup();
      const issue = () =>
        app.inject({ method: 'POST', url: '/v1/quotes', headers: actor('user42'), payload: { sourceCurrency: 'GBP', targetCurrency: 'EUR' } });
      await issue();
      harness.clock.advance(60_000);
      await issue();
      harness.clock.advance(61_000);

      const active = await app.inject({ method: 'GET', url: '/v1/quotes?active=true' });
      const recent = await app.inject({ method: 'GET', url: '/v1/quotes' });

      expect(active.statusCode).toBe(200);
      expect(active.json().quotes).toHaveLength(1);
      expect(active.json().quotes[0]).toMatchObject({ quoteId: 'q_2', secondsRemaining: 59, expired: false });
      expect(recent.json().quotes.map((quote: { quoteId: string; expired: boolean }) => [quote.quoteId, quote.expired])).toEqual([
        ['q_2', false],
        ['q_1', true]
      ]);
    });
  });

  describe('internal execution', () => {
    it('dispatches and records completion', async () => {
      const { app } = await setup();
      const paymentId = await createApprovedPayment(app);

      const dispatched = await app.inject({ method: 'POST', url: `/internal/v1/payments/${paymentId}/dispatch` });
      const completed = await app.inject({
        method: 'POST',
        url: `/internal/v1/payments/${paymentId}/execution-outcome`,
        payload: { outcome: 'completed' }
      });

      expect(dispatched.json()).toMatchObject({ status: 'submitted', externalReference: `sandbox-payment:${paymentId}` });
      expect(completed.json()).toMatchObject({ status: 'completed', allowedActions: [] });
    });

    it('maps a provider failure to 502', async () => {
      const execute = vi.fn<PaymentExecutionAdapter['execute']>().mockRejectedValue(new Error('provider timeout'));
      const { app } = await setup({ adapter: { execute } });
      const paymentId = await createApprovedPayment(app);

      const response = await app.inject({ method: 'POST', url: `/internal/v1/payments/${paymentId}/dispatch` });

      expect(response.statusCode).toBe(502);
      expect(response.json().error).toMatchObject({
        code: 'EXECUTION_FAILED',
        message: 'Payment execution provider rejected the request.'
      });
    });

    it('validates the outcome payload', async () => {
      const { app } = await setup();
      const paymentId = await createApprovedPayment(app);

      const response = await app.inject({
        method: 'POST',
        url: `/internal/v1/payments/${paymentId}/execution-outcome`,
        payload: { outcome: 'settled' }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('INVALID_PAYLOAD');
    });
  });

  it('exposes request metrics', async () => {
    const { app } = await setup();
    await app.inject({ method: 'GET', url: '/healthz' });

    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('payments_api_test_request_total{method="GET",route="/healthz",status="200"} 1');
  });

  it('answers unknown routes with the error envelope', async () => {
    const { app } = await setup();

    const response = await app.inject({ method: 'GET', url: '/v1/unknown' });

    expect(response.statusCode).toBe(404);
    expect(response.json().error.code).toBe('NOT_FOUND');
  });
});
