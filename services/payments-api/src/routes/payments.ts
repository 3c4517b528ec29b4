import { PAYMENT_DIRECTIONS, PAYMENT_STATUSES } from '@fxdesk/domain';
import { z } from 'zod';
import type { AuditRecord, AuditTrailPort } from '../modules/audit/index.js';
import {
  toApprovalEventView,
  toPaymentView,
  type ApprovalEventView,
  type PaymentService,
  type PaymentView
} from '../modules/payments/index.js';

const createPaymentPayloadSchema = z.object({
  quoteId: z.string().trim().min(1),
  direction: z.enum(PAYMENT_DIRECTIONS),
  amount: z.union([z.string().trim().min(1), z.number()]).transform((value) => String(value)),
  reference: z.string().trim().min(1).max(140).optional()
});

const listPaymentsQuerySchema = z.object({
  status: z.enum(PAYMENT_STATUSES).optional(),
  createdBy: z.string().trim().min(1).optional(),
  currency: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3}$/, 'Expected an ISO 4217 currency code.')
    .transform((value) => value.toUpperCase())
    .optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50)
});

const reviewPayloadSchema = z
  .object({
    comment: z.string().max(1000).optional()
  })
  .default({});

interface HttpResult<T> {
  status: number;
  body: T;
}

export function buildPaymentRoutes(service: PaymentService, auditTrail: AuditTrailPort) {
  return {
    create: async (payload: unknown, actorId: string): Promise<HttpResult<PaymentView>> => {
      const input = createPaymentPayloadSchema.parse(payload);
      const payment = await service.createDraft({ ...input, createdBy: actorId });
      return { status: 201, body: toPaymentView(payment) };
    },

    list: async (query: unknown): Promise<HttpResult<{ payments: PaymentView[] }>> => {
      const filter = listPaymentsQuerySchema.parse(query);
      const payments = await service.listPayments(filter);
      return { status: 200, body: { payments: payments.map(toPaymentView) } };
    },

    get: async (paymentId: string): Promise<HttpResult<PaymentView>> => ({
      status: 200,
      body: toPaymentView(await service.getPayment(paymentId))
    }),

    events: async (paymentId: string): Promise<HttpResult<{ events: ApprovalEventView[] }>> => {
      const events = await service.listEvents(paymentId);
      return { status: 200, body: { events: events.map(toApprovalEventView) } };
    },

    audit: async (paymentId: string): Promise<HttpResult<{ entries: AuditRecord[] }>> => {
      await service.getPayment(paymentId);
      return { status: 200, body: { entries: await auditTrail.findByEntity('payment', paymentId) } };
    },

    submit: async (paymentId: string, actorId: string): Promise<HttpResult<PaymentView>> => ({
      status: 200,
      body: toPaymentView(await service.submit(paymentId, actorId))
    }),

    approve: async (paymentId: string, actorId: string, payload: unknown): Promise<HttpResult<PaymentView>> => {
      const { comment } = reviewPayloadSchema.parse(payload ?? undefined);
      return { status: 200, body: toPaymentView(await service.approve(paymentId, actorId, comment)) };
    },

    reject: async (paymentId: string, actorId: string, payload: unknown): Promise<HttpResult<PaymentView>> => {
      const { comment } = reviewPayloadSchema.parse(payload ?? undefined);
      return { status: 200, body: toPaymentView(await service.reject(paymentId, actorId, comment)) };
    }
  };
}
