import { index, integer, numeric, pgTable, text, timestamp } from 'drizzle-orm/pg-core';
import { fxQuotes } from './quotes.js';

export const payments = pgTable(
  'payments',
  {
    paymentId: text('payment_id').primaryKey(),
    quoteId: text('quote_id').references(() => fxQuotes.quoteId),
    sourceCurrency: text('source_currency').notNull(),
    targetCurrency: text('target_currency').notNull(),
    direction: text('direction').notNull(),
    sourceAmount: numeric('source_amount', { precision: 18, scale: 2 }).notNull(),
    targetAmount: numeric('target_amount', { precision: 18, scale: 2 }).notNull(),
    fxRate: numeric('fx_rate', { precision: 18, scale: 8 }).notNull(),
    feeAmount: numeric('fee_amount', { precision: 18, scale: 2 }).notNull(),
    totalDebit: numeric('total_debit', { precision: 18, scale: 2 }).notNull(),
    status: text('status').notNull(),
    createdBy: text('created_by').notNull(),
    reference: text('reference'),
    externalReference: text('external_reference'),
    failureReason: text('failure_reason'),
    version: integer('version').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => ({
    statusIdx: index('idx_payments_status').on(table.status),
    createdByIdx: index('idx_payments_created_by').on(table.createdBy)
  })
);

export const paymentApprovalEvents = pgTable(
  'payment_approval_events',
  {
    eventId: text('event_id').primaryKey(),
    paymentId: text('payment_id')
      .notNull()
      .references(() => payments.paymentId),
    actorId: text('actor_id').notNull(),
    action: text('action').notNull(),
    fromStatus: text('from_status').notNull(),
    toStatus: text('to_status').notNull(),
    comment: text('comment'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => ({
    paymentIdx: index('idx_payment_approval_events_payment').on(table.paymentId, table.createdAt)
  })
);
