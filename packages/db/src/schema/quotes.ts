import { boolean, index, numeric, pgTable, text, timestamp } from 'drizzle-orm/pg-core';

export const fxQuotes = pgTable(
  'fx_quotes',
  {
    quoteId: text('quote_id').primaryKey(),
    sourceCurrency: text('source_currency').notNull(),
    targetCurrency: text('target_currency').notNull(),
    baseRate: numeric('base_rate', { precision: 18, scale: 8 }).notNull(),
    markupPct: numeric('markup_pct', { precision: 10, scale: 6 }).notNull(),
    finalRate: numeric('final_rate', { precision: 18, scale: 8 }).notNull(),
    rateOrigin: text('rate_origin').notNull(),
    rateSource: text('rate_source').notNull(),
    degraded: boolean('degraded').notNull(),
    rateFetchedAt: timestamp('rate_fetched_at', { withTimezone: true }).notNull(),
    issuedAt: timestamp('issued_at', { withTimezone: true }).notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    usedByPaymentId: text('used_by_payment_id'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => ({
    pairIssuedIdx: index('idx_fx_quotes_pair_issued_at').on(table.sourceCurrency, table.targetCurrency, table.issuedAt),
    issuedIdx: index('idx_fx_quotes_issued_at').on(table.issuedAt)
  })
);
