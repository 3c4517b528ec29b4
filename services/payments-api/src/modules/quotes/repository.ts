import { appendAuditLog, type AuditEntry } from '@fxdesk/http';
import { getPool } from '@fxdesk/db';
import type { Quote, RateOrigin } from '@fxdesk/domain';
import { createServiceLogger, type ServiceLogger } from '@fxdesk/observability';
import { Decimal } from 'decimal.js';
import { asPersistenceError, inTransaction } from '../../lib/persistence.js';
import type { QuoteListFilter, QuoteRecord, QuoteRepositoryPort } from './types.js';

type Pool = ReturnType<typeof getPool>;

interface QuoteRow {
  [column: string]: unknown;
  quote_id: string;
  source_currency: string;
  target_currency: string;
  base_rate: string;
  markup_pct: string;
  final_rate: string;
  rate_origin: RateOrigin;
  rate_source: string;
  degraded: boolean;
  rate_fetched_at: Date | string;
  issued_at: Date | string;
  expires_at: Date | string;
  used_by_payment_id: string | null;
}

export function mapQuoteRow(row: QuoteRow): QuoteRecord {
  return {
    quoteId: row.quote_id,
    pair: { source: row.source_currency, target: row.target_currency },
    baseRate: new Decimal(row.base_rate),
    markupPct: new Decimal(row.markup_pct),
    finalRate: new Decimal(row.final_rate),
    rateOrigin: row.rate_origin,
    rateSource: row.rate_source,
    degraded: row.degraded,
    rateFetchedAt: new Date(row.rate_fetched_at),
    issuedAt: new Date(row.issued_at),
    expiresAt: new Date(row.expires_at),
    usedByPaymentId: row.used_by_payment_id
  };
}

export class QuoteRepository implements QuoteRepositoryPort {
  constructor(
    private readonly pool: Pool = getPool(),
    private readonly logger: ServiceLogger = createServiceLogger({ service: 'payments-api' })
  ) {}

  save(quote: Quote, audit: AuditEntry): Promise<void> {
    return inTransaction(this.pool, 'quote_issue', this.logger, async (client) => {
      await client.query(
        `
        insert into fx_quotes (
          quote_id,
          source_currency,
          target_currency,
          base_rate,
          markup_pct,
          final_rate,
          rate_origin,
          rate_source,
          degraded,
          rate_fetched_at,
          issued_at,
          expires_at
        ) values ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12)
        `,
        [
          quote.quoteId,
          quote.pair.source,
          quote.pair.target,
          quote.baseRate,
          quote.markupPct,
          quote.finalRate,
          quote.rateOrigin,
          quote.rateSource,
          quote.degraded,
          quote.rateFetchedAt,
          quote.issuedAt,
          quote.expiresAt
        ]
      );
      await appendAuditLog({ db: client, ...audit });
    });
  }

  async findById(quoteId: string): Promise<QuoteRecord | null> {
    try {
      const result = await this.pool.query<QuoteRow>('select * from fx_quotes where quote_id = $1', [quoteId]);
      const row = result.rows[0];
      return row ? mapQuoteRow(row) : null;
    } catch (error) {
      throw asPersistenceError('quote_lookup', error);
    }
  }

  async listRecent(filter: QuoteListFilter): Promise<QuoteRecord[]> {
    const params: unknown[] = [];
    let where = '';
    if (filter.activeAt) {
      params.push(filter.activeAt);
      where = `where expires_at > $${params.length}`;
    }
    params.push(filter.limit);

    try {
      const result = await this.pool.query<QuoteRow>(
        `select * from fx_quotes ${where} order by issued_at desc, quote_id desc limit $${params.length}`,
        params
      );
      return result.rows.map(mapQuoteRow);
    } catch (error) {
      throw asPersistenceError('quote_list', error);
    }
  }
}
