import { getPool } from '@fxdesk/db';
import type { ApprovalEvent, Payment, PaymentAction, PaymentDirection, PaymentStatus } from '@fxdesk/domain';
import { appendAuditLog } from '@fxdesk/http';
import { createServiceLogger, type ServiceLogger } from '@fxdesk/observability';
import { Decimal } from 'decimal.js';
import { asPersistenceError, inTransaction } from '../../lib/persistence.js';
import { QuoteAlreadyUsedError } from '../quotes/errors.js';
import { PaymentNotFoundError } from './errors.js';
import type { CreatePaymentRecords, PaymentListFilter, PaymentRepositoryPort, TransitionFn, TransitionRecords } from './types.js';

type Pool = ReturnType<typeof getPool>;

interface PaymentRow {
  [column: string]: unknown;
  payment_id: string;
  quote_id: string | null;
  source_currency: string;
  target_currency: string;
  direction: PaymentDirection;
  source_amount: string;
  target_amount: string;
  fx_rate: string;
  fee_amount: string;
  total_debit: string;
  status: PaymentStatus;
  created_by: string;
  reference: string | null;
  external_reference: string | null;
  failure_reason: string | null;
  version: number;
  created_at: Date | string;
  updated_at: Date | string;
}

interface EventRow {
  [column: string]: unknown;
  event_id: string;
  payment_id: string;
  actor_id: string;
  action: PaymentAction;
  from_status: PaymentStatus;
  to_status: PaymentStatus;
  comment: string | null;
  created_at: Date | string;
}

function mapPayment(row: PaymentRow): Payment {
  return {
    paymentId: row.payment_id,
    quoteId: row.quote_id,
    sourceCurrency: row.source_currency,
    targetCurrency: row.target_currency,
    direction: row.direction,
    sourceAmount: new Decimal(row.source_amount),
    targetAmount: new Decimal(row.target_amount),
    fxRate: new Decimal(row.fx_rate),
    feeAmount: new Decimal(row.fee_amount),
    totalDebit: new Decimal(row.total_debit),
    status: row.status,
    createdBy: row.created_by,
    reference: row.reference,
    externalReference: row.external_reference,
    failureReason: row.failure_reason,
    version: Number(row.version),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

function mapEvent(row: EventRow): ApprovalEvent {
  return {
    eventId: row.event_id,
    paymentId: row.payment_id,
    actorId: row.actor_id,
    action: row.action,
    fromStatus: row.from_status,
    toStatus: row.to_status,
    comment: row.comment,
    createdAt: new Date(row.created_at)
  };
}

export class PaymentRepository implements PaymentRepositoryPort {
  constructor(
    private readonly pool: Pool = getPool(),
    private readonly logger: ServiceLogger = createServiceLogger({ service: 'payments-api' })
  ) {}

  create(records: CreatePaymentRecords): Promise<Payment> {
    const { payment } = records;
    return inTransaction(this.pool, 'payment_create', this.logger, async (client) => {
      if (records.claimQuote && payment.quoteId) {
        const claimed = await client.query(
          'update fx_quotes set used_by_payment_id = $1 where quote_id = $2 and used_by_payment_id is null',
          [payment.paymentId, payment.quoteId]
        );
        if (claimed.rowCount !== 1) {
          throw new QuoteAlreadyUsedError(payment.quoteId);
        }
      }

      const inserted = await client.query<PaymentRow>(
        `
        insert into payments (
          payment_id,
          quote_id,
          source_currency,
          target_currency,
          direction,
          source_amount,
          target_amount,
          fx_rate,
          fee_amount,
          total_debit,
          status,
          created_by,
          reference,
          version,
          created_at,
          updated_at
        ) values ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16)
        returning *
        `,
        [
          payment.paymentId,
          payment.quoteId,
          payment.sourceCurrency,
          payment.targetCurrency,
          payment.direction,
          payment.sourceAmount,
          payment.targetAmount,
          payment.fxRate,
          payment.feeAmount,
          payment.totalDebit,
          payment.status,
          payment.createdBy,
          payment.reference,
          payment.version,
          payment.createdAt,
          payment.updatedAt
        ]
      );

      await appendAuditLog({ db: client, ...records.audit });

      const row = inserted.rows[0];
      return row ? mapPayment(row) : payment;
    });
  }

  async findById(paymentId: string): Promise<Payment | null> {
    try {
      const result = await this.pool.query<PaymentRow>('select * from payments where payment_id = $1', [paymentId]);
      const row = result.rows[0];
      return row ? mapPayment(row) : null;
    } catch (error) {
      throw asPersistenceError('payment_lookup', error);
    }
  }

  async listEvents(paymentId: string): Promise<ApprovalEvent[]> {
    try {
      const result = await this.pool.query<EventRow>(
        'select * from payment_approval_events where payment_id = $1 order by created_at asc, event_id asc',
        [paymentId]
      );
      return result.rows.map(mapEvent);
    } catch (error) {
      throw asPersistenceError('payment_events', error);
    }
  }

  async list(filter: PaymentListFilter): Promise<Payment[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    if (filter.status) {
      params.push(filter.status);
      conditions.push(`status = $${params.length}`);
    }
    if (filter.createdBy) {
      params.push(filter.createdBy);
      conditions.push(`created_by = $${params.length}`);
    }
    if (filter.currency) {
      params.push(filter.currency);
      conditions.push(`(source_currency = $${params.length} or target_currency = $${params.length})`);
    }
    params.push(filter.limit);

    const where = conditions.length > 0 ? `where ${conditions.join(' and ')}` : '';
    try {
      const result = await this.pool.query<PaymentRow>(
        `select * from payments ${where} order by created_at desc, payment_id desc limit $${params.length}`,
        params
      );
      return result.rows.map(mapPayment);
    } catch (error) {
      throw asPersistenceError('payment_list', error);
    }
  }

  applyTransition(paymentId: string, transition: TransitionFn): Promise<TransitionRecords> {
    return inTransaction(this.pool, 'payment_transition', this.logger, async (client) => {
      const locked = await client.query<PaymentRow>('select * from payments where payment_id = $1 for update', [paymentId]);
      const row = locked.rows[0];
      if (!row) {
        throw new PaymentNotFoundError(paymentId);
      }

      const current = mapPayment(row);
      const records = transition(current);

      const updated = await client.query(
        `
        update payments
        set status = $3,
            external_reference = $4,
            failure_reason = $5,
            version = $6,
            updated_at = $7
        where payment_id = $1 and version = $2
        `,
        [
          paymentId,
          current.version,
          records.payment.status,
          records.payment.externalReference,
          records.payment.failureReason,
          records.payment.version,
          records.payment.updatedAt
        ]
      );
      if (updated.rowCount !== 1) {
        throw new Error(`Payment ${paymentId} changed while locked.`);
      }

      await client.query(
        `
        insert into payment_approval_events (event_id, payment_id, actor_id, action, from_status, to_status, comment, created_at)
        values ($1, $2, $3, $4, $5, $6, $7, $8)
        `,
        [
          records.event.eventId,
          records.event.paymentId,
          records.event.actorId,
          records.event.action,
          records.event.fromStatus,
          records.event.toStatus,
          records.event.comment,
          records.event.createdAt
        ]
      );

      await appendAuditLog({ db: client, ...records.audit });
      return records;
    });
  }
}
