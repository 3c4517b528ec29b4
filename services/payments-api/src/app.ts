import { registerErrorHandler, registerServiceMetrics } from '@fxdesk/http';
import type { ServiceLogger, ServiceMetrics } from '@fxdesk/observability';
import Fastify, { type FastifyInstance } from 'fastify';
import { requireActor } from './lib/actor.js';
import type { AuditTrailPort } from './modules/audit/index.js';
import type { ExecutionService, PaymentService } from './modules/payments/index.js';
import type { QuoteService } from './modules/quotes/index.js';
import { buildHealthRoutes, type ReadinessProbe } from './routes/health.js';
import { buildInternalExecutionRoutes } from './routes/internal-execution.js';
import { buildPaymentRoutes } from './routes/payments.js';
import { buildQuoteRoutes } from './routes/quotes.js';

export const SERVICE_NAME = 'payments-api';

export interface PaymentsApiDeps {
  quoteService: QuoteService;
  paymentService: PaymentService;
  executionService: ExecutionService;
  auditTrail: AuditTrailPort;
  logger: ServiceLogger;
  metrics: ServiceMetrics;
  readiness: ReadinessProbe;
  clock?: () => Date;
}

interface PaymentParams {
  paymentId: string;
}

export async function buildPaymentsApiApp(deps: PaymentsApiDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });

  registerServiceMetrics(app, deps.metrics);
  registerErrorHandler(app, (error, request) => {
    deps.logger.error('payments-api unhandled error', {
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      requestId: request.id,
      route: request.routeOptions.url
    });
  });

  const health = buildHealthRoutes(SERVICE_NAME, deps.readiness);
  const quotes = buildQuoteRoutes(deps.quoteService, deps.clock);
  const payments = buildPaymentRoutes(deps.paymentService, deps.auditTrail);
  const execution = buildInternalExecutionRoutes(deps.executionService);

  app.get('/healthz', async () => health.live());
  app.get('/readyz', async (_request, reply) => {
    const result = await health.ready();
    return reply.status(result.status).send(result.body);
  });

  app.get('/v1/fx/currencies', async (_request, reply) => {
    const result = await quotes.currencies();
    return reply.status(result.status).send(result.body);
  });

  app.post('/v1/quotes', async (request, reply) => {
    const result = await quotes.issue(request.body, requireActor(request));
    return reply.status(result.status).send(result.body);
  });

  app.get('/v1/quotes', async (request, reply) => {
    const result = await quotes.list(request.query);
    return reply.status(result.status).send(result.body);
  });

  app.get<{ Params: { quoteId: string } }>('/v1/quotes/:quoteId', async (request, reply) => {
    const result = await quotes.get(request.params.quoteId);
    return reply.status(result.status).send(result.body);
  });

  app.post('/v1/payments', async (request, reply) => {
    const result = await payments.create(request.body, requireActor(request));
    return reply.status(result.status).send(result.body);
  });

  app.get('/v1/payments', async (request, reply) => {
    const result = await payments.list(request.query);
    return reply.status(result.status).send(result.body);
  });

  app.get<{ Params: PaymentParams }>('/v1/payments/:paymentId', async (request, reply) => {
    const result = await payments.get(request.params.paymentId);
    return reply.status(result.status).send(result.body);
  });

  app.get<{ Params: PaymentParams }>('/v1/payments/:paymentId/events', async (request, reply) => {
    const result = await payments.events(request.params.paymentId);
    return reply.status(result.status).send(result.body);
  });

  app.get<{ Params: PaymentParams }>('/v1/payments/:paymentId/audit', async (request, reply) => {
    const result = await payments.audit(request.params.paymentId);
    return reply.status(result.status).send(result.body);
  });

  app.post<{ Params: PaymentParams }>('/v1/payments/:paymentId/submit', async (request, reply) => {
    const result = await payments.submit(request.params.paymentId, requireActor(request));
    return reply.status(result.status).send(result.body);
  });

  app.post<{ Params: PaymentParams }>('/v1/payments/:paymentId/approve', async (request, reply) => {
    const result = await payments.approve(request.params.paymentId, requireActor(request), request.body);
    return reply.status(result.status).send(result.body);
  });

  app.post<{ Params: PaymentParams }>('/v1/payments/:paymentId/reject', async (request, reply) => {
    const result = await payments.reject(request.params.paymentId, requireActor(request), request.body);
    return reply.status(result.status).send(result.body);
  });

  app.post<{ Params: PaymentParams }>('/internal/v1/payments/:paymentId/dispatch', async (request, reply) => {
    const result = await execution.dispatch(request.params.paymentId);
    return reply.status(result.status).send(result.body);
  });

  app.post<{ Params: PaymentParams }>('/internal/v1/payments/:paymentId/execution-outcome', async (request, reply) => {
    const result = await execution.recordOutcome(request.params.paymentId, request.body);
    return reply.status(result.status).send(result.body);
  });

  return app;
}
