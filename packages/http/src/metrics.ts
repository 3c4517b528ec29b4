import type { FastifyInstance } from 'fastify';
import type { ServiceMetrics } from '@fxdesk/observability';

/** Records request duration and counts on every response, and serves `GET /metrics`. */
export function registerServiceMetrics(app: FastifyInstance, metrics: ServiceMetrics): ServiceMetrics {
  const startedAt = new WeakMap<object, number>();

  app.addHook('onRequest', async (request) => {
    startedAt.set(request, Date.now());
  });

  app.addHook('onResponse', async (request, reply) => {
    const duration = Math.max(Date.now() - (startedAt.get(request) ?? Date.now()), 0);
    const route = request.routeOptions.url ?? request.url;
    const status = String(reply.statusCode);

    metrics.requestDurationMs.labels(request.method, route, status).observe(duration);
    metrics.requestCount.labels(request.method, route, status).inc();

    if (reply.statusCode >= 400) {
      metrics.errorCount.labels(status).inc();
    }
  });

  app.get('/metrics', async (_request, reply) => {
    reply.header('content-type', metrics.registry.contentType);
    return metrics.registry.metrics();
  });

  return metrics;
}
