import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface ServiceMetrics {
  registry: Registry;
  requestDurationMs: Histogram<'method' | 'route' | 'status'>;
  requestCount: Counter<'method' | 'route' | 'status'>;
  errorCount: Counter<'code'>;
  buildInfo: Gauge<'release_id' | 'git_sha' | 'environment'>;
  quotesIssued: Counter<'origin' | 'degraded'>;
  rateSourceFailures: Counter<'failure'>;
  paymentTransitions: Counter<'action' | 'to'>;
}

export function createServiceMetrics(serviceName: string): ServiceMetrics {
  const prefix = serviceName.replaceAll('-', '_');
  const registry = new Registry();

  const requestDurationMs = new Histogram({
    name: `${prefix}_request_duration_ms`,
    help: 'Request duration in milliseconds',
    labelNames: ['method', 'route', 'status'] as const,
    buckets: [10, 25, 50, 100, 250, 500, 1000, 2000],
    registers: [registry]
  });

  const requestCount = new Counter({
    name: `${prefix}_request_total`,
    help: 'Total HTTP requests',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [registry]
  });

  const errorCount = new Counter({
    name: `${prefix}_error_total`,
    help: 'Total errors',
    labelNames: ['code'] as const,
    registers: [registry]
  });

  const buildInfo = new Gauge({
    name: `${prefix}_build_info`,
    help: 'Build and deployment metadata for this running service',
    labelNames: ['release_id', 'git_sha', 'environment'] as const,
    registers: [registry]
  });

  buildInfo
    .labels(process.env.RELEASE_ID ?? 'dev', process.env.GIT_SHA ?? 'local', process.env.NODE_ENV ?? 'development')
    .set(1);

  const quotesIssued = new Counter({
    name: `${prefix}_quotes_issued_total`,
    help: 'FX quotes issued, by rate origin and degraded flag',
    labelNames: ['origin', 'degraded'] as const,
    registers: [registry]
  });

  const rateSourceFailures = new Counter({
    name: `${prefix}_rate_source_failures_total`,
    help: 'Upstream FX rate failures absorbed by the fallback chain',
    labelNames: ['failure'] as const,
    registers: [registry]
  });

  const paymentTransitions = new Counter({
    name: `${prefix}_payment_transitions_total`,
    help: 'Accepted payment state transitions',
    labelNames: ['action', 'to'] as const,
    registers: [registry]
  });

  return {
    registry,
    requestDurationMs,
    requestCount,
    errorCount,
    buildInfo,
    quotesIssued,
    rateSourceFailures,
    paymentTransitions
  };
}
