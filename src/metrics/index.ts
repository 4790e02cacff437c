import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const probeInvocationsTotal = new Counter({
  name: 'probe_invocations_total',
  help: 'Total probe invocations by response status code',
  labelNames: ['status_code'] as const,
  registers: [registry],
});

// kind: see describeKind() in core/errors
export const probeFailuresTotal = new Counter({
  name: 'probe_failures_total',
  help: 'Probe invocations that did not succeed, by error kind',
  labelNames: ['kind'] as const,
  registers: [registry],
});

export const probeDurationSeconds = new Histogram({
  name: 'probe_duration_seconds',
  help: 'Wall-clock duration of a full probe invocation (seconds)',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export const logStreamFailuresTotal = new Counter({
  name: 'log_stream_failures_total',
  help: 'Remote log stream operations that failed (create|emit)',
  labelNames: ['operation'] as const,
  registers: [registry],
});

export const dbConnectionsClosedTotal = new Counter({
  name: 'db_connections_closed_total',
  help: 'Database connections closed by the probe',
  registers: [registry],
});
