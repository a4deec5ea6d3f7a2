import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

/**
 * Process-wide Prometheus registry. Default Node metrics are collected only
 * when METRICS=prom so tests do not start the collector.
 */
export const registry = new Registry();

if ((process.env.METRICS ?? '').toLowerCase() === 'prom') {
  collectDefaultMetrics({ register: registry });
}

const tasksStarted = new Counter({
  name: 'planner_tasks_started_total',
  help: 'Generation and replan tasks accepted',
  labelNames: ['kind'],
  registers: [registry],
});

const tasksFinished = new Counter({
  name: 'planner_tasks_finished_total',
  help: 'Tasks that reached a terminal status',
  labelNames: ['status', 'code'],
  registers: [registry],
});

const providerCalls = new Counter({
  name: 'planner_provider_calls_total',
  help: 'Provider results recorded by the gather coordinator',
  labelNames: ['source', 'outcome'],
  registers: [registry],
});

const providerLatency = new Histogram({
  name: 'planner_provider_latency_ms',
  help: 'Provider call latency in milliseconds',
  labelNames: ['source'],
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 15000],
  registers: [registry],
});

const turns = new Counter({
  name: 'planner_turns_total',
  help: 'Conversation turns by outcome',
  labelNames: ['outcome'],
  registers: [registry],
});

const externalRequests = new Counter({
  name: 'planner_external_requests_total',
  help: 'Outbound HTTP requests by target and status',
  labelNames: ['target', 'status'],
  registers: [registry],
});

export function incTaskStarted(kind: 'generate' | 'replan'): void {
  tasksStarted.inc({ kind });
}

export function incTaskFinished(status: string, code = 'none'): void {
  tasksFinished.inc({ status, code });
}

export function observeProvider(source: string, outcome: string, latencyMs: number): void {
  providerCalls.inc({ source, outcome });
  if (outcome !== 'missing') {
    providerLatency.observe({ source }, latencyMs);
  }
}

export function incTurn(outcome: 'applied' | 'duplicate'): void {
  turns.inc({ outcome });
}

export function observeExternal(target: string, status: string): void {
  externalRequests.inc({ target, status });
}

export async function getPrometheusText(): Promise<string> {
  return registry.metrics();
}

export function metricsContentType(): string {
  return registry.contentType;
}
