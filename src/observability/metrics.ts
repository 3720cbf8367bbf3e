import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'gem-ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Redemption Metrics
// ============================================

/**
 * Redemption attempts by outcome (completed or the error code name)
 */
export const redemptionsTotal = new Counter({
  name: 'code_redemptions_total',
  help: 'Code redemption attempts by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const redemptionDuration = new Histogram({
  name: 'code_redemption_duration_seconds',
  help: 'Code redemption duration in seconds',
  labelNames: ['outcome'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

export const ledgerEntriesTotal = new Counter({
  name: 'ledger_entries_total',
  help: 'Ledger entries appended by kind and currency kind',
  labelNames: ['kind', 'currency_kind'] as const,
  registers: [registry],
});

export const ledgerAmount = new Histogram({
  name: 'ledger_entry_amount',
  help: 'Ledger entry amounts',
  labelNames: ['kind'] as const,
  buckets: [10, 100, 1000, 10000, 100000, 1000000],
  registers: [registry],
});

/**
 * Version conflicts seen while saving a currency account
 */
export const optimisticLockConflictsTotal = new Counter({
  name: 'optimistic_lock_conflicts_total',
  help: 'Currency account version conflicts by operation',
  labelNames: ['operation'] as const,
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
