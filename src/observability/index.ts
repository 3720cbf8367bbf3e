// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  LogContext,
  asyncLocalStorage,
  getCorrelationId,
  getLogContext,
  addLogContext,
  logContextFields,
  runWithContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  redemptionsTotal,
  redemptionDuration,
  ledgerEntriesTotal,
  ledgerAmount,
  optimisticLockConflictsTotal,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';

// Tracing exports
export { initTracing, shutdownTracing, getTracer, withSpan } from './tracing';
