import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { trace, SpanStatusCode, Span, Tracer } from '@opentelemetry/api';
import { config } from '../config';
import { logger } from './logger';

let sdk: NodeSDK | null = null;

/**
 * Initialize OpenTelemetry SDK
 * Should be called before the app and database modules do any work
 */
export const initTracing = (): void => {
  if (config.isTest || !config.otel.enabled) {
    logger.debug('Tracing disabled');
    return;
  }

  try {
    sdk = new NodeSDK({
      serviceName: config.otel.serviceName,
      traceExporter: new OTLPTraceExporter({
        url: config.otel.exporterEndpoint,
      }),
      instrumentations: [
        getNodeAutoInstrumentations({
          '@opentelemetry/instrumentation-express': { enabled: true },
          '@opentelemetry/instrumentation-mongodb': { enabled: true },
          '@opentelemetry/instrumentation-http': { enabled: true },
          '@opentelemetry/instrumentation-fs': { enabled: false },
        }),
      ],
    });

    sdk.start();
    logger.info({ endpoint: config.otel.exporterEndpoint }, 'OpenTelemetry tracing initialized');
  } catch (error) {
    logger.warn({ err: error }, 'Failed to initialize OpenTelemetry tracing');
  }
};

export const shutdownTracing = async (): Promise<void> => {
  if (sdk) {
    try {
      await sdk.shutdown();
      logger.info('OpenTelemetry tracing shut down');
    } catch (error) {
      logger.error({ err: error }, 'Error shutting down OpenTelemetry');
    }
  }
};

export const getTracer = (name: string): Tracer => {
  return trace.getTracer(name);
};

/**
 * Run fn inside an active span that records the outcome.
 * Without a started SDK the API hands out no-op spans.
 */
export const withSpan = async <T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> => {
  const tracer = getTracer('gem-ledger');

  return tracer.startActiveSpan(name, async (span) => {
    span.setAttributes(attributes);

    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    } finally {
      span.end();
    }
  });
};
