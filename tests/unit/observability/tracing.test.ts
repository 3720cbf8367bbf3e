/**
 * Tracing Module Unit Tests
 *
 * Tests OpenTelemetry initialization and the withSpan helper.
 */

// Mock span
const mockSpan = {
  setAttributes: jest.fn(),
  setStatus: jest.fn(),
  recordException: jest.fn(),
  end: jest.fn(),
};

// Mock tracer
const mockTracer = {
  startActiveSpan: jest.fn((name: string, fn: (span: typeof mockSpan) => Promise<unknown>) => {
    return fn(mockSpan);
  }),
};

const mockTrace = {
  getTracer: jest.fn().mockReturnValue(mockTracer),
};

jest.mock('@opentelemetry/api', () => ({
  trace: mockTrace,
  SpanStatusCode: {
    OK: 1,
    ERROR: 2,
  },
}));

// Mock SDK
const mockSDKInstance = {
  start: jest.fn(),
  shutdown: jest.fn().mockResolvedValue(undefined),
};

jest.mock('@opentelemetry/sdk-node', () => ({
  NodeSDK: jest.fn().mockImplementation(() => mockSDKInstance),
}));

jest.mock('@opentelemetry/exporter-trace-otlp-http', () => ({
  OTLPTraceExporter: jest.fn(),
}));

jest.mock('@opentelemetry/auto-instrumentations-node', () => ({
  getNodeAutoInstrumentations: jest.fn().mockReturnValue([]),
}));

const mockLogger = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

jest.mock('../../../src/observability/logger', () => ({
  logger: mockLogger,
}));

let mockIsTest = true;
let mockEnabled = true;

jest.mock('../../../src/config', () => ({
  config: {
    get isTest() {
      return mockIsTest;
    },
    otel: {
      get enabled() {
        return mockEnabled;
      },
      serviceName: 'gem-ledger',
      exporterEndpoint: 'http://collector:4318/v1/traces',
    },
  },
}));

describe('Tracing Module', () => {
  let tracing: typeof import('../../../src/observability/tracing');

  beforeEach(async () => {
    jest.clearAllMocks();
    mockIsTest = true;
    mockEnabled = true;
    jest.resetModules();

    tracing = await import('../../../src/observability/tracing');
  });

  describe('initTracing', () => {
    it('should skip tracing in test environment', () => {
      tracing.initTracing();

      expect(mockLogger.debug).toHaveBeenCalledWith('Tracing disabled');
      expect(mockSDKInstance.start).not.toHaveBeenCalled();
    });

    it('should skip tracing when disabled', () => {
      mockIsTest = false;
      mockEnabled = false;

      tracing.initTracing();

      expect(mockSDKInstance.start).not.toHaveBeenCalled();
    });

    it('should start the SDK with the configured endpoint', () => {
      mockIsTest = false;

      tracing.initTracing();

      expect(mockSDKInstance.start).toHaveBeenCalled();
      expect(mockLogger.info).toHaveBeenCalledWith(
        { endpoint: 'http://collector:4318/v1/traces' },
        'OpenTelemetry tracing initialized'
      );
    });

    it('should log initialization errors instead of throwing', () => {
      mockIsTest = false;
      const failure = new Error('Failed to initialize');
      mockSDKInstance.start.mockImplementationOnce(() => {
        throw failure;
      });

      expect(() => tracing.initTracing()).not.toThrow();
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { err: failure },
        'Failed to initialize OpenTelemetry tracing'
      );
    });
  });

  describe('shutdownTracing', () => {
    it('should do nothing when the SDK never started', async () => {
      tracing.initTracing();

      await tracing.shutdownTracing();

      expect(mockSDKInstance.shutdown).not.toHaveBeenCalled();
    });

    it('should shut down a started SDK', async () => {
      mockIsTest = false;
      tracing.initTracing();

      await tracing.shutdownTracing();

      expect(mockSDKInstance.shutdown).toHaveBeenCalled();
      expect(mockLogger.info).toHaveBeenCalledWith('OpenTelemetry tracing shut down');
    });
  });

  describe('withSpan', () => {
    it('should set attributes, mark success and end the span', async () => {
      const result = await tracing.withSpan('redemption.redeem', { 'user.id': 'user-1' }, async () => 'done');

      expect(result).toBe('done');
      expect(mockTracer.startActiveSpan).toHaveBeenCalledWith('redemption.redeem', expect.any(Function));
      expect(mockSpan.setAttributes).toHaveBeenCalledWith({ 'user.id': 'user-1' });
      expect(mockSpan.setStatus).toHaveBeenCalledWith({ code: 1 });
      expect(mockSpan.end).toHaveBeenCalledTimes(1);
    });

    it('should record the exception and rethrow', async () => {
      const failure = new Error('boom');

      await expect(
        tracing.withSpan('currency.grant', {}, async () => {
          throw failure;
        })
      ).rejects.toBe(failure);

      expect(mockSpan.recordException).toHaveBeenCalledWith(failure);
      expect(mockSpan.setStatus).toHaveBeenCalledWith({ code: 2, message: 'boom' });
      expect(mockSpan.end).toHaveBeenCalledTimes(1);
    });
  });
});
