/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, REDEMPTION_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

const readInt = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment.
 * Multi-document transactions need a replica set, even a single-node one.
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/gem-ledger?replicaSet=rs0'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/gem-ledger-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/gem-ledger?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// AUTHENTICATION CONFIGURATION
// =============================================================================

/**
 * JWT secret used to verify player bearer tokens - MUST be set in production
 */
export const JWT_SECRET = process.env.JWT_SECRET || (isTest ? 'test-secret' : 'dev-secret');

export const JWT_CONFIG = {
  secret: JWT_SECRET,
  /** Lifetime of player tokens issued through the admin API */
  accessTokenTtlSeconds: readInt('JWT_ACCESS_TOKEN_TTL_SECONDS', isProduction ? 900 : 3600),
};

/**
 * API key for administrative and service-to-service endpoints
 */
export const ADMIN_API_KEY =
  process.env.ADMIN_API_KEY || (isTest ? 'test-admin-key' : isProduction ? '' : 'dev-admin-key');

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: readInt('PORT', 3000),
};

// =============================================================================
// REDEMPTION / LEDGER CONFIGURATION
// =============================================================================

/**
 * Optimistic-lock retry policy and request deadline for balance mutations.
 * After failed attempt k the next one waits baseBackoffMs * 2^(k - 1).
 */
export const REDEMPTION_CONFIG = {
  maxAttempts: readInt('REDEMPTION_MAX_ATTEMPTS', 3),
  baseBackoffMs: readInt('REDEMPTION_BASE_BACKOFF_MS', 10),
  requestTimeoutMs: readInt('REQUEST_TIMEOUT_MS', isTest ? 2000 : 5000),
};

/**
 * Rate limiting for code redemption, keyed by player. Codes are guessable, so a
 * player trying many in a row is throttled.
 * Set RATE_LIMIT_DISABLED=true for load tests.
 */
export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  redeem: {
    windowMs: readInt('REDEEM_RATE_LIMIT_WINDOW_MS', 60000), // 1 minute
    maxRequests: isProduction
      ? readInt('REDEEM_RATE_LIMIT_MAX', 10)
      : isTest
      ? 10000 // Very lenient for tests
      : readInt('REDEEM_RATE_LIMIT_MAX', 100),
  },
};

/**
 * Pagination limits shared by code listing and ledger history
 */
export const PAGINATION_CONFIG = {
  defaultLimit: 50,
  maxLimit: 100,
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// OBSERVABILITY / TELEMETRY
// =============================================================================

export const OTEL_CONFIG = {
  enabled: isProduction || process.env.OTEL_ENABLED === 'true',
  serviceName: process.env.OTEL_SERVICE_NAME || 'gem-ledger',
  exporterEndpoint:
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['JWT_SECRET', 'MONGODB_URI', 'ADMIN_API_KEY'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (process.env.JWT_SECRET && process.env.JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  mongoHost:
    MONGODB_URI.replace(/^mongodb(\+srv)?:\/\//, '').split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
});
