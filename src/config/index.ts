import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  MONGODB_URI,
  MONGODB_CONFIG,
  JWT_CONFIG,
  ADMIN_API_KEY,
  API_CONFIG,
  REDEMPTION_CONFIG,
  RATE_LIMIT_CONFIG,
  PAGINATION_CONFIG,
  LOG_CONFIG,
  OTEL_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

// Re-export environment-specific configs for direct access
export * from './environments';

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * For environment-specific values, you can also import directly from './environments'
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,

  // MongoDB
  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  // Authentication
  jwt: JWT_CONFIG,
  adminApiKey: ADMIN_API_KEY,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
  },

  // Balance mutations
  redemption: REDEMPTION_CONFIG,
  rateLimit: RATE_LIMIT_CONFIG,
  pagination: PAGINATION_CONFIG,

  // Logging
  logging: LOG_CONFIG,

  // Observability
  otel: OTEL_CONFIG,
};

export type AppConfig = typeof config;
