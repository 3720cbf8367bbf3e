/**
 * Middleware Exports
 */

// Error handling
export {
  errorHandler,
  notFoundHandler,
  ApiError,
  ApiErrorOptions,
  asyncHandler,
  toPersistenceError,
  AppError,
} from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';

// Admin API key
export { apiKeyMiddleware, createApiKeyMiddleware } from './apiKey';

// Rate limiting
export { createLimiter, createRedeemLimiter, LimiterOptions } from './rateLimiter';
