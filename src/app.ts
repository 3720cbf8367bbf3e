import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { AuthController, authService, createAuthAdminRoutes } from './auth';
import { errorHandler, notFoundHandler } from './middlewares';
import healthRoutes from './routes/health';
import { AtomicScope, RepositorySet } from './repositories';
import {
  CurrencyController,
  CurrencyService,
  createCurrencyAdminRoutes,
  createCurrencyRoutes,
} from './services/currency';
import { RetryPolicy } from './services/currency/currency.retry';
import {
  RedemptionController,
  RedemptionService,
  createCodeAdminRoutes,
  createRedemptionRoutes,
} from './services/redemption';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
} from './observability';

export interface AppDependencies {
  /** Repositories for reads and single writes outside an atomic scope */
  repositories: RepositorySet;
  scope: AtomicScope;
  retryPolicy?: RetryPolicy;
  clock?: () => Date;
}

export const createApp = (deps: AppDependencies): Application => {
  const app = express();

  const redemptionService = new RedemptionService(deps);
  const currencyService = new CurrencyService(deps);
  const redemptionController = new RedemptionController(redemptionService);
  const currencyController = new CurrencyController(currencyService);
  const authController = new AuthController(authService);

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Routes
  app.use('/health', healthRoutes);
  app.use('/codes', createRedemptionRoutes(redemptionController));
  app.use('/admin/codes', createCodeAdminRoutes(redemptionController));
  app.use('/currency', createCurrencyRoutes(currencyController));
  app.use('/admin/users', createAuthAdminRoutes(authController));
  app.use('/admin/users', createCurrencyAdminRoutes(currencyController));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Gem Ledger API',
      version: '1.0.0',
      description: 'Gem currency ledger and code redemption',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
