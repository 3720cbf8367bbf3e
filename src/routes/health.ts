import { Router, Request, Response } from 'express';
import { getDatabaseStatus } from '../config/database';

const router = Router();

// Full status, including the database connection state
router.get('/', (_req: Request, res: Response) => {
  const dbStatus = getDatabaseStatus();
  const isHealthy = dbStatus.connected;

  res.status(isHealthy ? 200 : 503).json({
    status: isHealthy ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    services: {
      database: {
        connected: dbStatus.connected,
        readyState: dbStatus.readyState,
        state: dbStatus.state,
      },
    },
  });
});

router.get('/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    timestamp: new Date().toISOString(),
  });
});

// Ready once mongoose holds a connection; ledger writes need it
router.get('/ready', (_req: Request, res: Response) => {
  const { connected, state } = getDatabaseStatus();

  res.status(connected ? 200 : 503).json({
    status: connected ? 'ready' : 'not ready',
    database: state,
    timestamp: new Date().toISOString(),
  });
});

export default router;
