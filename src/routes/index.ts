import { Router } from 'express';
import tournamentRoutes from '../modules/tournaments/tournament.routes';
import { checkDatabaseHealth, getPoolMetrics } from '../db/pool';
import { metrics } from '../services/metrics.service';
import { asyncHandler } from '../shared/async-handler';

const router = Router();

// Health check
router.get(
  '/health',
  asyncHandler(async (req, res) => {
    const dbHealthy = await checkDatabaseHealth();

    res.status(dbHealthy ? 200 : 503).json({
      status: dbHealthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      database: dbHealthy ? 'ok' : 'error',
      pool: getPoolMetrics(),
    });
  })
);

// Metrics endpoint
router.get('/metrics', (req, res) => {
  res.json({
    timestamp: new Date().toISOString(),
    ...metrics.getMetrics(),
    pool: getPoolMetrics(),
  });
});

// Tournament routes
router.use('/tournaments', tournamentRoutes);

export default router;
