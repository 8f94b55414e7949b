import { Router } from 'express';
import type { ErrorHandler } from '../utils/ErrorHandler.js';
import type { MetricsCollector } from '../utils/logger/metricsCollector.js';

export function metricsRouter(metrics: MetricsCollector, errors: ErrorHandler): Router {
  const router = Router();

  router.get('/', (req, res) => {
    res.json({
      ...metrics.getSnapshot(),
      errors: errors.getErrorStats(),
    });
  });

  return router;
}
