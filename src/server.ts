import helmet from 'helmet';
import express from 'express';
import { createLimiters } from './middleware/rateLimiter.js';
import { metricsRouter } from './routes/metrics.js';
import { sessionsRouter } from './routes/sessions.js';
import type { SessionSummary } from './session/types.js';
import type { ErrorHandler } from './utils/ErrorHandler.js';
import type { MetricsCollector } from './utils/logger/metricsCollector.js';

export interface AdminContext {
  metrics: MetricsCollector;
  errors: ErrorHandler;
  listSessions: () => SessionSummary[];
}

/**
 * Monitoring surface for operators; never exposed to attackers
 */
export function createAdminApp(context: AdminContext): express.Express {
  const app = express();
  const { defaultLimiter, strictLimiter } = createLimiters();

  app.use(helmet());

  app.get('/api/health', (req, res) => {
    return res
      .status(200)
      .json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(defaultLimiter);

  app.use((req, res, next) => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const duration = Number(process.hrtime.bigint() - start) / 1_000_000;
      console.debug(`${req.method} ${req.originalUrl} ${res.statusCode} - ${duration.toFixed(2)} ms`);
    });
    next();
  });

  app.use('/api/sessions', sessionsRouter(context.listSessions));
  app.use('/metrics', strictLimiter, metricsRouter(context.metrics, context.errors));

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
