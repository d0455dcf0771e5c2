/**
 * Express application factory.
 * Separate from server.ts so tests can mount the app on an ephemeral port.
 */

import express from 'express';
import { logger } from './utils/logger';
import { createIntegrationsRouter } from './api/routes/integrations';
import { renderPrometheusMetrics } from './services/metrics';
import { performHealthCheck } from './services/health-check';
import { requestContextMiddleware } from './middleware/request-context';
import { createAuthMiddleware } from './middleware/auth';
import { createCorsMiddleware, createSecurityHeadersMiddleware } from './middleware/security';
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/error-handler';
import type { AppContext } from './context';

export function createApp(context: AppContext): express.Express {
  const app = express();
  const { config, metrics } = context;

  // Request context middleware (must be early for tracing)
  app.use(requestContextMiddleware);

  app.use(createSecurityHeadersMiddleware());
  app.use(createCorsMiddleware(config.security));
  logger.info('CORS enabled', { origins: config.security.allowedOrigins.join(', ') });

  app.use(express.json({ limit: config.security.maxRequestSize }));

  app.get('/health', asyncHandler(async (_req, res) => {
    const healthCheck = await performHealthCheck({ store: context.store, registry: context.registry });
    const snapshot = metrics.getSnapshot();

    res.status(healthCheck.status === 'unhealthy' ? 503 : 200).json({
      ...healthCheck,
      metrics: snapshot.global,
      cache: snapshot.cache,
      syncRuns: snapshot.syncRuns
    });
  }));

  app.get('/metrics', (_req, res) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4');
    res.send(renderPrometheusMetrics(metrics.getSnapshot()));
  });

  app.post('/metrics/reset', (_req, res) => {
    if (!config.metrics.allowReset) {
      res.status(404).json({ error: 'not_found' });
      return;
    }

    metrics.reset();
    res.json({ status: 'reset', timestamp: Date.now() });
  });

  app.use('/v1', createAuthMiddleware(config.auth));
  if (config.auth.enabled) {
    logger.info('API authentication enabled');
  } else {
    logger.info('API authentication disabled (dev mode)');
  }

  app.use('/v1/integrations', createIntegrationsRouter(context));

  // 404 handler for undefined routes (must be after all route definitions)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
