/**
 * API Routes
 *
 * Registers every module's routes plus the readiness probe against one set of
 * composed services.
 */

import type { FastifyPluginAsync } from 'fastify';
import { success } from '../common/http.js';
import type { AppServices } from '../container.js';
import { registerDashboardRoutes } from '../modules/dashboard/routes/dashboard.routes.js';
import { registerHistoryRoutes } from '../modules/history/routes/history.routes.js';
import { registerPredictionRoutes } from '../modules/prediction/routes/prediction.routes.js';

export const registerRoutes: FastifyPluginAsync<AppServices> = async (app, services) => {
  // ═══════════════════════════════════════════════════════════════
  // GET /health/ready
  // Storage backend, predictor reachability and cache stats
  // ═══════════════════════════════════════════════════════════════
  app.get('/health/ready', async (_req, reply) => {
    const [storageHealthy, predictorHealthy] = await Promise.all([
      services.repository.health(),
      services.predictor.isHealthy(),
    ]);

    return reply.status(storageHealthy ? 200 : 503).send(success({
      storage: { backend: services.repository.kind, healthy: storageHealthy },
      predictor: { url: services.predictor.serviceUrl, healthy: predictorHealthy },
      cache: {
        weather: services.weather.cacheStats(),
        traffic: services.traffic.cacheStats(),
      },
      background: services.tasks.stats(),
    }));
  });

  await registerDashboardRoutes(app, { dashboard: services.dashboard });
  await registerHistoryRoutes(app, { repository: services.repository, clock: services.clock });
  await registerPredictionRoutes(app, { predictions: services.predictions, predictor: services.predictor });
};
