/**
 * DASHBOARD ROUTES
 * ================
 *
 * GET /api/v1/dashboard   weather + traffic snapshot
 * GET /api/v1/weather     weather only
 * GET /api/v1/traffic     traffic only
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { requestSignal, success } from '../../../common/http.js';
import { toWeatherDto } from '../../weather/contracts/weather.types.js';
import { toTrafficDto } from '../../traffic/contracts/traffic.types.js';
import { toDashboardDto } from '../contracts/dashboard.types.js';
import type { DashboardService } from '../services/dashboard.service.js';

export interface DashboardRoutesDeps {
  dashboard: DashboardService;
}

export async function registerDashboardRoutes(app: FastifyInstance, deps: DashboardRoutesDeps): Promise<void> {
  const { dashboard } = deps;

  app.get('/api/v1/dashboard', async (req: FastifyRequest, reply: FastifyReply) => {
    const snapshot = await dashboard.getSnapshot({ signal: requestSignal(req, reply) });
    return reply.send(success(toDashboardDto(snapshot)));
  });

  app.get('/api/v1/weather', async (req: FastifyRequest, reply: FastifyReply) => {
    const weather = await dashboard.getWeather({ signal: requestSignal(req, reply) });
    return reply.send(success(toWeatherDto(weather)));
  });

  app.get('/api/v1/traffic', async (req: FastifyRequest, reply: FastifyReply) => {
    const traffic = await dashboard.getTraffic({ signal: requestSignal(req, reply) });
    return reply.send(success(toTrafficDto(traffic)));
  });
}
