/**
 * HISTORY ROUTES
 * ==============
 *
 * GET /api/v1/history/weather?hours=N
 * GET /api/v1/history/traffic?hours=N
 *
 * N defaults to 24 and is clamped to [1, 720].
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { UpstreamError } from '../../../common/errors.js';
import { success } from '../../../common/http.js';
import { type Clock, systemClock } from '../../../common/runtime.types.js';
import { toWeatherDto } from '../../weather/contracts/weather.types.js';
import {
  type CityDataRepository,
  resolveHistoryRange,
  toTrafficSummaryDto,
} from '../contracts/history.types.js';

export interface HistoryRoutesDeps {
  repository: CityDataRepository;
  clock?: Clock;
}

type HistoryRequest = FastifyRequest<{ Querystring: { hours?: string } }>;

export async function registerHistoryRoutes(app: FastifyInstance, deps: HistoryRoutesDeps): Promise<void> {
  const { repository } = deps;
  const clock = deps.clock ?? systemClock;

  app.get('/api/v1/history/weather', async (req: HistoryRequest, reply: FastifyReply) => {
    const range = resolveHistoryRange(req.query.hours, clock.now());
    try {
      const rows = await repository.getWeatherHistory(range);
      return reply.send(success(rows.map(toWeatherDto), rows.length));
    } catch (err) {
      req.log.error({ err, hours: range.hours }, 'Weather history query failed');
      throw new UpstreamError('History store unavailable', err);
    }
  });

  app.get('/api/v1/history/traffic', async (req: HistoryRequest, reply: FastifyReply) => {
    const range = resolveHistoryRange(req.query.hours, clock.now());
    try {
      const rows = await repository.getTrafficHistory(range);
      return reply.send(success(rows.map(toTrafficSummaryDto), rows.length));
    } catch (err) {
      req.log.error({ err, hours: range.hours }, 'Traffic history query failed');
      throw new UpstreamError('History store unavailable', err);
    }
  });
}
