/**
 * PREDICTION ROUTES
 * =================
 *
 * POST /api/v1/predict   validated question → live-enriched prediction
 * GET  /api/v1/stats     prediction service stats, verbatim
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { requestSignal, success } from '../../../common/http.js';
import type { PredictionClient } from '../../../clients/prediction.client.js';
import { toPredictionDto } from '../contracts/prediction.types.js';
import { parsePredictionRequest } from '../services/prediction.validation.js';
import type { PredictionService } from '../services/prediction.service.js';

export interface PredictionRoutesDeps {
  predictions: PredictionService;
  predictor: Pick<PredictionClient, 'getStats'>;
}

export async function registerPredictionRoutes(app: FastifyInstance, deps: PredictionRoutesDeps): Promise<void> {
  const { predictions, predictor } = deps;

  app.post('/api/v1/predict', async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const request = parsePredictionRequest(req.body);
    const result = await predictions.ask(request, { signal: requestSignal(req, reply) });
    return reply.send(success(toPredictionDto(result)));
  });

  app.get('/api/v1/stats', async (req: FastifyRequest, reply: FastifyReply) => {
    const stats = await predictor.getStats({ signal: requestSignal(req, reply) });
    return reply.send(success(stats));
  });
}
