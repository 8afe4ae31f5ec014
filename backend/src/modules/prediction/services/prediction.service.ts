/**
 * PREDICTION SERVICE
 * ==================
 *
 * Grounds a user question in the city's current readings before forwarding it
 * to the prediction service, then logs the exchange without waiting for it.
 */

import { type CallOptions, type Logger, noopLogger } from '../../../common/runtime.types.js';
import type { BackgroundTasks } from '../../shared/runtime/background-tasks.js';
import type { CityDataRepository } from '../../history/contracts/history.types.js';
import type { DashboardService } from '../../dashboard/services/dashboard.service.js';
import { PERSIST_TIMEOUT_MS } from '../../dashboard/services/dashboard.service.js';
import type { PredictionClient } from '../../../clients/prediction.client.js';
import type { PredictionRequest, PredictionResult } from '../contracts/prediction.types.js';

export interface PredictionServiceDeps {
  dashboard: Pick<DashboardService, 'getLiveConditions'>;
  predictor: Pick<PredictionClient, 'predict'>;
  repository: CityDataRepository;
  tasks: BackgroundTasks;
  logger?: Logger;
}

export class PredictionService {
  private readonly logger: Logger;

  constructor(private readonly deps: PredictionServiceDeps) {
    this.logger = deps.logger ?? noopLogger;
  }

  async ask(request: PredictionRequest, opts: CallOptions = {}): Promise<PredictionResult> {
    const live = await this.deps.dashboard.getLiveConditions(opts);
    const enriched: PredictionRequest = {
      ...request,
      liveAqi: live.aqi,
      liveTraffic: live.congestionIndex,
      liveTemp: live.temperature,
    };

    const result = await this.deps.predictor.predict(enriched, opts);

    this.deps.tasks.spawn(
      'persist-prediction-log',
      () => this.deps.repository.savePredictionLog(enriched, result),
      PERSIST_TIMEOUT_MS,
    );

    this.logger.info(
      { language: enriched.language ?? 'en', synthetic: result.isSynthetic, aqi: result.aqiPrediction },
      'Prediction answered',
    );
    return result;
  }
}
