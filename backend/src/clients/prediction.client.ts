/**
 * Prediction Service HTTP Client
 *
 * The prediction service (LLM + historical data) is a STANDALONE process.
 * This client is the only way the API talks to it.
 *
 * RULES:
 * 1. predict() never throws: any transport failure, non-2xx status or
 *    unexpected body yields the canned seasonal answer (is_mock = true)
 * 2. getStats() is a verbatim proxy and DOES throw UpstreamError, so the
 *    route can answer 503
 * 3. No shared state beyond the cached health flag
 *
 * @example
 * const client = new PredictionClient({ baseUrl: 'http://localhost:8000', city: 'Almaty', utcOffsetHours: 5 });
 * const result = await client.predict({ query: 'Will the air be clean tomorrow?' });
 * // { prediction: '...', confidenceScore: 0.82, aqiPrediction: 74, ... }
 */

import axios, { type AxiosInstance } from 'axios';
import { UpstreamError, errorMessage } from '../common/errors.js';
import { type CallOptions, type Clock, type Logger, noopLogger, systemClock } from '../common/runtime.types.js';
import { clamp, roundTo } from '../modules/shared/runtime/numeric.js';
import { cityLocalTime } from '../modules/shared/runtime/city-time.js';
import {
  type PredictionRequest,
  type PredictionResult,
  UpstreamPredictionResponseSchema,
  toUpstreamRequest,
} from '../modules/prediction/contracts/prediction.types.js';
import { fallbackPrediction } from '../modules/prediction/services/prediction.fallback.js';

// ============================================
// CLIENT CONFIGURATION
// ============================================

export type PredictionHttp = Pick<AxiosInstance, 'get' | 'post'>;

export interface PredictionClientConfig {
  baseUrl: string;
  city: string;
  utcOffsetHours: number;
  timeoutMs?: number;
  statsTimeoutMs?: number;
  healthCheckIntervalMs?: number;
  http?: PredictionHttp;
  clock?: Clock;
  logger?: Logger;
}

export const PREDICT_TIMEOUT_MS = 30_000;
export const STATS_TIMEOUT_MS = 10_000;

// ============================================
// PREDICTION CLIENT
// ============================================

export class PredictionClient {
  private readonly http: PredictionHttp;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly statsTimeoutMs: number;
  private readonly healthCheckIntervalMs: number;
  private isAvailable = false;
  private lastHealthCheck = 0;

  constructor(private readonly config: PredictionClientConfig) {
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? noopLogger;
    this.statsTimeoutMs = config.statsTimeoutMs ?? STATS_TIMEOUT_MS;
    this.healthCheckIntervalMs = config.healthCheckIntervalMs ?? 60_000;
    this.http = config.http ?? axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs ?? PREDICT_TIMEOUT_MS,
      headers: {
        'Content-Type': 'application/json',
        'X-Client': 'city-monitor-api',
      },
    });
  }

  get serviceUrl(): string {
    return this.config.baseUrl;
  }

  // ============================================
  // PREDICT
  // ============================================

  async predict(request: PredictionRequest, opts: CallOptions = {}): Promise<PredictionResult> {
    try {
      const response = await this.http.post<unknown>('/predict', toUpstreamRequest(request), {
        signal: opts.signal,
      });
      const body = UpstreamPredictionResponseSchema.parse(response.data);

      return {
        prediction: body.prediction,
        confidenceScore: clamp(body.confidence_score, 0, 1),
        aqiPrediction: Math.round(clamp(body.aqi_prediction, 0, 500)),
        trafficIndexPrediction: roundTo(clamp(body.traffic_index_prediction, 0, 100), 1),
        reasoning: body.reasoning,
        isSynthetic: body.is_mock,
      };
    } catch (error) {
      this.handleError('predict', error);
      return this.fallback(request);
    }
  }

  fallback(request: PredictionRequest): PredictionResult {
    const { month } = cityLocalTime(this.clock.now(), this.config.utcOffsetHours);
    return fallbackPrediction(request, this.config.city, month);
  }

  // ============================================
  // STATS (verbatim proxy)
  // ============================================

  async getStats(opts: CallOptions = {}): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>('/stats', {
        timeout: this.statsTimeoutMs,
        signal: opts.signal,
      });
      return response.data;
    } catch (error) {
      this.handleError('getStats', error);
      throw new UpstreamError('Prediction service unavailable', error);
    }
  }

  // ============================================
  // HEALTH CHECK
  // ============================================

  /**
   * Check if the prediction service is reachable.
   * Caches the result for healthCheckIntervalMs.
   */
  async isHealthy(): Promise<boolean> {
    const now = this.clock.now();
    if (this.lastHealthCheck > 0 && now - this.lastHealthCheck < this.healthCheckIntervalMs) {
      return this.isAvailable;
    }

    try {
      const response = await this.http.get<unknown>('/health', { timeout: this.statsTimeoutMs });
      this.isAvailable = response.status >= 200 && response.status < 300;
    } catch (error) {
      this.handleError('health', error);
      this.isAvailable = false;
    }
    this.lastHealthCheck = now;
    return this.isAvailable;
  }

  // ============================================
  // ERROR HANDLING
  // ============================================

  private handleError(method: string, error: unknown): void {
    this.logger.warn(
      { method, baseUrl: this.config.baseUrl, err: errorMessage(error) },
      'Prediction service call failed',
    );
  }
}
