/**
 * External Service Clients
 *
 * HTTP clients for standalone services, accessed via HTTP only.
 */

export { PredictionClient, PREDICT_TIMEOUT_MS, STATS_TIMEOUT_MS } from './prediction.client.js';
export type { PredictionClientConfig, PredictionHttp } from './prediction.client.js';
