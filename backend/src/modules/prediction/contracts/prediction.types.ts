/**
 * PREDICTION MODULE — Types
 * =========================
 */

import { z } from 'zod';

export const SUPPORTED_LANGUAGES = ['ru', 'en', 'kk'] as const;
export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export const QUERY_MAX_LENGTH = 1000;
export const TEMPERATURE_MIN = -50;
export const TEMPERATURE_MAX = 60;

export interface PredictionRequest {
  query?: string;
  date?: string; // YYYY-MM-DD
  temperature?: number;
  language?: Language;
  // Filled in from live readings before forwarding
  liveAqi?: number;
  liveTraffic?: number;
  liveTemp?: number;
}

export interface PredictionResult {
  prediction: string;
  confidenceScore: number;        // 0..1
  aqiPrediction: number;          // 0..500
  trafficIndexPrediction: number; // 0..100
  reasoning: string;
  isSynthetic: boolean;
}

// ═══════════════════════════════════════════════════════════════
// INBOUND VALIDATION
// ═══════════════════════════════════════════════════════════════

export function isCalendarDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

export const PredictionRequestSchema = z.object({
  query: z
    .string({ invalid_type_error: 'must be a string' })
    .max(QUERY_MAX_LENGTH, `must be at most ${QUERY_MAX_LENGTH} characters`)
    .optional(),
  date: z
    .string({ invalid_type_error: 'must be a string' })
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be in YYYY-MM-DD format')
    .refine(isCalendarDate, 'must be a valid calendar date')
    .optional(),
  temperature: z
    .number({ invalid_type_error: 'must be a number' })
    .min(TEMPERATURE_MIN, `must be between ${TEMPERATURE_MIN} and ${TEMPERATURE_MAX}`)
    .max(TEMPERATURE_MAX, `must be between ${TEMPERATURE_MIN} and ${TEMPERATURE_MAX}`)
    .optional(),
  language: z
    .enum(SUPPORTED_LANGUAGES, {
      errorMap: () => ({ message: `must be one of ${SUPPORTED_LANGUAGES.join(', ')}` }),
    })
    .optional(),
});

// ═══════════════════════════════════════════════════════════════
// PREDICTION SERVICE WIRE FORMAT
// ═══════════════════════════════════════════════════════════════

export interface UpstreamPredictionRequest {
  query?: string;
  date?: string;
  temperature?: number;
  language?: Language;
  live_aqi?: number;
  live_traffic?: number;
  live_temp?: number;
}

export const UpstreamPredictionResponseSchema = z.object({
  prediction: z.string(),
  confidence_score: z.number(),
  aqi_prediction: z.number(),
  traffic_index_prediction: z.number(),
  reasoning: z.string().default(''),
  is_mock: z.boolean().default(false),
});

export function toUpstreamRequest(req: PredictionRequest): UpstreamPredictionRequest {
  return {
    query: req.query,
    date: req.date,
    temperature: req.temperature,
    language: req.language,
    live_aqi: req.liveAqi,
    live_traffic: req.liveTraffic,
    live_temp: req.liveTemp,
  };
}

// ═══════════════════════════════════════════════════════════════
// OUTBOUND (HTTP API)
// ═══════════════════════════════════════════════════════════════

export interface PredictionDto {
  prediction: string;
  confidence_score: number;
  aqi_prediction: number;
  traffic_index_prediction: number;
  reasoning: string;
  is_mock: boolean;
}

export function toPredictionDto(r: PredictionResult): PredictionDto {
  return {
    prediction: r.prediction,
    confidence_score: r.confidenceScore,
    aqi_prediction: r.aqiPrediction,
    traffic_index_prediction: r.trafficIndexPrediction,
    reasoning: r.reasoning,
    is_mock: r.isSynthetic,
  };
}
