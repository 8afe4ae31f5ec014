/**
 * HISTORY MODULE — Types
 * ======================
 *
 * Persistence port for readings and prediction logs. Writes are best-effort
 * and detached from requests; reads serve bounded time-range queries.
 */

import type { WeatherReading } from '../../weather/contracts/weather.types.js';
import type { CongestionLevel, TrafficReading } from '../../traffic/contracts/traffic.types.js';
import type { PredictionRequest, PredictionResult } from '../../prediction/contracts/prediction.types.js';

export const HISTORY_LIMIT = 100;
export const DEFAULT_HISTORY_HOURS = 24;
export const MAX_HISTORY_HOURS = 720; // 30 days
export const DB_TIMEOUT_MS = 5_000;

export type RepositoryKind = 'mongo' | 'memory';

export interface TimeRange {
  from: Date;
  to: Date;
}

/** Stored form of a traffic reading; geometry is not archived. */
export interface TrafficSummary {
  congestionIndex: number;
  congestionLevel: CongestionLevel;
  averageSpeedKmh: number;
  freeFlowSpeedKmh: number;
  incidentCount: number;
  timestamp: Date;
  isSynthetic: boolean;
}

export interface PredictionLogEntry {
  request: PredictionRequest;
  result: PredictionResult;
  createdAt: Date;
}

export interface CityDataRepository {
  readonly kind: RepositoryKind;

  saveWeather(reading: WeatherReading): Promise<void>;
  saveTraffic(reading: TrafficReading): Promise<void>;
  savePredictionLog(request: PredictionRequest, result: PredictionResult): Promise<void>;

  /** Rows with from <= timestamp <= to, newest first, at most HISTORY_LIMIT. */
  getWeatherHistory(range: TimeRange): Promise<WeatherReading[]>;
  getTrafficHistory(range: TimeRange): Promise<TrafficSummary[]>;

  health(): Promise<boolean>;
}

export function summarizeTraffic(t: TrafficReading): TrafficSummary {
  return {
    congestionIndex: t.congestionIndex,
    congestionLevel: t.congestionLevel,
    averageSpeedKmh: t.averageSpeedKmh,
    freeFlowSpeedKmh: t.freeFlowSpeedKmh,
    incidentCount: t.incidentCount,
    timestamp: t.timestamp,
    isSynthetic: t.isSynthetic,
  };
}

/**
 * ?hours=N → [now − N h, now]. N defaults to 24 and is clamped to [1, 720].
 */
export function resolveHistoryRange(hours: unknown, nowMs: number): TimeRange & { hours: number } {
  const parsed = typeof hours === 'string' && hours.trim() !== '' ? Number(hours) : Number.NaN;
  const n = Number.isFinite(parsed)
    ? Math.min(Math.max(Math.trunc(parsed), 1), MAX_HISTORY_HOURS)
    : DEFAULT_HISTORY_HOURS;

  return {
    hours: n,
    from: new Date(nowMs - n * 3_600_000),
    to: new Date(nowMs),
  };
}

// ═══════════════════════════════════════════════════════════════
// WIRE FORMAT
// ═══════════════════════════════════════════════════════════════

export interface TrafficSummaryDto {
  congestion_index: number;
  congestion_level: CongestionLevel;
  average_speed_kmh: number;
  free_flow_speed_kmh: number;
  incident_count: number;
  timestamp: string;
  is_mock: boolean;
}

export function toTrafficSummaryDto(t: TrafficSummary): TrafficSummaryDto {
  return {
    congestion_index: t.congestionIndex,
    congestion_level: t.congestionLevel,
    average_speed_kmh: t.averageSpeedKmh,
    free_flow_speed_kmh: t.freeFlowSpeedKmh,
    incident_count: t.incidentCount,
    timestamp: t.timestamp.toISOString(),
    is_mock: t.isSynthetic,
  };
}
