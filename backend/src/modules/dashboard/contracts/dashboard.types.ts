/**
 * DASHBOARD MODULE — Types
 * ========================
 */

import { type WeatherDto, type WeatherReading, toWeatherDto } from '../../weather/contracts/weather.types.js';
import { type TrafficDto, type TrafficReading, toTrafficDto } from '../../traffic/contracts/traffic.types.js';
import type { FallbackReason, ProviderOutcome } from '../../shared/runtime/provider-outcome.js';

export interface SourceStatus {
  mode: 'live' | 'fallback';
  reason?: FallbackReason;
  cached: boolean;
}

export interface DashboardSnapshot {
  weather: WeatherReading;
  traffic: TrafficReading;
  timestamp: Date;
  sources: {
    weather: SourceStatus;
    traffic: SourceStatus;
  };
}

/** Live readings forwarded to the prediction service. */
export interface LiveConditions {
  aqi: number;
  congestionIndex: number;
  temperature: number;
}

export function sourceStatus<T>(outcome: ProviderOutcome<T>): SourceStatus {
  return outcome.kind === 'live'
    ? { mode: 'live', cached: outcome.cached }
    : { mode: 'fallback', reason: outcome.reason, cached: outcome.cached };
}

// ═══════════════════════════════════════════════════════════════
// WIRE FORMAT
// ═══════════════════════════════════════════════════════════════

export interface DashboardDto {
  weather: WeatherDto;
  traffic: TrafficDto;
  timestamp: string;
  sources: DashboardSnapshot['sources'];
}

export function toDashboardDto(s: DashboardSnapshot): DashboardDto {
  return {
    weather: toWeatherDto(s.weather),
    traffic: toTrafficDto(s.traffic),
    timestamp: s.timestamp.toISOString(),
    sources: s.sources,
  };
}
