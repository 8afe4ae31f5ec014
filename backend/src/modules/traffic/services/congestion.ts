/**
 * Congestion math shared by the live and synthetic paths.
 */

import type { RandomSource } from '../../../common/runtime.types.js';
import { clamp, jitter } from '../../shared/runtime/numeric.js';
import { isWeekend } from '../../shared/runtime/city-time.js';
import type { CongestionLevel, IncidentType } from '../contracts/traffic.types.js';

/** Providers under-report free-flow speed on some arterials. */
export const FREE_FLOW_FLOOR_KMH = 40;

/** k in 1 − (1 − raw)^k; k > 1 lifts mid-range values toward perceived congestion. */
export const CONGESTION_CURVE_EXPONENT = 1.5;

export const CONGESTION_LEVELS: ReadonlyArray<{ min: number; level: CongestionLevel }> = [
  { min: 80, level: 'Severe' },
  { min: 60, level: 'Heavy' },
  { min: 40, level: 'Moderate' },
  { min: 15, level: 'Light' },
  { min: -Infinity, level: 'Free-Flow' },
];

const LEVEL_RANK: Record<CongestionLevel, number> = {
  'Free-Flow': 0,
  Light: 1,
  Moderate: 2,
  Heavy: 3,
  Severe: 4,
};

export function congestionLevel(index: number): CongestionLevel {
  for (const band of CONGESTION_LEVELS) {
    if (index >= band.min) return band.level;
  }
  return 'Free-Flow';
}

export function levelRank(level: CongestionLevel): number {
  return LEVEL_RANK[level];
}

/**
 * Congestion ratio of one probe point, 0 (free) .. 1 (standstill).
 */
export function pointCongestion(currentSpeed: number, freeFlowSpeed: number): number {
  const baseline = Math.max(freeFlowSpeed, FREE_FLOW_FLOOR_KMH);
  return clamp(1 - currentSpeed / baseline, 0, 1);
}

export function perceivedCongestion(raw: number, k: number = CONGESTION_CURVE_EXPONENT): number {
  return 1 - Math.pow(1 - clamp(raw, 0, 1), k);
}

/**
 * Time-of-day heuristic for the synthetic path (city-local hour).
 */
export function syntheticCongestionIndex(hour: number, weekday: number, random: RandomSource): number {
  if (isWeekend(weekday)) return jitter(25, 45, random);
  if (hour >= 7 && hour <= 9) return jitter(65, 95, random);   // morning rush
  if (hour >= 17 && hour <= 19) return jitter(70, 95, random); // evening rush
  if (hour >= 12 && hour <= 14) return jitter(45, 65, random); // lunch
  if (hour >= 22 || hour <= 5) return jitter(5, 20, random);   // night
  return jitter(30, 55, random);
}

/**
 * TomTom incident iconCategory → incident type
 */
export function mapIncidentCategory(category: number): IncidentType {
  switch (category) {
    case 1:  // Accident
    case 14: // Broken down vehicle
      return 'accident';
    case 9:
      return 'roadwork';
    case 7:  // Lane closed
    case 8:  // Road closed
      return 'closure';
    case 6:
      return 'jam';
    default:
      return 'hazard';
  }
}
