/**
 * PM2.5 → US EPA AQI
 *
 * Breakpoints from the February 2024 revision (88 FR 5558): the "Good" band
 * ends at 9.0 µg/m³ and "Very Unhealthy" at 125.4 µg/m³.
 */

import { clamp } from '../../shared/runtime/numeric.js';
import { seasonOf } from '../../shared/runtime/city-time.js';

export interface Breakpoint {
  cLow: number;
  cHigh: number;
  iLow: number;
  iHigh: number;
}

export const PM25_BREAKPOINTS: readonly Breakpoint[] = [
  { cLow: 0.0, cHigh: 9.0, iLow: 0, iHigh: 50 },
  { cLow: 9.1, cHigh: 35.4, iLow: 51, iHigh: 100 },
  { cLow: 35.5, cHigh: 55.4, iLow: 101, iHigh: 150 },
  { cLow: 55.5, cHigh: 125.4, iLow: 151, iHigh: 200 },
  { cLow: 125.5, cHigh: 225.4, iLow: 201, iHigh: 300 },
  { cLow: 225.5, cHigh: 325.4, iLow: 301, iHigh: 400 },
  { cLow: 325.5, cHigh: 500.4, iLow: 401, iHigh: 500 },
];

export const AQI_MIN = 0;
export const AQI_MAX = 500;

/**
 * Linear within a band. A concentration in the gap between two bands (e.g.
 * 9.05 µg/m³) takes the upper band's lowest index.
 */
export function pm25ToAqi(pm25: number, table: readonly Breakpoint[] = PM25_BREAKPOINTS): number {
  if (!Number.isFinite(pm25) || pm25 <= 0) return AQI_MIN;

  for (const b of table) {
    if (pm25 < b.cLow) return b.iLow;
    if (pm25 <= b.cHigh) {
      const aqi = ((b.iHigh - b.iLow) / (b.cHigh - b.cLow)) * (pm25 - b.cLow) + b.iLow;
      return clamp(Math.round(aqi), AQI_MIN, AQI_MAX);
    }
  }
  return AQI_MAX;
}

/**
 * Coarse AQI guess used when the air-quality endpoint is down.
 * Winter temperature inversions trap heating smog in the valley.
 */
export function estimateAqi(temperature: number, month: number): number {
  const winter = seasonOf(month) === 'winter';
  if (winter && temperature < -10) return 200;
  if (winter && temperature < 0) return 160;
  if (temperature > 25) return 45;
  return 80;
}
