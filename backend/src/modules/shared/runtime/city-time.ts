/**
 * City-local calendar fields.
 *
 * The process may run in UTC while the heuristics are written in terms of the
 * city's wall clock, so local fields are derived from a fixed UTC offset.
 */

export type Season = 'winter' | 'spring' | 'summer' | 'autumn';

export interface CityLocalTime {
  hour: number;    // 0..23
  weekday: number; // 0 = Sunday .. 6 = Saturday
  month: number;   // 1..12
}

export function cityLocalTime(nowMs: number, utcOffsetHours: number): CityLocalTime {
  const local = new Date(nowMs + utcOffsetHours * 3_600_000);
  return {
    hour: local.getUTCHours(),
    weekday: local.getUTCDay(),
    month: local.getUTCMonth() + 1,
  };
}

export function seasonOf(month: number): Season {
  if (month === 12 || month <= 2) return 'winter';
  if (month <= 5) return 'spring';
  if (month <= 8) return 'summer';
  return 'autumn';
}

export function isWeekend(weekday: number): boolean {
  return weekday === 0 || weekday === 6;
}
