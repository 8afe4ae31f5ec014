/**
 * Synthetic weather: seasonal averages for the configured city.
 */

import type { CityProfile } from '../../../config/env.js';
import { cityLocalTime, type Season, seasonOf } from '../../shared/runtime/city-time.js';
import type { WeatherReading } from '../contracts/weather.types.js';

interface SeasonalBaseline {
  temperature: number;
  feelsLike: number;
  description: string;
  icon: string;
  aqi: number;
}

export const SEASONAL_WEATHER: Record<Season, SeasonalBaseline> = {
  winter: { temperature: -8, feelsLike: -15, description: 'Light snow', icon: '13d', aqi: 165 },
  spring: { temperature: 12, feelsLike: 10, description: 'Partly cloudy', icon: '02d', aqi: 75 },
  summer: { temperature: 28, feelsLike: 30, description: 'Clear sky', icon: '01d', aqi: 45 },
  autumn: { temperature: 8, feelsLike: 5, description: 'Overcast clouds', icon: '04d', aqi: 90 },
};

export function syntheticWeather(city: CityProfile, nowMs: number): WeatherReading {
  const { month } = cityLocalTime(nowMs, city.utcOffsetHours);
  const base = SEASONAL_WEATHER[seasonOf(month)];

  return {
    temperature: base.temperature,
    feelsLike: base.feelsLike,
    humidity: 65,
    pressure: 938,
    windSpeed: 3.5,
    visibility: 8000,
    description: base.description,
    icon: base.icon,
    aqi: base.aqi,
    city: city.name,
    country: city.country,
    timestamp: new Date(nowMs),
    isSynthetic: true,
  };
}
