/**
 * Open-Meteo Provider
 * Source: Open-Meteo forecast + air-quality APIs (public, no key required)
 *
 * Endpoints:
 *   https://api.open-meteo.com/v1/forecast
 *   https://air-quality-api.open-meteo.com/v1/air-quality
 *
 * Methods throw on transport errors, non-2xx statuses and bodies that do not
 * match the expected schema; the weather client turns those into fallbacks.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { CityProfile } from '../../../config/env.js';
import { type Clock, systemClock } from '../../../common/runtime.types.js';
import { roundTo } from '../../shared/runtime/numeric.js';
import type { WeatherConditions } from '../contracts/weather.types.js';

const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';
const AIR_QUALITY_URL = 'https://air-quality-api.open-meteo.com/v1/air-quality';
export const WEATHER_TIMEOUT_MS = 10_000;

const ForecastResponseSchema = z.object({
  current: z.object({
    temperature_2m: z.number(),
    relative_humidity_2m: z.number(),
    apparent_temperature: z.number(),
    weather_code: z.number().int(),
    wind_speed_10m: z.number(),
    surface_pressure: z.number(),
  }),
});

const AirQualityResponseSchema = z.object({
  current: z.object({
    pm2_5: z.number().nullable().optional(),
    pm10: z.number().nullable().optional(),
  }),
});

export type HttpGetter = Pick<AxiosInstance, 'get'>;

export interface WeatherProvider {
  readonly name: string;
  fetchConditions(signal?: AbortSignal): Promise<WeatherConditions>;
  fetchPm25(signal?: AbortSignal): Promise<number>;
}

/**
 * WMO weather interpretation code → description + OpenWeather-style icon
 */
export function wmoToDescription(code: number): { description: string; icon: string } {
  if (code === 0) return { description: 'Clear sky', icon: '01d' };
  if (code <= 3) return { description: 'Partly cloudy', icon: '02d' };
  if (code === 45 || code === 48) return { description: 'Fog', icon: '50d' };
  if (code >= 51 && code <= 57) return { description: 'Drizzle', icon: '09d' };
  if (code >= 61 && code <= 67) return { description: 'Rain', icon: '10d' };
  if (code >= 71 && code <= 77) return { description: 'Snow', icon: '13d' };
  if (code >= 80 && code <= 82) return { description: 'Rain showers', icon: '09d' };
  if (code >= 85 && code <= 86) return { description: 'Snow showers', icon: '13d' };
  if (code >= 95) return { description: 'Thunderstorm', icon: '11d' };
  return { description: 'Cloudy', icon: '04d' };
}

export function createOpenMeteoHttp(): AxiosInstance {
  return axios.create({
    timeout: WEATHER_TIMEOUT_MS,
    headers: { Accept: 'application/json' },
  });
}

export class OpenMeteoProvider implements WeatherProvider {
  readonly name = 'open-meteo';

  constructor(
    private readonly city: CityProfile,
    private readonly http: HttpGetter = createOpenMeteoHttp(),
    private readonly clock: Clock = systemClock,
  ) {}

  async fetchConditions(signal?: AbortSignal): Promise<WeatherConditions> {
    const res = await this.http.get<unknown>(FORECAST_URL, {
      params: {
        latitude: this.city.lat,
        longitude: this.city.lon,
        current: 'temperature_2m,relative_humidity_2m,apparent_temperature,weather_code,wind_speed_10m,surface_pressure',
        timezone: this.city.timezone,
      },
      signal,
    });

    const c = ForecastResponseSchema.parse(res.data).current;
    const { description, icon } = wmoToDescription(c.weather_code);

    return {
      temperature: roundTo(c.temperature_2m, 1),
      feelsLike: roundTo(c.apparent_temperature, 1),
      humidity: Math.round(c.relative_humidity_2m),
      pressure: Math.round(c.surface_pressure),
      windSpeed: roundTo(c.wind_speed_10m / 3.6, 1), // km/h → m/s
      visibility: 10_000,
      description,
      icon,
      city: this.city.name,
      country: this.city.country,
      timestamp: new Date(this.clock.now()),
    };
  }

  async fetchPm25(signal?: AbortSignal): Promise<number> {
    const res = await this.http.get<unknown>(AIR_QUALITY_URL, {
      params: {
        latitude: this.city.lat,
        longitude: this.city.lon,
        current: 'pm2_5,pm10',
        timezone: this.city.timezone,
      },
      signal,
    });

    const pm25 = AirQualityResponseSchema.parse(res.data).current.pm2_5;
    if (pm25 === null || pm25 === undefined) {
      throw new Error('air-quality: PM2.5 is null');
    }
    return pm25;
  }
}
