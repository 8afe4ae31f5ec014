import { describe, it, expect, vi } from 'vitest';
import { OpenMeteoProvider, wmoToDescription } from '../providers/open-meteo.provider.js';
import type { CityProfile } from '../../../config/env.js';

const city: CityProfile = {
  name: 'Almaty',
  country: 'KZ',
  lat: 43.2389,
  lon: 76.8897,
  timezone: 'Asia/Almaty',
  utcOffsetHours: 5,
};

const NOW = Date.UTC(2025, 3, 10, 6, 0, 0);
const clock = { now: () => NOW };

describe('OpenMeteoProvider', () => {
  it('maps current conditions to metric readings', async () => {
    const http = {
      get: vi.fn().mockResolvedValue({
        status: 200,
        data: {
          current: {
            temperature_2m: 21.34,
            relative_humidity_2m: 41.6,
            apparent_temperature: 20.06,
            weather_code: 3,
            wind_speed_10m: 18,
            surface_pressure: 910.4,
          },
        },
      }),
    };
    const provider = new OpenMeteoProvider(city, http, clock);

    const conditions = await provider.fetchConditions();

    expect(conditions).toEqual({
      temperature: 21.3,
      feelsLike: 20.1,
      humidity: 42,
      pressure: 910,
      windSpeed: 5,
      visibility: 10_000,
      description: 'Partly cloudy',
      icon: '02d',
      city: 'Almaty',
      country: 'KZ',
      timestamp: new Date(NOW),
    });
    expect(http.get).toHaveBeenCalledWith(
      'https://api.open-meteo.com/v1/forecast',
      expect.objectContaining({
        params: expect.objectContaining({ latitude: 43.2389, longitude: 76.8897, timezone: 'Asia/Almaty' }),
      }),
    );
  });

  it('rejects a body that does not match the forecast schema', async () => {
    const http = { get: vi.fn().mockResolvedValue({ status: 200, data: { current: { temperature_2m: 'warm' } } }) };
    const provider = new OpenMeteoProvider(city, http, clock);

    await expect(provider.fetchConditions()).rejects.toThrow();
  });

  it('returns the current PM2.5 concentration', async () => {
    const http = { get: vi.fn().mockResolvedValue({ status: 200, data: { current: { pm2_5: 14.2, pm10: 20 } } }) };
    const provider = new OpenMeteoProvider(city, http, clock);

    await expect(provider.fetchPm25()).resolves.toBe(14.2);
    expect(http.get).toHaveBeenCalledWith(
      'https://air-quality-api.open-meteo.com/v1/air-quality',
      expect.objectContaining({ params: expect.objectContaining({ current: 'pm2_5,pm10' }) }),
    );
  });

  it('rejects when PM2.5 is missing', async () => {
    const http = { get: vi.fn().mockResolvedValue({ status: 200, data: { current: { pm2_5: null } } }) };
    const provider = new OpenMeteoProvider(city, http, clock);

    await expect(provider.fetchPm25()).rejects.toThrow('air-quality: PM2.5 is null');
  });

  it('passes the caller signal to the transport', async () => {
    const http = { get: vi.fn().mockResolvedValue({ status: 200, data: { current: { pm2_5: 3 } } }) };
    const provider = new OpenMeteoProvider(city, http, clock);
    const controller = new AbortController();

    await provider.fetchPm25(controller.signal);

    expect(http.get).toHaveBeenCalledWith(
      expect.any(String),
      expect.objectContaining({ signal: controller.signal }),
    );
  });
});

describe('wmoToDescription', () => {
  it.each([
    [0, 'Clear sky', '01d'],
    [2, 'Partly cloudy', '02d'],
    [45, 'Fog', '50d'],
    [53, 'Drizzle', '09d'],
    [63, 'Rain', '10d'],
    [73, 'Snow', '13d'],
    [81, 'Rain showers', '09d'],
    [86, 'Snow showers', '13d'],
    [95, 'Thunderstorm', '11d'],
    [20, 'Cloudy', '04d'],
  ])('code %d → %s', (code, description, icon) => {
    expect(wmoToDescription(code)).toEqual({ description, icon });
  });
});
