import { describe, it, expect } from 'vitest';
import { cityProfileFromEnv, loadEnv } from '../env.js';

describe('loadEnv', () => {
  it('applies defaults to an empty environment', () => {
    const env = loadEnv({});

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 8080,
      HOST: '0.0.0.0',
      LOG_LEVEL: 'info',
      CORS_ORIGINS: '*',
      MONGO_DB_NAME: 'city_monitor',
      WEATHER_PROVIDER_ENABLED: true,
      ML_SERVICE_URL: 'http://localhost:8000',
      CITY_NAME: 'Almaty',
      CITY_UTC_OFFSET_HOURS: 5,
    });
    expect(env.MONGO_URL).toBeUndefined();
    expect(env.TOMTOM_API_KEY).toBeUndefined();
  });

  it('treats blank optional keys as unset', () => {
    const env = loadEnv({ TOMTOM_API_KEY: '  ', MONGO_URL: '' });

    expect(env.TOMTOM_API_KEY).toBeUndefined();
    expect(env.MONGO_URL).toBeUndefined();
  });

  it('coerces numbers and flags', () => {
    const env = loadEnv({ PORT: '9090', WEATHER_PROVIDER_ENABLED: '0', CITY_LAT: '51.16' });

    expect(env.PORT).toBe(9090);
    expect(env.WEATHER_PROVIDER_ENABLED).toBe(false);
    expect(env.CITY_LAT).toBe(51.16);
  });

  it('lists every invalid variable', () => {
    expect(() => loadEnv({ PORT: 'eighty', ML_SERVICE_URL: 'not a url' }))
      .toThrow(/Invalid environment configuration: .*PORT.*ML_SERVICE_URL/);
  });

  it('derives the city profile', () => {
    expect(cityProfileFromEnv(loadEnv({ CITY_NAME: 'Astana', CITY_LAT: '51.16', CITY_LON: '71.47' }))).toEqual({
      name: 'Astana',
      country: 'KZ',
      lat: 51.16,
      lon: 71.47,
      timezone: 'Asia/Almaty',
      utcOffsetHours: 5,
    });
  });
});
