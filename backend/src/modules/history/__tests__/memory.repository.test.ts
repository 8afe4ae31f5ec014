import { describe, it, expect } from 'vitest';
import { InMemoryCityRepository } from '../storage/memory.repository.js';
import { HISTORY_LIMIT, resolveHistoryRange } from '../contracts/history.types.js';
import type { WeatherReading } from '../../weather/contracts/weather.types.js';
import type { TrafficReading } from '../../traffic/contracts/traffic.types.js';

const NOW = Date.UTC(2025, 0, 15, 12, 0, 0);
const HOUR = 3_600_000;

function weatherAt(ms: number, temperature = 1): WeatherReading {
  return {
    temperature,
    feelsLike: temperature - 2,
    humidity: 60,
    pressure: 930,
    windSpeed: 2,
    visibility: 10_000,
    description: 'Clear sky',
    icon: '01d',
    aqi: 70,
    city: 'Almaty',
    country: 'KZ',
    timestamp: new Date(ms),
    isSynthetic: false,
  };
}

function trafficAt(ms: number): TrafficReading {
  return {
    congestionIndex: 42.5,
    congestionLevel: 'Moderate',
    averageSpeedKmh: 31,
    freeFlowSpeedKmh: 55,
    segments: [{ name: 'North Ave', polyline: [[43.2, 76.9], [43.21, 76.91]], congestion: 0.4, speedKmh: 33 }],
    incidents: [{ type: 'jam', lat: 43.2, lon: 76.9, description: 'Queue' }],
    incidentCount: 1,
    timestamp: new Date(ms),
    isSynthetic: true,
  };
}

describe('InMemoryCityRepository', () => {
  it('returns readings inside the window, newest first', async () => {
    const repo = new InMemoryCityRepository();
    await repo.saveWeather(weatherAt(NOW - 30 * HOUR, 1));
    await repo.saveWeather(weatherAt(NOW - 2 * HOUR, 2));
    await repo.saveWeather(weatherAt(NOW - 1 * HOUR, 3));
    await repo.saveWeather(weatherAt(NOW - 24 * HOUR, 4));

    const rows = await repo.getWeatherHistory(resolveHistoryRange('24', NOW));

    expect(rows.map((r) => r.temperature)).toEqual([3, 2, 4]);
  });

  it('caps a query at the history limit', async () => {
    const repo = new InMemoryCityRepository();
    for (let i = 0; i < HISTORY_LIMIT + 20; i++) {
      await repo.saveWeather(weatherAt(NOW - i * 60_000, i));
    }

    const rows = await repo.getWeatherHistory(resolveHistoryRange('24', NOW));

    expect(rows).toHaveLength(HISTORY_LIMIT);
    expect(rows[0].temperature).toBe(0);
  });

  it('stores traffic as a summary without geometry', async () => {
    const repo = new InMemoryCityRepository();
    await repo.saveTraffic(trafficAt(NOW - HOUR));

    const rows = await repo.getTrafficHistory(resolveHistoryRange(undefined, NOW));

    expect(rows).toEqual([{
      congestionIndex: 42.5,
      congestionLevel: 'Moderate',
      averageSpeedKmh: 31,
      freeFlowSpeedKmh: 55,
      incidentCount: 1,
      timestamp: new Date(NOW - HOUR),
      isSynthetic: true,
    }]);
  });

  it('drops the oldest rows beyond its capacity', async () => {
    const repo = new InMemoryCityRepository(3);
    for (let i = 1; i <= 5; i++) {
      await repo.saveWeather(weatherAt(NOW - (10 - i) * 60_000, i));
    }

    const rows = await repo.getWeatherHistory(resolveHistoryRange('1', NOW));

    expect(rows.map((r) => r.temperature)).toEqual([5, 4, 3]);
  });

  it('keeps prediction logs', async () => {
    const repo = new InMemoryCityRepository(1000, { now: () => NOW });
    await repo.savePredictionLog(
      { query: 'Smog?', liveAqi: 150 },
      { prediction: 'Yes', confidenceScore: 0.9, aqiPrediction: 170, trafficIndexPrediction: 60, reasoning: '', isSynthetic: false },
    );

    expect(repo.recentPredictionLogs()).toEqual([{
      request: { query: 'Smog?', liveAqi: 150 },
      result: { prediction: 'Yes', confidenceScore: 0.9, aqiPrediction: 170, trafficIndexPrediction: 60, reasoning: '', isSynthetic: false },
      createdAt: new Date(NOW),
    }]);
  });

  it('is always healthy', async () => {
    const repo = new InMemoryCityRepository();
    await expect(repo.health()).resolves.toBe(true);
    expect(repo.kind).toBe('memory');
  });
});

describe('resolveHistoryRange', () => {
  it('defaults to 24 hours', () => {
    expect(resolveHistoryRange(undefined, NOW)).toEqual({
      hours: 24,
      from: new Date(NOW - 24 * HOUR),
      to: new Date(NOW),
    });
  });

  it.each([
    ['0', 1],
    ['-5', 1],
    ['6', 6],
    ['720', 720],
    ['5000', 720],
    ['abc', 24],
    ['', 24],
  ])('hours=%s → %d', (raw, hours) => {
    expect(resolveHistoryRange(raw, NOW).hours).toBe(hours);
  });
});
