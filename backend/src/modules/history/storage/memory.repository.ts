/**
 * In-memory stand-in for the durable store.
 *
 * Selected when no database is configured or reachable. Keeps a bounded
 * buffer per collection so history endpoints still answer during a demo.
 */

import type { WeatherReading } from '../../weather/contracts/weather.types.js';
import type { TrafficReading } from '../../traffic/contracts/traffic.types.js';
import type { PredictionRequest, PredictionResult } from '../../prediction/contracts/prediction.types.js';
import { type Clock, systemClock } from '../../../common/runtime.types.js';
import {
  type CityDataRepository,
  HISTORY_LIMIT,
  type PredictionLogEntry,
  type TimeRange,
  type TrafficSummary,
  summarizeTraffic,
} from '../contracts/history.types.js';

export const MEMORY_CAPACITY = 1000;

function inRangeNewestFirst<T extends { timestamp: Date }>(rows: T[], range: TimeRange): T[] {
  const from = range.from.getTime();
  const to = range.to.getTime();
  return rows
    .filter((r) => r.timestamp.getTime() >= from && r.timestamp.getTime() <= to)
    .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
    .slice(0, HISTORY_LIMIT);
}

function pushBounded<T>(rows: T[], row: T, capacity: number): void {
  rows.push(row);
  if (rows.length > capacity) rows.splice(0, rows.length - capacity);
}

export class InMemoryCityRepository implements CityDataRepository {
  readonly kind = 'memory' as const;

  private readonly weather: WeatherReading[] = [];
  private readonly traffic: TrafficSummary[] = [];
  private readonly predictions: PredictionLogEntry[] = [];

  constructor(
    private readonly capacity: number = MEMORY_CAPACITY,
    private readonly clock: Clock = systemClock,
  ) {}

  async saveWeather(reading: WeatherReading): Promise<void> {
    pushBounded(this.weather, { ...reading }, this.capacity);
  }

  async saveTraffic(reading: TrafficReading): Promise<void> {
    pushBounded(this.traffic, summarizeTraffic(reading), this.capacity);
  }

  async savePredictionLog(request: PredictionRequest, result: PredictionResult): Promise<void> {
    pushBounded(
      this.predictions,
      { request: { ...request }, result: { ...result }, createdAt: new Date(this.clock.now()) },
      this.capacity,
    );
  }

  async getWeatherHistory(range: TimeRange): Promise<WeatherReading[]> {
    return inRangeNewestFirst(this.weather, range).map((r) => ({ ...r }));
  }

  async getTrafficHistory(range: TimeRange): Promise<TrafficSummary[]> {
    return inRangeNewestFirst(this.traffic, range).map((r) => ({ ...r }));
  }

  async health(): Promise<boolean> {
    return true;
  }

  /** Most recent prediction logs, newest first. */
  recentPredictionLogs(limit = HISTORY_LIMIT): PredictionLogEntry[] {
    return this.predictions.slice(-limit).reverse();
  }
}
