/**
 * Durable CityDataRepository on MongoDB.
 *
 * Every call is bounded by DB_TIMEOUT_MS; reads return at most
 * HISTORY_LIMIT rows, newest first.
 */

import type { WeatherReading } from '../../weather/contracts/weather.types.js';
import type { TrafficReading } from '../../traffic/contracts/traffic.types.js';
import type { PredictionRequest, PredictionResult } from '../../prediction/contracts/prediction.types.js';
import { withTimeout } from '../../shared/runtime/timeout.js';
import { isMongoConnected, pingMongo } from '../../../db/mongoose.js';
import {
  type CityDataRepository,
  type TimeRange,
  type TrafficSummary,
  DB_TIMEOUT_MS,
  HISTORY_LIMIT,
} from '../contracts/history.types.js';
import { WeatherSnapshotModel, type WeatherSnapshotRow } from './weather.model.js';
import { TrafficSnapshotModel, type TrafficSnapshotRow } from './traffic.model.js';
import { PredictionLogModel } from './prediction-log.model.js';

function toWeatherReading(row: WeatherSnapshotRow): WeatherReading {
  return {
    temperature: row.temperature,
    feelsLike: row.feelsLike,
    humidity: row.humidity,
    pressure: row.pressure,
    windSpeed: row.windSpeed,
    visibility: row.visibility,
    description: row.description,
    icon: row.icon,
    aqi: row.aqi,
    city: row.city,
    country: row.country,
    timestamp: row.timestamp,
    isSynthetic: row.isSynthetic,
  };
}

function toTrafficSummary(row: TrafficSnapshotRow): TrafficSummary {
  return {
    congestionIndex: row.congestionIndex,
    congestionLevel: row.congestionLevel,
    averageSpeedKmh: row.averageSpeedKmh,
    freeFlowSpeedKmh: row.freeFlowSpeedKmh,
    incidentCount: row.incidentCount,
    timestamp: row.timestamp,
    isSynthetic: row.isSynthetic,
  };
}

export class MongoCityRepository implements CityDataRepository {
  readonly kind = 'mongo' as const;

  constructor(private readonly timeoutMs: number = DB_TIMEOUT_MS) {}

  async saveWeather(r: WeatherReading): Promise<void> {
    await withTimeout(
      WeatherSnapshotModel.create({
        temperature: r.temperature,
        feelsLike: r.feelsLike,
        humidity: r.humidity,
        pressure: r.pressure,
        windSpeed: r.windSpeed,
        visibility: r.visibility,
        description: r.description,
        icon: r.icon,
        aqi: r.aqi,
        city: r.city,
        country: r.country,
        isSynthetic: r.isSynthetic,
        timestamp: r.timestamp,
      }),
      this.timeoutMs,
      'saveWeather',
    );
  }

  async saveTraffic(r: TrafficReading): Promise<void> {
    await withTimeout(
      TrafficSnapshotModel.create({
        congestionIndex: r.congestionIndex,
        congestionLevel: r.congestionLevel,
        averageSpeedKmh: r.averageSpeedKmh,
        freeFlowSpeedKmh: r.freeFlowSpeedKmh,
        incidentCount: r.incidentCount,
        isSynthetic: r.isSynthetic,
        timestamp: r.timestamp,
      }),
      this.timeoutMs,
      'saveTraffic',
    );
  }

  async savePredictionLog(request: PredictionRequest, result: PredictionResult): Promise<void> {
    await withTimeout(
      PredictionLogModel.create({
        query: request.query,
        date: request.date,
        temperature: request.temperature,
        language: request.language,
        liveAqi: request.liveAqi,
        liveTraffic: request.liveTraffic,
        liveTemp: request.liveTemp,
        prediction: result.prediction,
        confidenceScore: result.confidenceScore,
        aqiPrediction: result.aqiPrediction,
        trafficIndexPrediction: result.trafficIndexPrediction,
        reasoning: result.reasoning,
        isSynthetic: result.isSynthetic,
      }),
      this.timeoutMs,
      'savePredictionLog',
    );
  }

  async getWeatherHistory({ from, to }: TimeRange): Promise<WeatherReading[]> {
    const rows = await WeatherSnapshotModel.find({ timestamp: { $gte: from, $lte: to } })
      .sort({ timestamp: -1 })
      .limit(HISTORY_LIMIT)
      .maxTimeMS(this.timeoutMs)
      .lean<WeatherSnapshotRow[]>()
      .exec();
    return rows.map(toWeatherReading);
  }

  async getTrafficHistory({ from, to }: TimeRange): Promise<TrafficSummary[]> {
    const rows = await TrafficSnapshotModel.find({ timestamp: { $gte: from, $lte: to } })
      .sort({ timestamp: -1 })
      .limit(HISTORY_LIMIT)
      .maxTimeMS(this.timeoutMs)
      .lean<TrafficSnapshotRow[]>()
      .exec();
    return rows.map(toTrafficSummary);
  }

  async health(): Promise<boolean> {
    if (!isMongoConnected()) return false;
    try {
      await withTimeout(pingMongo(), this.timeoutMs, 'ping');
      return true;
    } catch {
      return false;
    }
  }
}
