/**
 * WEATHER CLIENT
 * ==============
 *
 * Current conditions + AQI with a short-TTL cache.
 *
 * Resolution order:
 *   1. cached outcome (no network)
 *   2. provider conditions + PM2.5 → AQI (AQI is estimated if only that call fails)
 *   3. seasonal synthetic reading
 *
 * Concurrent misses share one refresh through the coalescer. Never rejects.
 */

import type { CityProfile } from '../../../config/env.js';
import { errorMessage } from '../../../common/errors.js';
import { type CallOptions, type Clock, type Logger, noopLogger, systemClock } from '../../../common/runtime.types.js';
import { TtlCache, type TtlCacheStats } from '../../shared/runtime/ttl-cache.js';
import { RequestCoalescer } from '../../shared/runtime/request-coalescer.js';
import { cityLocalTime } from '../../shared/runtime/city-time.js';
import { type ProviderOutcome, asCached, fallback, live } from '../../shared/runtime/provider-outcome.js';
import type { WeatherConditions, WeatherReading } from '../contracts/weather.types.js';
import type { WeatherProvider } from '../providers/open-meteo.provider.js';
import { estimateAqi, pm25ToAqi } from './aqi.breakpoints.js';
import { syntheticWeather } from './weather.mock.js';

export const WEATHER_CACHE_TTL_MS = 5 * 60 * 1000; // Open-Meteo refreshes every 15 min

const CACHE_KEY = 'current';

export type WeatherOutcome = ProviderOutcome<WeatherReading>;

export interface WeatherClientConfig {
  city: CityProfile;
  provider: WeatherProvider | null; // null → synthetic only
  cacheTtlMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export class WeatherClient {
  private readonly city: CityProfile;
  private readonly provider: WeatherProvider | null;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly cache: TtlCache<WeatherOutcome>;
  private readonly coalescer = new RequestCoalescer<WeatherOutcome>();

  constructor(config: WeatherClientConfig) {
    this.city = config.city;
    this.provider = config.provider;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? noopLogger;
    this.cache = new TtlCache<WeatherOutcome>(config.cacheTtlMs ?? WEATHER_CACHE_TTL_MS, this.clock);
  }

  async fetchCurrentWeather(opts: CallOptions = {}): Promise<WeatherReading> {
    const outcome = await this.fetchWeatherOutcome(opts);
    return outcome.reading;
  }

  async fetchWeatherOutcome(opts: CallOptions = {}): Promise<WeatherOutcome> {
    const hit = this.cache.get(CACHE_KEY);
    if (hit) return asCached(hit);

    try {
      return await this.coalescer.run(CACHE_KEY, (signal) => this.refresh(signal), opts.signal);
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Weather refresh abandoned, serving seasonal reading');
      return fallback(this.synthesize(), 'CANCELLED');
    }
  }

  /**
   * Seasonal reading for the current instant. Always succeeds.
   */
  synthesize(): WeatherReading {
    return syntheticWeather(this.city, this.clock.now());
  }

  cacheStats(): TtlCacheStats {
    return this.cache.stats();
  }

  private async refresh(signal: AbortSignal): Promise<WeatherOutcome> {
    // Another refresh may have landed between the first check and this one.
    const hit = this.cache.get(CACHE_KEY);
    if (hit) return asCached(hit);

    const outcome = await this.load(signal);
    if (!(outcome.kind === 'fallback' && outcome.reason === 'CANCELLED')) {
      this.cache.set(CACHE_KEY, outcome);
    }
    return outcome;
  }

  private async load(signal: AbortSignal): Promise<WeatherOutcome> {
    if (!this.provider) {
      return fallback(this.synthesize(), 'NOT_CONFIGURED');
    }

    let conditions: WeatherConditions;
    try {
      conditions = await this.provider.fetchConditions(signal);
    } catch (err) {
      if (signal.aborted) {
        return fallback(this.synthesize(), 'CANCELLED');
      }
      this.logger.warn(
        { provider: this.provider.name, err: errorMessage(err) },
        'Weather upstream failed, using seasonal fallback',
      );
      return fallback(this.synthesize(), 'UPSTREAM_ERROR');
    }

    const aqi = await this.resolveAqi(this.provider, conditions.temperature, signal);
    if (signal.aborted) {
      return fallback(this.synthesize(), 'CANCELLED');
    }
    const reading: WeatherReading = { ...conditions, aqi, isSynthetic: false };

    this.logger.info(
      { temperature: reading.temperature, humidity: reading.humidity, aqi: reading.aqi },
      `Weather: ${reading.description}`,
    );
    return live(reading);
  }

  private async resolveAqi(provider: WeatherProvider, temperature: number, signal: AbortSignal): Promise<number> {
    try {
      const pm25 = await provider.fetchPm25(signal);
      return pm25ToAqi(pm25);
    } catch (err) {
      const { month } = cityLocalTime(this.clock.now(), this.city.utcOffsetHours);
      const estimate = estimateAqi(temperature, month);
      this.logger.warn({ err: errorMessage(err), estimate }, 'Air-quality upstream failed, estimating AQI');
      return estimate;
    }
  }
}
