/**
 * DASHBOARD SERVICE
 * =================
 *
 * Fans out to both provider clients concurrently and merges their readings.
 * Every reading is persisted once by a detached task, whichever endpoint first
 * fetched it, so the response never waits for the database and a database
 * failure never reaches the caller.
 */

import { errorMessage } from '../../../common/errors.js';
import {
  type CallOptions,
  type Clock,
  type Logger,
  noopLogger,
  systemClock,
} from '../../../common/runtime.types.js';
import type { BackgroundTasks, DrainResult } from '../../shared/runtime/background-tasks.js';
import { type ProviderOutcome, fallback } from '../../shared/runtime/provider-outcome.js';
import type { WeatherReading } from '../../weather/contracts/weather.types.js';
import type { TrafficReading } from '../../traffic/contracts/traffic.types.js';
import type { WeatherClient } from '../../weather/services/weather.service.js';
import type { TrafficClient } from '../../traffic/services/traffic.service.js';
import type { CityDataRepository } from '../../history/contracts/history.types.js';
import { type DashboardSnapshot, type LiveConditions, sourceStatus } from '../contracts/dashboard.types.js';

export const PERSIST_TIMEOUT_MS = 5_000;

export type WeatherSource = Pick<WeatherClient, 'fetchWeatherOutcome' | 'synthesize'>;
export type TrafficSource = Pick<TrafficClient, 'fetchTrafficOutcome' | 'synthesize'>;

export interface DashboardServiceDeps {
  weather: WeatherSource;
  traffic: TrafficSource;
  repository: CityDataRepository;
  tasks: BackgroundTasks;
  persistTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export class DashboardService {
  private readonly persistTimeoutMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  // Cached outcomes hand back the same reading object, so identity marks it stored.
  private readonly persisted = new WeakSet<object>();

  constructor(private readonly deps: DashboardServiceDeps) {
    this.persistTimeoutMs = deps.persistTimeoutMs ?? PERSIST_TIMEOUT_MS;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? noopLogger;
  }

  async getSnapshot(opts: CallOptions = {}): Promise<DashboardSnapshot> {
    const [weatherResult, trafficResult] = await Promise.allSettled([
      this.deps.weather.fetchWeatherOutcome(opts),
      this.deps.traffic.fetchTrafficOutcome(opts),
    ]);

    const weather = this.settle('weather', weatherResult, () => this.deps.weather.synthesize());
    const traffic = this.settle('traffic', trafficResult, () => this.deps.traffic.synthesize());

    this.persistWeather(weather);
    this.persistTraffic(traffic);

    return {
      weather: weather.reading,
      traffic: traffic.reading,
      timestamp: new Date(this.clock.now()),
      sources: {
        weather: sourceStatus(weather),
        traffic: sourceStatus(traffic),
      },
    };
  }

  async getWeather(opts: CallOptions = {}): Promise<WeatherReading> {
    const outcome = await this.deps.weather.fetchWeatherOutcome(opts);
    this.persistWeather(outcome);
    return outcome.reading;
  }

  async getTraffic(opts: CallOptions = {}): Promise<TrafficReading> {
    const outcome = await this.deps.traffic.fetchTrafficOutcome(opts);
    this.persistTraffic(outcome);
    return outcome.reading;
  }

  async getLiveConditions(opts: CallOptions = {}): Promise<LiveConditions> {
    const snapshot = await this.getSnapshot(opts);
    return {
      aqi: snapshot.weather.aqi,
      congestionIndex: snapshot.traffic.congestionIndex,
      temperature: snapshot.weather.temperature,
    };
  }

  /**
   * Wait for outstanding detached writes. Called on shutdown.
   */
  drain(timeoutMs?: number): Promise<DrainResult> {
    return this.deps.tasks.drain(timeoutMs);
  }

  private persistWeather(outcome: ProviderOutcome<WeatherReading>): void {
    if (!this.claim(outcome)) return;
    const reading = outcome.reading;
    this.deps.tasks.spawn('persist-weather', () => this.deps.repository.saveWeather(reading), this.persistTimeoutMs);
  }

  private persistTraffic(outcome: ProviderOutcome<TrafficReading>): void {
    if (!this.claim(outcome)) return;
    const reading = outcome.reading;
    this.deps.tasks.spawn('persist-traffic', () => this.deps.repository.saveTraffic(reading), this.persistTimeoutMs);
  }

  /** True the first time a storable reading is seen. Abandoned refreshes are never stored. */
  private claim<T extends object>(outcome: ProviderOutcome<T>): boolean {
    if (outcome.kind === 'fallback' && outcome.reason === 'CANCELLED') return false;
    if (this.persisted.has(outcome.reading)) return false;
    this.persisted.add(outcome.reading);
    return true;
  }

  private settle<T>(
    source: string,
    result: PromiseSettledResult<ProviderOutcome<T>>,
    synthesize: () => T,
  ): ProviderOutcome<T> {
    if (result.status === 'fulfilled') return result.value;

    // Clients are not supposed to reject; keep the dashboard up if one does.
    this.logger.error({ source, err: errorMessage(result.reason) }, 'Provider client rejected');
    return fallback(synthesize(), 'UPSTREAM_ERROR');
  }
}
