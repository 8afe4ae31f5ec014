/**
 * Service composition
 *
 * Builds every long-lived service once. Missing provider keys or an
 * unreachable database switch components into synthetic / in-memory mode.
 */

import { type CityProfile, type Env, cityProfileFromEnv } from './config/env.js';
import { type Clock, type Logger, systemClock } from './common/runtime.types.js';
import { BackgroundTasks } from './modules/shared/runtime/background-tasks.js';
import { WeatherClient } from './modules/weather/services/weather.service.js';
import { OpenMeteoProvider, createOpenMeteoHttp } from './modules/weather/providers/open-meteo.provider.js';
import { TrafficClient } from './modules/traffic/services/traffic.service.js';
import { TomTomProvider, createTomTomHttp } from './modules/traffic/providers/tomtom.provider.js';
import { loadRoadNetwork, resolveRoadNetworkFile } from './modules/traffic/services/road-network.js';
import type { RoadNetwork } from './modules/traffic/contracts/traffic.types.js';
import type { CityDataRepository } from './modules/history/contracts/history.types.js';
import { createCityRepository } from './modules/history/services/repository.factory.js';
import { DashboardService } from './modules/dashboard/services/dashboard.service.js';
import { PredictionService } from './modules/prediction/services/prediction.service.js';
import { PredictionClient } from './clients/index.js';

export interface AppServices {
  city: CityProfile;
  clock: Clock;
  weather: WeatherClient;
  traffic: TrafficClient;
  repository: CityDataRepository;
  tasks: BackgroundTasks;
  dashboard: DashboardService;
  predictor: PredictionClient;
  predictions: PredictionService;
}

export interface ServiceOverrides {
  repository?: CityDataRepository;
  network?: RoadNetwork;
  predictor?: PredictionClient;
  clock?: Clock;
}

export async function createServices(env: Env, logger: Logger, overrides: ServiceOverrides = {}): Promise<AppServices> {
  const city = cityProfileFromEnv(env);
  const clock = overrides.clock ?? systemClock;
  const child = (module: string): Logger => (
    isChildLogger(logger) ? logger.child({ module }) : logger
  );

  const weather = new WeatherClient({
    city,
    provider: env.WEATHER_PROVIDER_ENABLED
      ? new OpenMeteoProvider(city, createOpenMeteoHttp(), clock)
      : null,
    clock,
    logger: child('weather'),
  });

  const traffic = new TrafficClient({
    network: overrides.network ?? loadRoadNetwork(resolveRoadNetworkFile(env.ROAD_NETWORK_FILE)),
    utcOffsetHours: city.utcOffsetHours,
    provider: env.TOMTOM_API_KEY ? new TomTomProvider(env.TOMTOM_API_KEY, createTomTomHttp()) : null,
    clock,
    logger: child('traffic'),
  });

  const repository = overrides.repository ?? (await createCityRepository(env, { logger: child('history') }));
  const tasks = new BackgroundTasks({ logger: child('background') });

  const dashboard = new DashboardService({
    weather,
    traffic,
    repository,
    tasks,
    clock,
    logger: child('dashboard'),
  });

  const predictor = overrides.predictor ?? new PredictionClient({
    baseUrl: env.ML_SERVICE_URL,
    city: city.name,
    utcOffsetHours: city.utcOffsetHours,
    clock,
    logger: child('predictor'),
  });

  const predictions = new PredictionService({
    dashboard,
    predictor,
    repository,
    tasks,
    logger: child('prediction'),
  });

  return { city, clock, weather, traffic, repository, tasks, dashboard, predictor, predictions };
}

interface ChildLogger extends Logger {
  child: (bindings: Record<string, unknown>) => Logger;
}

function isChildLogger(logger: Logger): logger is ChildLogger {
  return 'child' in logger && typeof logger.child === 'function';
}
