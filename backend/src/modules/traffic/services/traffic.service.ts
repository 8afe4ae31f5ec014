/**
 * TRAFFIC CLIENT
 * ==============
 *
 * City-wide congestion from TomTom flow probes, with a short-TTL cache sized
 * to the provider's daily quota.
 *
 * Resolution order:
 *   1. cached outcome (no network)
 *   2. no key → synthetic
 *   3. flow probes (all road vertices, concurrently) + incidents
 *   4. every probe failed → synthetic
 *
 * Never rejects.
 */

import { errorMessage } from '../../../common/errors.js';
import {
  type CallOptions,
  type Clock,
  type Logger,
  type RandomSource,
  noopLogger,
  systemClock,
} from '../../../common/runtime.types.js';
import { TtlCache, type TtlCacheStats } from '../../shared/runtime/ttl-cache.js';
import { RequestCoalescer } from '../../shared/runtime/request-coalescer.js';
import { type ProviderOutcome, asCached, fallback, live } from '../../shared/runtime/provider-outcome.js';
import type { RoadNetwork, TrafficIncident, TrafficReading } from '../contracts/traffic.types.js';
import type { TrafficProvider } from '../providers/tomtom.provider.js';
import { type ProbeSample, aggregateFlow } from './flow.aggregate.js';
import { probePoints } from './road-network.js';
import { syntheticTraffic } from './traffic.mock.js';

export const TRAFFIC_CACHE_TTL_MS = 3 * 60 * 1000;

const CACHE_KEY = 'current';

export type TrafficOutcome = ProviderOutcome<TrafficReading>;

export interface TrafficClientConfig {
  network: RoadNetwork;
  utcOffsetHours: number;
  provider: TrafficProvider | null; // null → synthetic only
  cacheTtlMs?: number;
  clock?: Clock;
  random?: RandomSource;
  logger?: Logger;
}

export class TrafficClient {
  private readonly network: RoadNetwork;
  private readonly utcOffsetHours: number;
  private readonly provider: TrafficProvider | null;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private readonly cache: TtlCache<TrafficOutcome>;
  private readonly coalescer = new RequestCoalescer<TrafficOutcome>();

  constructor(config: TrafficClientConfig) {
    this.network = config.network;
    this.utcOffsetHours = config.utcOffsetHours;
    this.provider = config.provider;
    this.clock = config.clock ?? systemClock;
    this.random = config.random ?? Math.random;
    this.logger = config.logger ?? noopLogger;
    this.cache = new TtlCache<TrafficOutcome>(config.cacheTtlMs ?? TRAFFIC_CACHE_TTL_MS, this.clock);
  }

  async fetchCurrentTraffic(opts: CallOptions = {}): Promise<TrafficReading> {
    const outcome = await this.fetchTrafficOutcome(opts);
    return outcome.reading;
  }

  async fetchTrafficOutcome(opts: CallOptions = {}): Promise<TrafficOutcome> {
    const hit = this.cache.get(CACHE_KEY);
    if (hit) return asCached(hit);

    try {
      return await this.coalescer.run(CACHE_KEY, (signal) => this.refresh(signal), opts.signal);
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Traffic refresh abandoned, serving synthetic reading');
      return fallback(this.synthesize(), 'CANCELLED');
    }
  }

  synthesize(): TrafficReading {
    return syntheticTraffic({
      network: this.network,
      nowMs: this.clock.now(),
      utcOffsetHours: this.utcOffsetHours,
      random: this.random,
    });
  }

  cacheStats(): TtlCacheStats {
    return this.cache.stats();
  }

  private async refresh(signal: AbortSignal): Promise<TrafficOutcome> {
    const hit = this.cache.get(CACHE_KEY);
    if (hit) return asCached(hit);

    const outcome = await this.load(signal);
    if (!(outcome.kind === 'fallback' && outcome.reason === 'CANCELLED')) {
      this.cache.set(CACHE_KEY, outcome);
    }
    return outcome;
  }

  private async load(signal: AbortSignal): Promise<TrafficOutcome> {
    const provider = this.provider;
    if (!provider) {
      this.logger.debug?.({}, 'TomTom key not set, using synthetic traffic');
      return fallback(this.synthesize(), 'NOT_CONFIGURED');
    }

    const probes = probePoints(this.network);
    const [settled, incidents] = await Promise.all([
      Promise.allSettled(
        probes.map(async (probe): Promise<ProbeSample> => ({
          road: probe.road,
          sample: await provider.fetchFlow(probe.point, signal),
        })),
      ),
      this.loadIncidents(provider, signal),
    ]);

    if (signal.aborted) {
      return fallback(this.synthesize(), 'CANCELLED');
    }

    const samples: ProbeSample[] = [];
    let failed = 0;
    for (const result of settled) {
      if (result.status === 'fulfilled') {
        samples.push(result.value);
      } else {
        failed++;
        this.logger.debug?.({ err: errorMessage(result.reason) }, 'Flow probe failed');
      }
    }

    if (samples.length === 0) {
      this.logger.warn({ probes: probes.length }, 'Every flow probe failed, using synthetic traffic');
      return fallback(this.synthesize(), 'ALL_PROBES_FAILED');
    }

    const reading = aggregateFlow(this.network, samples, incidents, this.clock.now());
    this.logger.info(
      {
        congestionIndex: reading.congestionIndex,
        averageSpeedKmh: reading.averageSpeedKmh,
        freeFlowSpeedKmh: reading.freeFlowSpeedKmh,
        probes: samples.length,
        failedProbes: failed,
        incidents: reading.incidentCount,
      },
      `Traffic: ${reading.congestionLevel}`,
    );
    return live(reading);
  }

  /**
   * Incidents are decoration; their failure never fails the reading.
   */
  private async loadIncidents(provider: TrafficProvider, signal: AbortSignal): Promise<TrafficIncident[]> {
    try {
      return await provider.fetchIncidents(this.network.bbox, signal);
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Incident query failed');
      return [];
    }
  }
}
