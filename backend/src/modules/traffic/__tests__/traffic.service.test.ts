import { describe, it, expect, vi } from 'vitest';
import { TRAFFIC_CACHE_TTL_MS, TrafficClient } from '../services/traffic.service.js';
import type { FlowSample, TrafficProvider } from '../providers/tomtom.provider.js';
import type { TrafficIncident } from '../contracts/traffic.types.js';
import { WEDNESDAY_MORNING_RUSH, testNetwork } from './fixtures.js';

function manualClock(start = WEDNESDAY_MORNING_RUSH) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

const halfSpeed: FlowSample = { currentSpeed: 30, freeFlowSpeed: 60, confidence: 1, roadClosure: false };

const incident: TrafficIncident = { type: 'jam', lat: 43.2, lon: 76.9, description: 'Queueing traffic' };

function stubProvider(impl: Partial<Pick<TrafficProvider, 'fetchFlow' | 'fetchIncidents'>> = {}) {
  return {
    name: 'stub',
    fetchFlow: vi.fn<TrafficProvider['fetchFlow']>(impl.fetchFlow ?? (async () => halfSpeed)),
    fetchIncidents: vi.fn<TrafficProvider['fetchIncidents']>(impl.fetchIncidents ?? (async () => [incident])),
  } satisfies TrafficProvider;
}

function client(provider: TrafficProvider | null, clock = manualClock()) {
  return new TrafficClient({
    network: testNetwork,
    utcOffsetHours: 5,
    provider,
    clock,
    random: () => 0,
  });
}

describe('TrafficClient', () => {
  it('synthesizes traffic when no key is configured', async () => {
    const outcome = await client(null).fetchTrafficOutcome();

    expect(outcome).toMatchObject({ kind: 'fallback', reason: 'NOT_CONFIGURED' });
    expect(outcome.reading).toMatchObject({ congestionIndex: 65, isSynthetic: true });
  });

  it('probes every road vertex and aggregates the answers', async () => {
    const provider = stubProvider();

    const outcome = await client(provider).fetchTrafficOutcome();

    expect(outcome.kind).toBe('live');
    expect(provider.fetchFlow).toHaveBeenCalledTimes(4);
    expect(provider.fetchIncidents).toHaveBeenCalledWith(testNetwork.bbox, expect.any(AbortSignal));
    expect(outcome.reading).toMatchObject({
      congestionIndex: 64.6,
      congestionLevel: 'Heavy',
      averageSpeedKmh: 30,
      freeFlowSpeedKmh: 60,
      incidents: [incident],
      incidentCount: 1,
      isSynthetic: false,
    });
  });

  it('keeps going when some probes fail', async () => {
    let calls = 0;
    const provider = stubProvider({
      fetchFlow: async () => {
        calls++;
        if (calls % 2 === 0) throw new Error('timeout');
        return halfSpeed;
      },
    });

    const outcome = await client(provider).fetchTrafficOutcome();

    expect(outcome.kind).toBe('live');
    expect(outcome.reading.congestionIndex).toBe(64.6);
  });

  it('falls back when every probe fails', async () => {
    const provider = stubProvider({
      fetchFlow: async () => {
        throw new Error('403 Forbidden');
      },
    });

    const outcome = await client(provider).fetchTrafficOutcome();

    expect(outcome).toMatchObject({ kind: 'fallback', reason: 'ALL_PROBES_FAILED' });
    expect(outcome.reading.isSynthetic).toBe(true);
    expect(provider.fetchFlow).toHaveBeenCalledTimes(4);
  });

  it('reports no incidents rather than failing when the incident query fails', async () => {
    const provider = stubProvider({
      fetchIncidents: async () => {
        throw new Error('500');
      },
    });

    const reading = await client(provider).fetchCurrentTraffic();

    expect(reading.isSynthetic).toBe(false);
    expect(reading.incidents).toEqual([]);
    expect(reading.incidentCount).toBe(0);
  });

  it('answers from cache within the TTL and refetches after it', async () => {
    const provider = stubProvider();
    const clock = manualClock();
    const traffic = client(provider, clock);

    await traffic.fetchTrafficOutcome();
    clock.advance(TRAFFIC_CACHE_TTL_MS - 1);
    const cached = await traffic.fetchTrafficOutcome();
    expect(cached.cached).toBe(true);
    expect(provider.fetchFlow).toHaveBeenCalledTimes(4);

    clock.advance(1);
    const fresh = await traffic.fetchTrafficOutcome();
    expect(fresh.cached).toBe(false);
    expect(provider.fetchFlow).toHaveBeenCalledTimes(8);
  });

  it('reports cache statistics', async () => {
    const traffic = client(null);

    await traffic.fetchTrafficOutcome();
    await traffic.fetchTrafficOutcome();

    expect(traffic.cacheStats()).toMatchObject({ size: 1, hits: 1 });
  });
});
