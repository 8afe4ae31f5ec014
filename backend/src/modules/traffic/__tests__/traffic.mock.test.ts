import { describe, it, expect } from 'vitest';
import { syntheticTraffic } from '../services/traffic.mock.js';
import { SATURDAY_NOON, WEDNESDAY_MORNING_RUSH, testNetwork } from './fixtures.js';

describe('syntheticTraffic', () => {
  it('builds a deterministic reading from a fixed random source', () => {
    const reading = syntheticTraffic({
      network: testNetwork,
      nowMs: WEDNESDAY_MORNING_RUSH,
      utcOffsetHours: 5,
      random: () => 0,
    });

    expect(reading).toMatchObject({
      congestionIndex: 65,
      congestionLevel: 'Heavy',
      averageSpeedKmh: 21,
      freeFlowSpeedKmh: 60,
      incidentCount: 4,
      isSynthetic: true,
    });
    expect(reading.segments).toEqual([
      { name: 'North Ave', polyline: [[43.2, 76.9], [43.21, 76.91]], congestion: 0.39, speedKmh: 36.6 },
      { name: 'South Ave', polyline: [[43.1, 76.9], [43.11, 76.91]], congestion: 0.39, speedKmh: 36.6 },
    ]);
    expect(reading.incidents[0]).toEqual({
      type: 'accident',
      lat: 43.198,
      lon: 76.898,
      description: 'Minor collision on North Ave',
    });
  });

  it('draws segments over the same roads the live probes use', () => {
    const reading = syntheticTraffic({
      network: testNetwork,
      nowMs: SATURDAY_NOON,
      utcOffsetHours: 5,
      random: Math.random,
    });

    expect(reading.segments.map((s) => s.polyline)).toEqual(testNetwork.roads.map((r) => r.polyline));
  });

  it('stays inside its documented ranges', () => {
    for (let i = 0; i < 200; i++) {
      const reading = syntheticTraffic({
        network: testNetwork,
        nowMs: WEDNESDAY_MORNING_RUSH + i * 17 * 60_000,
        utcOffsetHours: 5,
        random: Math.random,
      });

      expect(reading.congestionIndex).toBeGreaterThanOrEqual(0);
      expect(reading.congestionIndex).toBeLessThanOrEqual(100);
      expect(reading.incidentCount).toBe(reading.incidents.length);
      for (const segment of reading.segments) {
        expect(segment.congestion).toBeGreaterThanOrEqual(0);
        expect(segment.congestion).toBeLessThanOrEqual(1);
      }
    }
  });

  it('uses the weekend band on Saturday', () => {
    const reading = syntheticTraffic({
      network: testNetwork,
      nowMs: SATURDAY_NOON,
      utcOffsetHours: 5,
      random: () => 0,
    });

    expect(reading.congestionIndex).toBe(25);
    expect(reading.congestionLevel).toBe('Light');
  });
});
