/**
 * Synthetic traffic for when TomTom is unconfigured or unreachable.
 *
 * The index follows the city's daily rhythm; segments and incidents are laid
 * over the same road table the live probes use, so the map always has
 * something to draw.
 */

import type { RandomSource } from '../../../common/runtime.types.js';
import { cityLocalTime } from '../../shared/runtime/city-time.js';
import { clamp, jitter, randomInt, roundTo } from '../../shared/runtime/numeric.js';
import type { IncidentType, RoadNetwork, RoadSegment, TrafficIncident, TrafficReading } from '../contracts/traffic.types.js';
import { congestionLevel, syntheticCongestionIndex } from './congestion.js';

export const SYNTHETIC_FREE_FLOW_KMH = 60;

const INCIDENT_TYPES = ['accident', 'roadwork', 'closure'] as const satisfies readonly IncidentType[];

const INCIDENT_DESCRIPTIONS: Record<(typeof INCIDENT_TYPES)[number], string[]> = {
  accident: ['Minor collision', 'Stalled vehicle', 'Rear-end collision', 'Multi-car accident'],
  roadwork: ['Pothole repair', 'Lane closure', 'Utility work'],
  closure: ['Road closed for event', 'Lane closed'],
};

export interface SyntheticTrafficInput {
  network: RoadNetwork;
  nowMs: number;
  utcOffsetHours: number;
  random: RandomSource;
}

export function syntheticTraffic({ network, nowMs, utcOffsetHours, random }: SyntheticTrafficInput): TrafficReading {
  const { hour, weekday } = cityLocalTime(nowMs, utcOffsetHours);
  const congestionIndex = roundTo(clamp(syntheticCongestionIndex(hour, weekday, random), 0, 100), 1);

  const segments = syntheticSegments(network, congestionIndex, random);
  const incidents = syntheticIncidents(network, congestionIndex, random);

  return {
    congestionIndex,
    congestionLevel: congestionLevel(congestionIndex),
    averageSpeedKmh: roundTo(SYNTHETIC_FREE_FLOW_KMH * (1 - congestionIndex / 100), 1),
    freeFlowSpeedKmh: SYNTHETIC_FREE_FLOW_KMH,
    segments,
    incidents,
    incidentCount: incidents.length,
    timestamp: new Date(nowMs),
    isSynthetic: true,
  };
}

function syntheticSegments(network: RoadNetwork, congestionIndex: number, random: RandomSource): RoadSegment[] {
  return network.roads.map((road) => {
    const congestion = roundTo(clamp((congestionIndex / 100) * jitter(0.6, 1, random), 0, 1), 2);
    return {
      name: road.name,
      polyline: road.polyline,
      congestion,
      speedKmh: roundTo(SYNTHETIC_FREE_FLOW_KMH * (1 - congestion), 1),
    };
  });
}

/**
 * More congestion, more incidents: floor(index / 15) plus 0..2 extra.
 */
function syntheticIncidents(network: RoadNetwork, congestionIndex: number, random: RandomSource): TrafficIncident[] {
  const count = Math.floor(congestionIndex / 15) + randomInt(3, random);
  const incidents: TrafficIncident[] = [];

  for (let i = 0; i < count; i++) {
    const road = network.roads[randomInt(network.roads.length, random)];
    const [lat, lon] = road.polyline[randomInt(road.polyline.length, random)];
    const type = INCIDENT_TYPES[randomInt(INCIDENT_TYPES.length, random)];
    const descriptions = INCIDENT_DESCRIPTIONS[type];

    incidents.push({
      type,
      lat: roundTo(lat + (random() - 0.5) * 0.004, 5),
      lon: roundTo(lon + (random() - 0.5) * 0.004, 5),
      description: `${descriptions[randomInt(descriptions.length, random)]} on ${road.name}`,
    });
  }

  return incidents;
}
