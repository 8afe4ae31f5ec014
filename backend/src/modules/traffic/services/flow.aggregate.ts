/**
 * Fold per-probe flow samples into one live traffic reading.
 */

import { clamp, roundTo } from '../../shared/runtime/numeric.js';
import type { RoadNetwork, RoadSegment, TrafficIncident, TrafficReading } from '../contracts/traffic.types.js';
import type { FlowSample } from '../providers/tomtom.provider.js';
import { FREE_FLOW_FLOOR_KMH, congestionLevel, perceivedCongestion, pointCongestion } from './congestion.js';

export interface ProbeSample {
  road: string;
  sample: FlowSample;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * samples must be non-empty.
 */
export function aggregateFlow(
  network: RoadNetwork,
  samples: ProbeSample[],
  incidents: TrafficIncident[],
  nowMs: number,
): TrafficReading {
  const ratios = samples.map((s) => pointCongestion(s.sample.currentSpeed, s.sample.freeFlowSpeed));
  const congestionIndex = roundTo(clamp(perceivedCongestion(mean(ratios)) * 100, 0, 100), 1);

  const segments: RoadSegment[] = [];
  for (const road of network.roads) {
    const answered = samples.filter((s) => s.road === road.name);
    if (answered.length === 0) continue;

    const raw = mean(answered.map((s) => pointCongestion(s.sample.currentSpeed, s.sample.freeFlowSpeed)));
    segments.push({
      name: road.name,
      polyline: road.polyline,
      congestion: roundTo(perceivedCongestion(raw), 2),
      speedKmh: roundTo(mean(answered.map((s) => s.sample.currentSpeed)), 1),
    });
  }

  return {
    congestionIndex,
    congestionLevel: congestionLevel(congestionIndex),
    averageSpeedKmh: roundTo(mean(samples.map((s) => s.sample.currentSpeed)), 1),
    freeFlowSpeedKmh: roundTo(mean(samples.map((s) => Math.max(s.sample.freeFlowSpeed, FREE_FLOW_FLOOR_KMH))), 1),
    segments,
    incidents,
    incidentCount: incidents.length,
    timestamp: new Date(nowMs),
    isSynthetic: false,
  };
}
