/**
 * TRAFFIC MODULE — Types
 * ======================
 */

export type CongestionLevel = 'Free-Flow' | 'Light' | 'Moderate' | 'Heavy' | 'Severe';

export type IncidentType = 'accident' | 'roadwork' | 'closure' | 'jam' | 'hazard';

/** [latitude, longitude] */
export type LatLon = [number, number];

export interface RoadSegment {
  name: string;
  polyline: LatLon[];
  congestion: number; // 0..1
  speedKmh: number;
}

export interface TrafficIncident {
  type: IncidentType;
  lat: number;
  lon: number;
  description: string;
}

export interface TrafficReading {
  congestionIndex: number; // 0..100
  congestionLevel: CongestionLevel;
  averageSpeedKmh: number;
  freeFlowSpeedKmh: number;
  segments: RoadSegment[];
  incidents: TrafficIncident[];
  incidentCount: number;
  timestamp: Date;
  isSynthetic: boolean;
}

// ═══════════════════════════════════════════════════════════════
// ROAD NETWORK
// ═══════════════════════════════════════════════════════════════

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

/** Probe points for the flow API are the polyline vertices. */
export interface Road {
  name: string;
  polyline: LatLon[];
}

export interface RoadNetwork {
  bbox: BoundingBox;
  roads: Road[];
}

// ═══════════════════════════════════════════════════════════════
// WIRE FORMAT
// ═══════════════════════════════════════════════════════════════

export interface TrafficDto {
  congestion_index: number;
  congestion_level: CongestionLevel;
  average_speed_kmh: number;
  free_flow_speed_kmh: number;
  segments: Array<{
    name: string;
    polyline: LatLon[];
    congestion: number;
    speed_kmh: number;
  }>;
  incidents: TrafficIncident[];
  incident_count: number;
  timestamp: string;
  is_mock: boolean;
}

export function toTrafficDto(t: TrafficReading): TrafficDto {
  return {
    congestion_index: t.congestionIndex,
    congestion_level: t.congestionLevel,
    average_speed_kmh: t.averageSpeedKmh,
    free_flow_speed_kmh: t.freeFlowSpeedKmh,
    segments: t.segments.map((s) => ({
      name: s.name,
      polyline: s.polyline,
      congestion: s.congestion,
      speed_kmh: s.speedKmh,
    })),
    incidents: t.incidents,
    incident_count: t.incidentCount,
    timestamp: t.timestamp.toISOString(),
    is_mock: t.isSynthetic,
  };
}
