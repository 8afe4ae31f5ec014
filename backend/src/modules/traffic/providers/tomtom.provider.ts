/**
 * TomTom Traffic Provider
 * Source: TomTom Traffic API (key required, 2,500 requests/day on the free tier)
 *
 * Endpoints:
 *   Flow:      /traffic/services/4/flowSegmentData/absolute/10/json
 *   Incidents: /traffic/services/5/incidentDetails
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { BoundingBox, LatLon, TrafficIncident } from '../contracts/traffic.types.js';
import { mapIncidentCategory } from '../services/congestion.js';

const TOMTOM_BASE_URL = 'https://api.tomtom.com';
export const TRAFFIC_TIMEOUT_MS = 15_000;

const FlowResponseSchema = z.object({
  flowSegmentData: z.object({
    currentSpeed: z.number(),
    freeFlowSpeed: z.number(),
    confidence: z.number().optional(),
    roadClosure: z.boolean().optional(),
  }),
});

const IncidentsResponseSchema = z.object({
  incidents: z.array(
    z.object({
      geometry: z.object({
        type: z.string(),
        coordinates: z.unknown(),
      }),
      properties: z.object({
        iconCategory: z.number().int(),
        from: z.string().optional(),
        to: z.string().optional(),
        events: z.array(z.object({ description: z.string() })).optional(),
      }),
    }),
  ),
});

type TomTomIncident = z.infer<typeof IncidentsResponseSchema>['incidents'][number];

// GeoJSON order is [lon, lat]
const PointCoordinates = z.tuple([z.number(), z.number()]);
const LineCoordinates = z.array(PointCoordinates).min(1);

const INCIDENT_FIELDS =
  '{incidents{type,geometry{type,coordinates},properties{iconCategory,from,to,events{description,code}}}}';

export interface FlowSample {
  currentSpeed: number;
  freeFlowSpeed: number;
  confidence: number;
  roadClosure: boolean;
}

export interface TrafficProvider {
  readonly name: string;
  fetchFlow(point: LatLon, signal?: AbortSignal): Promise<FlowSample>;
  fetchIncidents(bbox: BoundingBox, signal?: AbortSignal): Promise<TrafficIncident[]>;
}

export type HttpGetter = Pick<AxiosInstance, 'get'>;

export function createTomTomHttp(): AxiosInstance {
  return axios.create({
    baseURL: TOMTOM_BASE_URL,
    timeout: TRAFFIC_TIMEOUT_MS,
    headers: { Accept: 'application/json' },
  });
}

export function extractIncidentPosition(geometry: TomTomIncident['geometry']): LatLon | null {
  if (geometry.type === 'Point') {
    const parsed = PointCoordinates.safeParse(geometry.coordinates);
    return parsed.success ? [parsed.data[1], parsed.data[0]] : null;
  }
  if (geometry.type === 'LineString') {
    const parsed = LineCoordinates.safeParse(geometry.coordinates);
    return parsed.success ? [parsed.data[0][1], parsed.data[0][0]] : null;
  }
  return null;
}

export function buildIncidentDescription(incident: TomTomIncident): string {
  const { events, from, to, iconCategory } = incident.properties;
  let desc = events?.[0]?.description ?? '';
  if (from) {
    if (desc) desc += ' — ';
    desc += from;
    if (to) desc += ` → ${to}`;
  }
  return desc || mapIncidentCategory(iconCategory);
}

export class TomTomProvider implements TrafficProvider {
  readonly name = 'tomtom';

  constructor(
    private readonly apiKey: string,
    private readonly http: HttpGetter = createTomTomHttp(),
  ) {}

  async fetchFlow(point: LatLon, signal?: AbortSignal): Promise<FlowSample> {
    const res = await this.http.get<unknown>('/traffic/services/4/flowSegmentData/absolute/10/json', {
      params: {
        key: this.apiKey,
        point: `${point[0]},${point[1]}`,
        unit: 'KMPH',
      },
      signal,
    });

    const flow = FlowResponseSchema.parse(res.data).flowSegmentData;
    return {
      currentSpeed: flow.currentSpeed,
      freeFlowSpeed: flow.freeFlowSpeed,
      confidence: flow.confidence ?? 0.8,
      roadClosure: flow.roadClosure ?? false,
    };
  }

  async fetchIncidents(bbox: BoundingBox, signal?: AbortSignal): Promise<TrafficIncident[]> {
    const res = await this.http.get<unknown>('/traffic/services/5/incidentDetails', {
      params: {
        key: this.apiKey,
        bbox: `${bbox.minLon},${bbox.minLat},${bbox.maxLon},${bbox.maxLat}`,
        fields: INCIDENT_FIELDS,
        language: 'en-GB',
        timeValidityFilter: 'present',
      },
      signal,
    });

    const incidents: TrafficIncident[] = [];
    for (const inc of IncidentsResponseSchema.parse(res.data).incidents) {
      const position = extractIncidentPosition(inc.geometry);
      if (!position) continue;

      incidents.push({
        type: mapIncidentCategory(inc.properties.iconCategory),
        lat: position[0],
        lon: position[1],
        description: buildIncidentDescription(inc),
      });
    }
    return incidents;
  }
}
