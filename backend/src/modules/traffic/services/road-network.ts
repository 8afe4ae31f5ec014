/**
 * Road network table
 *
 * One table drives both the live flow probes and the synthetic geometry, so a
 * fallback reading draws exactly the roads a live reading would.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { LatLon, RoadNetwork } from '../contracts/traffic.types.js';

const LatLonSchema = z.tuple([z.number().min(-90).max(90), z.number().min(-180).max(180)]);

const RoadNetworkSchema = z.object({
  bbox: z.object({
    minLat: z.number(),
    maxLat: z.number(),
    minLon: z.number(),
    maxLon: z.number(),
  }),
  roads: z
    .array(
      z.object({
        name: z.string().min(1),
        polyline: z.array(LatLonSchema).min(2),
      }),
    )
    .min(1),
});

// Priority: beside the sources (dev, tests) > relative to the working directory (built)
export const ROAD_NETWORK_CANDIDATES = [
  fileURLToPath(new URL('../../../../data/roads/almaty-roads.json', import.meta.url)),
  path.resolve(process.cwd(), 'backend/data/roads/almaty-roads.json'),
];

export function resolveRoadNetworkFile(override?: string): string {
  if (override) return override;
  const found = ROAD_NETWORK_CANDIDATES.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`Road network table not found (looked in ${ROAD_NETWORK_CANDIDATES.join(', ')})`);
  }
  return found;
}

export function parseRoadNetwork(raw: unknown): RoadNetwork {
  return RoadNetworkSchema.parse(raw);
}

export function loadRoadNetwork(file: string = resolveRoadNetworkFile()): RoadNetwork {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  return parseRoadNetwork(raw);
}

export interface ProbePoint {
  road: string;
  point: LatLon;
}

export function probePoints(network: RoadNetwork): ProbePoint[] {
  return network.roads.flatMap((road) => road.polyline.map((point) => ({ road: road.name, point })));
}
