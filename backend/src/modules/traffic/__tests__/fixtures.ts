import type { RoadNetwork } from '../contracts/traffic.types.js';

export const testNetwork: RoadNetwork = {
  bbox: { minLat: 43.15, maxLat: 43.35, minLon: 76.8, maxLon: 77.0 },
  roads: [
    { name: 'North Ave', polyline: [[43.2, 76.9], [43.21, 76.91]] },
    { name: 'South Ave', polyline: [[43.1, 76.9], [43.11, 76.91]] },
  ],
};

// 15 January 2025 is a Wednesday; 03:00 UTC is 08:00 in the city (UTC+5)
export const WEDNESDAY_MORNING_RUSH = Date.UTC(2025, 0, 15, 3, 0, 0);
// 18 January 2025 is a Saturday
export const SATURDAY_NOON = Date.UTC(2025, 0, 18, 7, 0, 0);
