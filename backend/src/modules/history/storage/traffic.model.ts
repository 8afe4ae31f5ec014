/**
 * HISTORY MODULE — Traffic snapshot model
 */

import mongoose, { Schema } from 'mongoose';
import type { CongestionLevel } from '../../traffic/contracts/traffic.types.js';

export interface TrafficSnapshotRow {
  congestionIndex: number;
  congestionLevel: CongestionLevel;
  averageSpeedKmh: number;
  freeFlowSpeedKmh: number;
  incidentCount: number;
  isSynthetic: boolean;
  timestamp: Date;
  createdAt: Date;
}

const TrafficSnapshotSchema = new Schema<TrafficSnapshotRow>({
  congestionIndex: { type: Number, required: true },
  congestionLevel: { type: String, required: true, enum: ['Free-Flow', 'Light', 'Moderate', 'Heavy', 'Severe'] },
  averageSpeedKmh: { type: Number, required: true },
  freeFlowSpeedKmh: { type: Number, required: true },
  incidentCount: { type: Number, default: 0 },
  isSynthetic: { type: Boolean, default: false },
  timestamp: { type: Date, required: true },
  createdAt: { type: Date, default: () => new Date() },
}, {
  collection: 'traffic_snapshots',
  versionKey: false,
});

TrafficSnapshotSchema.index({ timestamp: -1 });

export const TrafficSnapshotModel = mongoose.model<TrafficSnapshotRow>('TrafficSnapshot', TrafficSnapshotSchema);
