/**
 * HISTORY MODULE — Weather snapshot model
 */

import mongoose, { Schema } from 'mongoose';

export interface WeatherSnapshotRow {
  temperature: number;
  feelsLike: number;
  humidity: number;
  pressure: number;
  windSpeed: number;
  visibility: number;
  description: string;
  icon: string;
  aqi: number;
  city: string;
  country: string;
  isSynthetic: boolean;
  timestamp: Date;
  createdAt: Date;
}

const WeatherSnapshotSchema = new Schema<WeatherSnapshotRow>({
  temperature: { type: Number, required: true },
  feelsLike: { type: Number, required: true },
  humidity: { type: Number, required: true },
  pressure: { type: Number, required: true },
  windSpeed: { type: Number, required: true },
  visibility: { type: Number, required: true },
  description: { type: String, default: '' },
  icon: { type: String, default: '' },
  aqi: { type: Number, required: true },
  city: { type: String, required: true },
  country: { type: String, required: true },
  isSynthetic: { type: Boolean, default: false },
  timestamp: { type: Date, required: true },
  createdAt: { type: Date, default: () => new Date() },
}, {
  collection: 'weather_snapshots',
  versionKey: false,
});

WeatherSnapshotSchema.index({ timestamp: -1 });

export const WeatherSnapshotModel = mongoose.model<WeatherSnapshotRow>('WeatherSnapshot', WeatherSnapshotSchema);
