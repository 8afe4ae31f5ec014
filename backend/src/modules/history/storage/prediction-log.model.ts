/**
 * HISTORY MODULE — Prediction log model
 *
 * Audit trail of every answered question, live or synthetic.
 */

import mongoose, { Schema } from 'mongoose';

export interface PredictionLogRow {
  query?: string;
  date?: string;
  temperature?: number;
  language?: string;
  liveAqi?: number;
  liveTraffic?: number;
  liveTemp?: number;
  prediction: string;
  confidenceScore: number;
  aqiPrediction: number;
  trafficIndexPrediction: number;
  reasoning: string;
  isSynthetic: boolean;
  createdAt: Date;
}

const PredictionLogSchema = new Schema<PredictionLogRow>({
  query: { type: String },
  date: { type: String },
  temperature: { type: Number },
  language: { type: String },
  liveAqi: { type: Number },
  liveTraffic: { type: Number },
  liveTemp: { type: Number },
  prediction: { type: String, required: true },
  confidenceScore: { type: Number, required: true },
  aqiPrediction: { type: Number, required: true },
  trafficIndexPrediction: { type: Number, required: true },
  reasoning: { type: String, default: '' },
  isSynthetic: { type: Boolean, default: false },
  createdAt: { type: Date, default: () => new Date() },
}, {
  collection: 'prediction_logs',
  versionKey: false,
});

PredictionLogSchema.index({ createdAt: -1 });

export const PredictionLogModel = mongoose.model<PredictionLogRow>('PredictionLog', PredictionLogSchema);
