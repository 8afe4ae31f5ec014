/**
 * Database Indexes
 * Run on startup once the connection is up.
 */

import { WeatherSnapshotModel } from '../modules/history/storage/weather.model.js';
import { TrafficSnapshotModel } from '../modules/history/storage/traffic.model.js';
import { PredictionLogModel } from '../modules/history/storage/prediction-log.model.js';
import { errorMessage } from '../common/errors.js';

const MODELS = [WeatherSnapshotModel, TrafficSnapshotModel, PredictionLogModel];

export async function ensureIndexes(): Promise<void> {
  for (const model of MODELS) {
    try {
      await model.createIndexes();
      console.log(`[DB] ${model.collection.collectionName} indexes ensured`);
    } catch (err) {
      console.log(`[DB] ${model.collection.collectionName} indexes failed:`, errorMessage(err));
    }
  }
}
