/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';

export const MONGO_SERVER_SELECTION_TIMEOUT_MS = 5_000;

export interface MongoConnectOptions {
  dbName: string;
  serverSelectionTimeoutMs?: number;
}

/**
 * Connect and verify the server answers a ping. Rejects when it does not.
 */
export async function connectMongo(url: string, opts: MongoConnectOptions): Promise<void> {
  if (mongoose.connection.readyState === 1) return;

  await mongoose.connect(url, {
    dbName: opts.dbName,
    serverSelectionTimeoutMS: opts.serverSelectionTimeoutMs ?? MONGO_SERVER_SELECTION_TIMEOUT_MS,
  });
  await pingMongo();
  console.log(`[DB] Connected to MongoDB (${opts.dbName})`);
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  console.log('[DB] MongoDB disconnected');
}

export function isMongoConnected(): boolean {
  return mongoose.connection.readyState === 1;
}

export async function pingMongo(): Promise<void> {
  const db = mongoose.connection.db;
  if (!db) throw new Error('MongoDB connection has no database handle');
  await db.admin().ping();
}
