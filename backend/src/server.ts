/**
 * City Monitor API — entry point
 *
 * Loads configuration, composes services, listens, and on SIGINT/SIGTERM
 * stops accepting requests, drains detached writes and disconnects storage.
 */

import 'dotenv/config';
import { loadEnv } from './config/env.js';
import { buildApp } from './app.js';
import { createServices } from './container.js';
import { registerRoutes } from './api/routes.js';
import { disconnectMongo } from './db/mongoose.js';
import { errorMessage } from './common/errors.js';

export const SHUTDOWN_DRAIN_MS = 10_000;

async function main(): Promise<void> {
  const env = loadEnv();

  console.log('═══════════════════════════════════════════════════════════════');
  console.log(`  City Monitor API — ${env.CITY_NAME}, ${env.CITY_COUNTRY}`);
  console.log('═══════════════════════════════════════════════════════════════');

  const app = buildApp(env);
  const services = await createServices(env, app.log);

  console.log(`[Boot] Weather provider: ${env.WEATHER_PROVIDER_ENABLED ? 'open-meteo' : 'synthetic'}`);
  console.log(`[Boot] Traffic provider: ${env.TOMTOM_API_KEY ? 'tomtom' : 'synthetic'}`);
  console.log(`[Boot] History store: ${services.repository.kind}`);
  console.log(`[Boot] Prediction service: ${services.predictor.serviceUrl}`);

  await app.register(registerRoutes, services);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Boot] ${signal} received, shutting down...`);

    try {
      await app.close();
      const drain = await services.dashboard.drain(SHUTDOWN_DRAIN_MS);
      console.log(`[Boot] Background writes drained: ${drain.drained} (pending ${drain.pending})`);
      await disconnectMongo();
      process.exit(0);
    } catch (err) {
      console.error('[Boot] Shutdown failed:', errorMessage(err));
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[Boot] ✅ Listening on http://${env.HOST}:${env.PORT}`);
}

main().catch((err: unknown) => {
  console.error('[Boot] Fatal:', errorMessage(err));
  process.exit(1);
});
