import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { Env } from './config/env.js';
import { AppError, NotFoundError } from './common/errors.js';
import { failure } from './common/http.js';

export const SERVICE_NAME = 'city-monitor-api';
export const SERVICE_VERSION = '1.0.0';

export type AppConfig = Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'CORS_ORIGINS'>;

/**
 * Build Fastify Application
 *
 * Routes are registered separately (api/routes.ts) once services exist, so
 * services can log through children of app.log.
 */
export function buildApp(config: AppConfig): FastifyInstance {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: config.CORS_ORIGINS === '*' ? true : config.CORS_ORIGINS.split(','),
  });

  // Global error handler
  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) req.log.error({ err }, err.message);
      return reply.status(err.statusCode).send(failure(err.code, err.message));
    }

    // Fastify validation / body parsing errors
    const status = err.validation ? 400 : err.statusCode;
    if (status !== undefined && status >= 400 && status < 500) {
      return reply.status(status).send(failure(status === 400 ? 'VALIDATION_ERROR' : err.code, err.message));
    }

    // Unknown errors
    req.log.error({ err }, 'Unhandled error');
    return reply.status(500).send(failure(
      'INTERNAL_ERROR',
      config.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    ));
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    const err = new NotFoundError();
    reply.status(err.statusCode).send(failure(err.code, err.message));
  });

  // Liveness
  app.get('/health', async () => ({
    status: 'ok',
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
  }));

  return app;
}
