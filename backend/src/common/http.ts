/**
 * HTTP helpers shared by route modules.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

export interface SuccessEnvelope<T> {
  success: true;
  data: T;
  count?: number;
}

export interface ErrorEnvelope {
  error: true;
  code: string;
  message: string;
}

export function success<T>(data: T, count?: number): SuccessEnvelope<T> {
  return count === undefined ? { success: true, data } : { success: true, data, count };
}

export function failure(code: string, message: string): ErrorEnvelope {
  return { error: true, code, message };
}

/**
 * Signal aborted when the client disconnects before the reply is written.
 */
export function requestSignal(_req: FastifyRequest, reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error('Client disconnected'));
    }
  });
  return controller.signal;
}
