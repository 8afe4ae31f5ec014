/**
 * Host dependencies shared by every service.
 *
 * Services never import a logger or read the wall clock directly; both are
 * injected so tests can observe and steer them.
 */

export interface Logger {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug?: (obj: unknown, msg?: string) => void;
}

export interface Clock {
  now: () => number; // milliseconds epoch
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Source of uniform randomness in [0, 1). */
export type RandomSource = () => number;

export const noopLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Options every I/O-bound call accepts. The signal belongs to the inbound
 * request and is aborted when the client goes away.
 */
export interface CallOptions {
  signal?: AbortSignal;
}
