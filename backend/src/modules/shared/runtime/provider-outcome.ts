/**
 * PROVIDER OUTCOME
 * ================
 *
 * Provider clients never throw. Instead they say which branch produced the
 * reading, so callers and tests can tell live data from fallback data without
 * reading logs.
 */

export type FallbackReason =
  | 'NOT_CONFIGURED'     // no provider key / provider disabled
  | 'UPSTREAM_ERROR'     // transport error, non-2xx, or undecodable body
  | 'ALL_PROBES_FAILED'  // traffic: not a single probe point answered
  | 'CANCELLED';         // every caller waiting on the refresh went away

export type ProviderOutcome<T> =
  | { kind: 'live'; reading: T; cached: boolean }
  | { kind: 'fallback'; reading: T; reason: FallbackReason; cached: boolean };

export function live<T>(reading: T): ProviderOutcome<T> {
  return { kind: 'live', reading, cached: false };
}

export function fallback<T>(reading: T, reason: FallbackReason): ProviderOutcome<T> {
  return { kind: 'fallback', reading, reason, cached: false };
}

export function asCached<T>(outcome: ProviderOutcome<T>): ProviderOutcome<T> {
  return { ...outcome, cached: true };
}
