/**
 * Request dispatcher type definitions
 */

/**
 * How a successful dispatch was answered
 */
export type DispatchOutcome = 'empty' | 'greeting' | 'cache_hit' | 'completion';

/**
 * Failure categories surfaced to the caller
 */
export type DispatchErrorKind = 'external_service';

export type DispatchResult =
  | { ok: true; text: string; outcome: DispatchOutcome }
  | { ok: false; kind: DispatchErrorKind; text: string };

/**
 * Throttle state snapshot for diagnostics
 */
export interface ThrottleStatus {
  minIntervalMs: number;
  lastCallTime: number;
  nextAvailableTime: number;
}

/**
 * Response cache snapshot for diagnostics
 */
export interface CacheStatus {
  size: number;
  maxEntries: number;
  ttlMs: number;
}
