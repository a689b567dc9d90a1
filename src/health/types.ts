/**
 * Session Health Types
 *
 * Connection state machine, reconnect backoff and liveness settings
 * for the console session.
 */

/** Transport-level connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

/** Reconnect backoff */
export interface ReconnectConfig {
  delayMs: number;        // delay after the first failed attempt
  maxDelayMs: number;     // backoff cap
  multiplier: number;     // 1 = fixed delay
}

/** Liveness pulse written while a session is connected */
export interface LivenessConfig {
  intervalMs: number;
  byte: number;
}

export const DEFAULT_RECONNECT: ReconnectConfig = {
  delayMs: 2000,
  maxDelayMs: 2000,
  multiplier: 1,
};

export const DEFAULT_LIVENESS: LivenessConfig = {
  intervalMs: 300,
  byte: 0xfe,
};

/**
 * Delay before the next attempt after `failedAttempts` consecutive failures:
 * delayMs * multiplier^(failedAttempts-1), capped at maxDelayMs.
 */
export function calculateBackoff(config: ReconnectConfig, failedAttempts: number): number {
  const { delayMs, maxDelayMs, multiplier } = config;
  const delay = delayMs * Math.pow(multiplier, Math.max(0, failedAttempts - 1));
  return Math.min(delay, Math.max(delayMs, maxDelayMs));
}
