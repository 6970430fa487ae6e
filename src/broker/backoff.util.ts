/**
 * Linear reconnect backoff: `baseMs` per attempt, capped at `maxMs`.
 * `attempt` is 1-based.
 */
export function reconnectDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * Math.max(attempt, 1), maxMs);
}
