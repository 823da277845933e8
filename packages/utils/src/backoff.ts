/**
 * Exponential backoff shared by reconnect scheduling and storage retries.
 */
export interface BackoffConfig {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /**
   * Fraction of the delay added as random jitter (0 disables it).
   */
  jitterRatio?: number;
}

export const DEFAULT_RECONNECT_BACKOFF: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  multiplier: 2,
};

/**
 * Delay before retry number `attempt` (0-based): 0 -> initial, 1 -> initial*multiplier, ...
 * capped at maxDelayMs. Jitter never pushes the result past the cap.
 */
export function computeBackoffDelayMs(config: BackoffConfig, attempt: number, random: () => number = Math.random): number {
  const base = Math.min(config.initialDelayMs * config.multiplier ** Math.max(0, attempt), config.maxDelayMs);
  const ratio = config.jitterRatio ?? 0;
  if (ratio <= 0 || base <= 0) return base;

  const jitter = Math.floor(random() * base * ratio);
  return Math.min(base + jitter, config.maxDelayMs);
}

export async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
