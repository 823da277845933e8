/**
 * Validated env -> immutable runtime configuration
 */

import type { Env } from "./env";

export interface MonitorConfig {
  readonly databaseUrl: string;
  readonly symbols: readonly string[];
  readonly feed: {
    readonly streamUrl: string;
    readonly restUrl: string;
    readonly depthLevels: 5 | 10 | 20;
  };
  readonly batch: {
    readonly size: number;
    readonly flushIntervalMs: number;
    readonly maxAttempts: number;
    readonly retryBaseDelayMs: number;
  };
  readonly ingest: {
    readonly tradeHistoryCapacity: number;
    readonly reconnectInitialMs: number;
    readonly reconnectMaxMs: number;
    readonly staleTimeoutMs: number;
  };
  readonly shutdownStepTimeoutMs: number;
  readonly dashboard: {
    readonly enabled: boolean;
    readonly refreshMs: number;
    readonly noColor: boolean;
    readonly staleMs: number;
  };
}

function deepFreeze<T extends object>(value: T): T {
  const values: unknown[] = Object.values(value);
  for (const v of values) {
    if (v !== null && typeof v === "object" && !Object.isFrozen(v)) deepFreeze(v);
  }
  return Object.freeze(value);
}

export function toMonitorConfig(env: Env): MonitorConfig {
  return deepFreeze({
    databaseUrl: env.DATABASE_URL,
    symbols: [...new Set(env.SYMBOLS)],
    feed: {
      streamUrl: env.FEED_STREAM_URL,
      restUrl: env.FEED_REST_URL,
      depthLevels: env.FEED_DEPTH_LEVELS,
    },
    batch: {
      size: env.BATCH_SIZE,
      flushIntervalMs: env.FLUSH_INTERVAL_MS,
      maxAttempts: env.FLUSH_MAX_ATTEMPTS,
      retryBaseDelayMs: env.FLUSH_RETRY_BASE_MS,
    },
    ingest: {
      tradeHistoryCapacity: env.TRADE_HISTORY_CAPACITY,
      reconnectInitialMs: env.RECONNECT_INITIAL_MS,
      reconnectMaxMs: Math.max(env.RECONNECT_MAX_MS, env.RECONNECT_INITIAL_MS),
      staleTimeoutMs: env.STALE_TIMEOUT_MS,
    },
    shutdownStepTimeoutMs: env.SHUTDOWN_STEP_TIMEOUT_MS,
    dashboard: {
      enabled: env.MONITOR_DASHBOARD,
      refreshMs: env.MONITOR_DASHBOARD_REFRESH_MS,
      noColor: env.MONITOR_DASHBOARD_NO_COLOR,
      staleMs: env.MONITOR_DASHBOARD_STALE_MS,
    },
  });
}

/**
 * Database URL without the password, for display
 */
export function redactDatabaseUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password !== "") parsed.password = "***";
    return parsed.toString();
  } catch {
    return "<invalid url>";
  }
}
