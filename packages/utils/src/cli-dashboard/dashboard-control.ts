export type DashboardConfig = {
  enabled: boolean;
  refreshMs: number;
  noColor: boolean;
};

/**
 * Resolve effective dashboard settings: it only runs on a TTY and the refresh
 * rate is clamped to 100..1000ms.
 */
export function resolveDashboardConfig(args: {
  enabled: boolean;
  refreshMs: number;
  noColor: boolean;
  isTTY: boolean | undefined;
}): DashboardConfig {
  return {
    enabled: args.enabled && args.isTTY === true,
    refreshMs: Math.min(1000, Math.max(100, Math.floor(args.refreshMs))),
    noColor: args.noColor,
  };
}
