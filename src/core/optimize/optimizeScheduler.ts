import type { StatusReport } from "../report/StatusReport";

export const OPTIMIZE_INTERVAL_MS = 1000 * 60 * 60 * 24 * 7;

export type OptimizeHistory = {
  isFirstRun: boolean;
  isLocalTesting: boolean;
  lastRunDetail: readonly Pick<StatusReport, "moduleID" | "lastOptimizedTS">[];
};

/**
 * Last optimize timestamp recorded for the module by the previous run, 0 when
 * there is none.
 */
export const getLastOptimized = (config: OptimizeHistory, moduleID: number): number => {
  if (config.isFirstRun) return 0;
  const previous = config.lastRunDetail.find((report) => report.moduleID === moduleID);
  return previous?.lastOptimizedTS ?? 0;
};

export const needsOptimize = (
  config: OptimizeHistory,
  moduleID: number,
  now: number,
  intervalMs: number = OPTIMIZE_INTERVAL_MS
): boolean => {
  if (config.isLocalTesting) return false;
  return config.isFirstRun || getLastOptimized(config, moduleID) < now - intervalMs;
};
