import type { StatusReport } from "../../core/report/StatusReport";
import { isFailedStatus } from "../../core/report/StatusReport";
import type { AuditBlob, PipelineConfig } from "../../ports/PipelineConfig";

export type PipelineSettings = {
  organizationId: string;
  runId: string;
  primordialDateString: string;
  /** Upper bound of every module's window for this run (epoch millis). */
  runUntilTS: number;
  isLocalTesting: boolean;
  inputConfig?: AuditBlob;
  parsedConfig?: AuditBlob;
  initialSessionConf?: Record<string, string>;
};

export const primordialEpochMillis = (primordialDateString: string): number => {
  const epoch = Date.parse(`${primordialDateString}T00:00:00.000Z`);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(primordialDateString) || Number.isNaN(epoch)) {
    throw new Error(`primordialDateString must be formatted as YYYY-MM-DD. Received: ${primordialDateString}`);
  }
  return epoch;
};

/**
 * Windows are resolved from the previous run of each module: a module resumes
 * where its last SUCCESS or EMPTY run ended, and re-processes the window of a
 * FAILED run.
 */
export const createPipelineConfig = (
  settings: PipelineSettings,
  lastRunDetail: readonly StatusReport[]
): PipelineConfig => {
  const primordialTS = primordialEpochMillis(settings.primordialDateString);
  const byModule = new Map<number, StatusReport>();
  for (const report of lastRunDetail) {
    byModule.set(report.moduleID, report);
  }

  const fromTime = (moduleID: number): number => {
    const previous = byModule.get(moduleID);
    if (!previous) return primordialTS;
    return isFailedStatus(previous.status) ? previous.fromTS : previous.untilTS;
  };

  return {
    organizationId: settings.organizationId,
    runId: settings.runId,
    primordialDateString: settings.primordialDateString,
    isFirstRun: lastRunDetail.length === 0,
    isLocalTesting: settings.isLocalTesting,
    lastRunDetail: Array.from(byModule.values()),
    inputConfig: settings.inputConfig ?? {},
    parsedConfig: settings.parsedConfig ?? {},
    initialSessionConf: { ...(settings.initialSessionConf ?? {}) },
    fromTime,
    untilTime: () => settings.runUntilTS
  };
};
