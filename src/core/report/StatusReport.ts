export type RollbackOutcome = "ROLLBACK SUCCESSFUL" | "ROLLBACK FAILED";

export type FailedStatus = `FAILED --> ${RollbackOutcome}: ERROR:${string}`;

export type ModuleStatus = "SUCCESS" | "EMPTY" | FailedStatus;

export type StatusReport = {
  organization_id: string;
  moduleID: number;
  moduleName: string;
  primordialDateString: string;
  runStartTS: number;
  runEndTS: number;
  fromTS: number;
  untilTS: number;
  dataFrequency: string;
  status: ModuleStatus;
  recordsAppended: number;
  lastOptimizedTS: number;
  vacuumRetentionHours: number;
  inputConfig: Record<string, unknown>;
  parsedConfig: Record<string, unknown>;
};

/** Row shape of the status log: the report keyed by organization and run. */
export type PersistedStatusReport = StatusReport & {
  run_id: string;
  pipeline_snap_ts: number;
};

export const VACUUM_RETENTION_HOURS = 24 * 7;

export const failedStatus = (rollback: RollbackOutcome, message: string): FailedStatus =>
  `FAILED --> ${rollback}: ERROR:${message}`;

export const isFailedStatus = (status: string): status is FailedStatus => status.startsWith("FAILED --> ");

const moduleStatuses = new Set(["SUCCESS", "EMPTY"]);

export const isModuleStatus = (value: unknown): value is ModuleStatus =>
  typeof value === "string" && (moduleStatuses.has(value) || isFailedStatus(value));

export const toPersistedReport = (report: StatusReport, runId: string, snapTS: number): PersistedStatusReport => ({
  ...report,
  run_id: runId,
  pipeline_snap_ts: snapTS
});
