import type { StatusReport } from "../core/report/StatusReport";

export type AuditBlob = Record<string, unknown>;

export interface PipelineConfig {
  readonly organizationId: string;
  readonly runId: string;
  readonly primordialDateString: string;
  readonly isFirstRun: boolean;
  readonly isLocalTesting: boolean;
  /** Latest report per module from previous runs. */
  readonly lastRunDetail: readonly StatusReport[];
  readonly inputConfig: AuditBlob;
  readonly parsedConfig: AuditBlob;
  /** Session settings as they were before the run applied any override. */
  readonly initialSessionConf: Readonly<Record<string, string>>;
  fromTime(moduleID: number): number;
  untilTime(moduleID: number): number;
}
