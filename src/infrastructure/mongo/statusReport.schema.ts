import { z } from "zod";
import type { PersistedStatusReport } from "../../core/report/StatusReport";
import { isModuleStatus, type ModuleStatus } from "../../core/report/StatusReport";

const auditBlob = z.record(z.unknown()).default({});

export const persistedStatusReportSchema = z.object({
  organization_id: z.string(),
  run_id: z.string(),
  pipeline_snap_ts: z.number(),
  moduleID: z.number().int(),
  moduleName: z.string(),
  primordialDateString: z.string(),
  runStartTS: z.number(),
  runEndTS: z.number(),
  fromTS: z.number(),
  untilTS: z.number(),
  dataFrequency: z.string(),
  status: z.custom<ModuleStatus>(isModuleStatus, { message: "unknown module status" }),
  recordsAppended: z.number(),
  lastOptimizedTS: z.number(),
  vacuumRetentionHours: z.number(),
  inputConfig: auditBlob,
  parsedConfig: auditBlob
});

export const parsePersistedStatusReport = (doc: unknown): PersistedStatusReport =>
  persistedStatusReportSchema.parse(doc);
