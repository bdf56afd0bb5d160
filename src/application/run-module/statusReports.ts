import type { Module } from "../../core/module/module.types";
import type { PipelineTarget } from "../../core/module/target.types";
import { getLastOptimized } from "../../core/optimize/optimizeScheduler";
import type { ModuleStatus, StatusReport } from "../../core/report/StatusReport";
import { VACUUM_RETENTION_HOURS } from "../../core/report/StatusReport";
import type { PipelineConfig } from "../../ports/PipelineConfig";

/**
 * `untilTS` reported for a run that did not write: held modules stay at the
 * start of their window so the next run retries it.
 */
export const resolveReportedUntilTS = (config: PipelineConfig, module: Module): number =>
  module.watermark === "hold" ? config.fromTime(module.moduleID) : config.untilTime(module.moduleID);

type ReportFields = {
  status: ModuleStatus;
  runStartTS: number;
  runEndTS: number;
  untilTS: number;
  dataFrequency: string;
  recordsAppended: number;
  lastOptimizedTS: number;
  vacuumRetentionHours: number;
};

const buildReport = (config: PipelineConfig, module: Module, fields: ReportFields): StatusReport => ({
  organization_id: config.organizationId,
  moduleID: module.moduleID,
  moduleName: module.moduleName,
  primordialDateString: config.primordialDateString,
  runStartTS: fields.runStartTS,
  runEndTS: fields.runEndTS,
  fromTS: config.fromTime(module.moduleID),
  untilTS: fields.untilTS,
  dataFrequency: fields.dataFrequency,
  status: fields.status,
  recordsAppended: fields.recordsAppended,
  lastOptimizedTS: fields.lastOptimizedTS,
  vacuumRetentionHours: fields.vacuumRetentionHours,
  inputConfig: config.inputConfig,
  parsedConfig: config.parsedConfig
});

export const buildSuccessReport = (
  config: PipelineConfig,
  module: Module,
  target: PipelineTarget,
  run: { startTS: number; endTS: number; recordsAppended: number; lastOptimizedTS: number }
): StatusReport =>
  buildReport(config, module, {
    status: "SUCCESS",
    runStartTS: run.startTS,
    runEndTS: run.endTS,
    untilTS: config.untilTime(module.moduleID),
    dataFrequency: target.dataFrequency,
    recordsAppended: run.recordsAppended,
    lastOptimizedTS: run.lastOptimizedTS,
    vacuumRetentionHours: VACUUM_RETENTION_HOURS
  });

export const buildEmptyReport = (config: PipelineConfig, module: Module, now: number): StatusReport =>
  buildReport(config, module, {
    status: "EMPTY",
    runStartTS: now,
    runEndTS: now,
    untilTS: resolveReportedUntilTS(config, module),
    dataFrequency: "",
    recordsAppended: 0,
    lastOptimizedTS: getLastOptimized(config, module.moduleID),
    vacuumRetentionHours: VACUUM_RETENTION_HOURS
  });

export const buildFailedReport = (
  config: PipelineConfig,
  module: Module,
  target: PipelineTarget,
  status: ModuleStatus
): StatusReport =>
  buildReport(config, module, {
    status,
    runStartTS: 0,
    runEndTS: 0,
    untilTS: resolveReportedUntilTS(config, module),
    dataFrequency: target.dataFrequency,
    recordsAppended: 0,
    lastOptimizedTS: getLastOptimized(config, module.moduleID),
    vacuumRetentionHours: 0
  });
