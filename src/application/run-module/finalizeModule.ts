import type { PipelineTarget } from "../../core/module/target.types";
import type { StatusReport } from "../../core/report/StatusReport";
import { toPersistedReport } from "../../core/report/StatusReport";
import type { ExecutionContext } from "./executionContext";
import { StatusReportWriteError } from "./module.error-handler";

export const pipelineReportTarget: PipelineTarget = {
  name: "pipeline_report",
  keys: ["organization_id", "run_id"],
  incrementalColumns: ["pipeline_snap_ts"],
  dataFrequency: "milestone"
};

/**
 * Appends the run's single status row to the status log. Called once per
 * module invocation; a second call for the same run appends a second row.
 */
export const finalizeModule = async (ctx: ExecutionContext, report: StatusReport): Promise<void> => {
  const row = toPersistedReport(report, ctx.config.runId, ctx.clock());
  const written = await ctx.database.write(ctx.datasets.fromRecords([row]), pipelineReportTarget);
  if (!written) {
    throw new StatusReportWriteError(report.moduleID, report.status);
  }

  ctx.logger.info("module.report_persisted", {
    moduleID: report.moduleID,
    moduleName: report.moduleName,
    status: report.status,
    recordsAppended: report.recordsAppended
  });
};
