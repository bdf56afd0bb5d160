import type { Module } from "../../core/module/module.types";
import { tableFullName, type PipelineTarget } from "../../core/module/target.types";
import type { RollbackOutcome } from "../../core/report/StatusReport";
import { failedStatus } from "../../core/report/StatusReport";
import { toErrorCause, toErrorMessage } from "../../shared/logging/logger";
import type { ExecutionContext } from "./executionContext";
import { finalizeModule } from "./finalizeModule";
import type { ModuleFatalError } from "./module.error-handler";
import type { ModuleOutcome } from "./moduleOutcome";
import { buildFailedReport } from "./statusReports";

const attemptRollback = async (ctx: ExecutionContext, module: Module, target: PipelineTarget): Promise<RollbackOutcome> => {
  ctx.logger.warn("module.rollback_started", {
    moduleID: module.moduleID,
    moduleName: module.moduleName,
    target: tableFullName(target)
  });

  try {
    await ctx.database.rollbackTarget(target);
    return "ROLLBACK SUCCESSFUL";
  } catch (error) {
    ctx.logger.error("module.rollback_failed", {
      moduleID: module.moduleID,
      moduleName: module.moduleName,
      target: tableFullName(target),
      message: toErrorMessage(error),
      cause: toErrorCause(error)
    });
    return "ROLLBACK FAILED";
  }
};

/**
 * Rollback, then the FAILED report, then the failure outcome. The report is
 * durable before any caller sees the failure.
 */
export const failModule = async (
  ctx: ExecutionContext,
  module: Module,
  target: PipelineTarget,
  failure: ModuleFatalError
): Promise<Extract<ModuleOutcome, { kind: "failure" }>> => {
  const rollback = await attemptRollback(ctx, module, target);
  const report = buildFailedReport(ctx.config, module, target, failedStatus(rollback, failure.message));
  await finalizeModule(ctx, report);
  return { kind: "failure", code: failure.code, message: failure.message, report };
};
