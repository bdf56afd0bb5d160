import type { Module } from "../../core/module/module.types";
import { tableFullName, type PipelineTarget } from "../../core/module/target.types";
import { getLastOptimized, needsOptimize } from "../../core/optimize/optimizeScheduler";
import type { Dataset } from "../../ports/Dataset";
import { toErrorCause, toErrorMessage } from "../../shared/logging/logger";
import type { ExecutionContext } from "./executionContext";
import { failModule } from "./failureHandler";
import { finalizeModule } from "./finalizeModule";
import { classifyWriteFailure, WriteFailureError } from "./module.error-handler";
import type { ModuleOutcome } from "./moduleOutcome";
import { countAppendedRecords } from "./recordCount";
import { buildSuccessReport } from "./statusReports";
import { computeWritePartitions, SHUFFLE_PARTITIONS_KEY } from "./writePartitions";

export type WriteHints = {
  /** Partition count observed on the validated source. */
  sourcePartitions: number;
};

/** The write step of a module, bound to the target it writes. */
export interface ModuleWriter {
  readonly target: PipelineTarget;
  write(dataset: Dataset, module: Module, hints: WriteHints): Promise<ModuleOutcome>;
}

type OptimizeDecision = { due: boolean; lastOptimizedTS: number };

const decideOptimize = (ctx: ExecutionContext, module: Module): OptimizeDecision => {
  const { config } = ctx;
  if (!needsOptimize(config, module.moduleID, ctx.clock())) {
    return { due: false, lastOptimizedTS: getLastOptimized(config, module.moduleID) };
  }
  return { due: true, lastOptimizedTS: config.untilTime(module.moduleID) };
};

export const createAppendWriter = (ctx: ExecutionContext, target: PipelineTarget): ModuleWriter => ({
  target,
  write: async (dataset, module, hints) => {
    const startTS = ctx.clock();
    const table = tableFullName(target);

    try {
      const partitions = computeWritePartitions(hints.sourcePartitions, target, ctx.sizeHints);
      ctx.session.set(SHUFFLE_PARTITIONS_KEY, String(partitions));
      const finalDataset = await dataset.repartition(partitions);

      ctx.logger.info("module.append_started", { moduleID: module.moduleID, target: table, partitions });
      if (!(await ctx.database.write(finalDataset, target))) {
        throw new WriteFailureError(table);
      }

      const recordsAppended = await countAppendedRecords(ctx, module, target, finalDataset);
      ctx.logger.info("module.append_succeeded", {
        moduleID: module.moduleID,
        moduleName: module.moduleName,
        target: table,
        recordsAppended
      });

      const optimize = decideOptimize(ctx, module);
      ctx.session.restore(ctx.config.initialSessionConf);

      const report = buildSuccessReport(ctx.config, module, target, {
        startTS,
        endTS: ctx.clock(),
        recordsAppended,
        lastOptimizedTS: optimize.lastOptimizedTS
      });
      await finalizeModule(ctx, report);
      // after the report carrying the new lastOptimizedTS is stored
      if (optimize.due) ctx.postProcessor.markOptimize(target);
      return { kind: "success", report };
    } catch (error) {
      const failure = classifyWriteFailure(error, {
        moduleID: module.moduleID,
        moduleName: module.moduleName,
        target: table
      });
      ctx.logger.error("module.append_failed", {
        moduleID: module.moduleID,
        moduleName: module.moduleName,
        target: table,
        code: failure.code,
        message: toErrorMessage(error),
        cause: toErrorCause(error)
      });
      return failModule(ctx, module, target, failure);
    }
  }
});
