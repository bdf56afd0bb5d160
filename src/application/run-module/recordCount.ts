import type { Module } from "../../core/module/module.types";
import { resolveCountPolicy, type PipelineTarget } from "../../core/module/target.types";
import type { Dataset } from "../../ports/Dataset";
import type { ExecutionContext } from "./executionContext";

/**
 * Records now present for this run's window. Targets with a materialized
 * count policy are counted from the written table instead of the dataset.
 */
export const countAppendedRecords = async (
  ctx: ExecutionContext,
  module: Module,
  target: PipelineTarget,
  written: Dataset
): Promise<number> => {
  const policy = resolveCountPolicy(target);
  if (policy.kind === "direct") {
    return written.count();
  }

  return ctx.database.countWindow(target, {
    fromTS: ctx.config.fromTime(module.moduleID),
    untilTS: ctx.config.untilTime(module.moduleID),
    lagDays: policy.lagDays,
    dateColumn: policy.dateColumn,
    epochColumn: policy.epochColumn
  });
};
