import { describeModule, type Module } from "../../core/module/module.types";
import type { ExecutionContext } from "./executionContext";
import { finalizeModule } from "./finalizeModule";
import type { ModuleOutcome } from "./moduleOutcome";
import { buildEmptyReport } from "./statusReports";

export const noNewDataMessage = (module: Module): string =>
  `ALERT: No New Data Retrieved for Module ${describeModule(module)}! Skipping`;

export const handleNoNewData = async (
  ctx: ExecutionContext,
  module: Module,
  reason: string
): Promise<Extract<ModuleOutcome, { kind: "empty" }>> => {
  const report = buildEmptyReport(ctx.config, module, ctx.clock());
  await finalizeModule(ctx, report);
  return { kind: "empty", reason, report };
};
