import type { Module } from "../../core/module/module.types";
import { tableFullName } from "../../core/module/target.types";
import type { Dataset, TransformStage } from "../../ports/Dataset";
import { toErrorCause, toErrorMessage } from "../../shared/logging/logger";
import type { ModuleWriter } from "./appendWriter";
import { handleNoNewData, noNewDataMessage } from "./emptyInputHandler";
import type { ExecutionContext } from "./executionContext";
import { failModule } from "./failureHandler";
import { classifyPreWriteFailure, classifyWriteFailure } from "./module.error-handler";
import type { ModuleOutcome } from "./moduleOutcome";

export type ModuleDefinition = {
  source: Dataset;
  transforms?: readonly TransformStage[];
  writer: ModuleWriter;
  module: Module;
};

type PreparedSource = {
  dataset: Dataset;
  sourcePartitions: number;
};

const logOutcome = (ctx: ExecutionContext, module: Module, outcome: ModuleOutcome): ModuleOutcome => {
  const fields = { moduleID: module.moduleID, moduleName: module.moduleName };
  switch (outcome.kind) {
    case "success":
      ctx.logger.info("module.succeeded", { ...fields, recordsAppended: outcome.report.recordsAppended });
      break;
    case "empty":
      ctx.logger.warn("module.empty", { ...fields, reason: outcome.reason });
      break;
    case "failure":
      ctx.logger.error("module.failed", { ...fields, code: outcome.code, message: outcome.message });
      break;
  }
  return outcome;
};

/**
 * Validate, then transform in order. Resolves to `undefined` when the source
 * has no rows.
 */
const prepareSource = async (
  ctx: ExecutionContext,
  definition: ModuleDefinition,
  progress: { stage?: string }
): Promise<PreparedSource | undefined> => {
  const { source, module } = definition;
  if (await source.isEmpty()) return undefined;

  const verified = await source.verifyMinimumSchema(ctx.schemas.get(module), true, ctx.debug);
  const probed = await verified.tryPartitionCount();
  if (probed === undefined) {
    ctx.logger.info("module.partition_probe_skipped", { moduleID: module.moduleID, reason: "streaming source" });
  }

  let dataset = verified;
  for (const stage of definition.transforms ?? []) {
    progress.stage = stage.name;
    dataset = await dataset.transform(stage);
  }

  return { dataset, sourcePartitions: probed ?? ctx.sizeHints.defaultSourcePartitions };
};

/**
 * Runs one module to completion. Every path ends in exactly one persisted
 * status report; only a failure to persist that report rejects.
 */
export const executeModule = async (ctx: ExecutionContext, definition: ModuleDefinition): Promise<ModuleOutcome> => {
  const { module, writer } = definition;
  ctx.logger.info("module.started", { moduleID: module.moduleID, moduleName: module.moduleName });

  const progress: { stage?: string } = {};
  let prepared: PreparedSource | undefined;
  try {
    prepared = await prepareSource(ctx, definition, progress);
  } catch (error) {
    const failure = classifyPreWriteFailure(error, {
      moduleID: module.moduleID,
      moduleName: module.moduleName,
      target: tableFullName(writer.target),
      stage: progress.stage
    });
    ctx.logger.error("module.prepare_failed", {
      moduleID: module.moduleID,
      code: failure.code,
      message: toErrorMessage(error),
      cause: toErrorCause(error)
    });
    return logOutcome(ctx, module, await failModule(ctx, module, writer.target, failure));
  }

  if (!prepared) {
    return logOutcome(ctx, module, await handleNoNewData(ctx, module, noNewDataMessage(module)));
  }

  let outcome: ModuleOutcome;
  try {
    outcome = await writer.write(prepared.dataset, module, { sourcePartitions: prepared.sourcePartitions });
  } catch (error) {
    const failure = classifyWriteFailure(error, {
      moduleID: module.moduleID,
      moduleName: module.moduleName,
      target: tableFullName(writer.target)
    });
    ctx.logger.error("module.write_rejected", {
      moduleID: module.moduleID,
      code: failure.code,
      message: toErrorMessage(error),
      cause: toErrorCause(error)
    });
    outcome = await failModule(ctx, module, writer.target, failure);
  }
  return logOutcome(ctx, module, outcome);
};

/** Binds a module's inputs for a single `process()` call. */
export const defineModule = (ctx: ExecutionContext, definition: ModuleDefinition) => ({
  module: definition.module,
  process: (): Promise<ModuleOutcome> => executeModule(ctx, definition)
});
