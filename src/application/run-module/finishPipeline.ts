import type { ExecutionContext } from "./executionContext";

/** Optimizes the targets marked during the run and resets session overrides. */
export const finishPipeline = async (ctx: ExecutionContext): Promise<void> => {
  await ctx.postProcessor.optimize();
  ctx.session.restore(ctx.config.initialSessionConf);
  ctx.logger.info("pipeline.post_processing_completed", { runId: ctx.config.runId });
};
