import type { PipelineTarget } from "../../core/module/target.types";
import type { SizeHints } from "../../shared/config/runtime.config";

export const SHUFFLE_PARTITIONS_KEY = "shuffle.partitions";

/**
 * A fixed hint on the target wins; otherwise follow the source's partitioning,
 * bounded by the session-wide ceiling.
 */
export const computeWritePartitions = (sourcePartitions: number, target: PipelineTarget, hints: SizeHints): number => {
  if (target.writePartitions != null && target.writePartitions >= 1) {
    return Math.floor(target.writePartitions);
  }
  return Math.min(hints.maxWritePartitions, Math.max(1, Math.floor(sourcePartitions)));
};
