import type { PipelineTarget } from "../core/module/target.types";

export interface PostProcessor {
  markOptimize(target: PipelineTarget): void;
  optimize(): Promise<void>;
}
