import type { PipelineTarget } from "../../core/module/target.types";
import { tableFullName } from "../../core/module/target.types";
import type { PostProcessor } from "../../ports/PostProcessor";
import type { Logger } from "../../shared/logging/logger";

export type Compactor = {
  compact(target: PipelineTarget): Promise<void>;
};

export class MongoPostProcessor implements PostProcessor {
  private readonly marked = new Map<string, PipelineTarget>();

  constructor(
    private readonly compactor: Compactor,
    private readonly logger: Logger
  ) {}

  markOptimize(target: PipelineTarget): void {
    this.marked.set(tableFullName(target), target);
  }

  async optimize(): Promise<void> {
    for (const [name, target] of this.marked) {
      await this.compactor.compact(target);
      this.logger.info("post_processor.optimized", { target: name });
      this.marked.delete(name);
    }
  }
}
