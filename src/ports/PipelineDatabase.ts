import type { PipelineTarget } from "../core/module/target.types";
import type { PersistedStatusReport } from "../core/report/StatusReport";
import type { Dataset } from "./Dataset";

export type CountWindow = {
  fromTS: number;
  untilTS: number;
  lagDays: number;
  dateColumn: string;
  epochColumn: string;
};

export interface PipelineDatabase {
  /** Resolves to `false` when the store did not acknowledge the full write. */
  write(dataset: Dataset, target: PipelineTarget): Promise<boolean>;
  /** Reverts the target to its state before this run. Rejects on failure. */
  rollbackTarget(target: PipelineTarget): Promise<void>;
  countWindow(target: PipelineTarget, window: CountWindow): Promise<number>;
  loadLastRunDetail(organizationId: string): Promise<PersistedStatusReport[]>;
}
