import type { DatasetFactory } from "../../ports/Dataset";
import type { PipelineConfig } from "../../ports/PipelineConfig";
import type { PipelineDatabase } from "../../ports/PipelineDatabase";
import type { PostProcessor } from "../../ports/PostProcessor";
import type { SchemaRegistry } from "../../ports/SchemaRegistry";
import type { SessionOverrides } from "../../ports/SessionOverrides";
import type { SizeHints } from "../../shared/config/runtime.config";
import type { Logger } from "../../shared/logging/logger";

/**
 * Everything a module run touches besides its own inputs. Passed explicitly;
 * components hold no state of their own between runs.
 */
export type ExecutionContext = {
  config: PipelineConfig;
  logger: Logger;
  session: SessionOverrides;
  database: PipelineDatabase;
  postProcessor: PostProcessor;
  schemas: SchemaRegistry;
  datasets: DatasetFactory;
  sizeHints: SizeHints;
  debug: boolean;
  clock: () => number;
};
