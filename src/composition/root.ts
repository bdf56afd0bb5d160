import { randomUUID } from "crypto";
import type { ExecutionContext } from "../application/run-module/executionContext";
import type { RequiredSchema } from "../core/dataset/dataset.types";
import type { PersistedStatusReport } from "../core/report/StatusReport";
import type { AuditBlob } from "../ports/PipelineConfig";
import { inMemoryDatasets } from "../infrastructure/memory/InMemoryDataset";
import { createStaticSchemaRegistry } from "../infrastructure/memory/staticSchemaRegistry";
import { MongoPipelineDatabase } from "../infrastructure/mongo/MongoPipelineDatabase";
import { MongoPostProcessor } from "../infrastructure/mongo/MongoPostProcessor";
import { loadEnv } from "../shared/config/env";
import { createPipelineConfig } from "../shared/config/pipeline.config";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { createJsonConsoleLogger } from "../shared/logging/logger";
import { createSessionOverrides } from "../shared/session/sessionOverrides";

export type PipelineRuntimeOptions = {
  schemas?: Readonly<Record<number, RequiredSchema>>;
  runUntilTS?: number;
  inputConfig?: AuditBlob;
  initialSessionConf?: Record<string, string>;
};

export type PipelineRuntime = {
  context: ExecutionContext;
  close(): Promise<void>;
};

export const createPipelineRuntime = async (options: PipelineRuntimeOptions = {}): Promise<PipelineRuntime> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const runId = randomUUID();

  const logger = createJsonConsoleLogger({ runId });
  const database = new MongoPipelineDatabase(env.MONGO_URI, runId, env.MONGO_DB);

  let history: PersistedStatusReport[];
  try {
    history = await database.loadLastRunDetail(env.ORGANIZATION_ID);
  } catch (error) {
    await database.close();
    throw error;
  }

  const config = createPipelineConfig(
    {
      organizationId: env.ORGANIZATION_ID,
      runId,
      primordialDateString: env.PIPELINE_PRIMORDIAL_DATE,
      runUntilTS: options.runUntilTS ?? Date.now(),
      isLocalTesting: runtime.isLocalTesting,
      inputConfig: options.inputConfig,
      parsedConfig: {
        mongoDb: env.MONGO_DB,
        primordialDateString: env.PIPELINE_PRIMORDIAL_DATE,
        maxWritePartitions: runtime.sizeHints.maxWritePartitions,
        isLocalTesting: runtime.isLocalTesting
      },
      initialSessionConf: options.initialSessionConf
    },
    history
  );

  const context: ExecutionContext = {
    config,
    logger,
    session: createSessionOverrides(config.initialSessionConf),
    database,
    postProcessor: new MongoPostProcessor(database, logger),
    schemas: createStaticSchemaRegistry(options.schemas ?? {}),
    datasets: inMemoryDatasets,
    sizeHints: runtime.sizeHints,
    debug: runtime.debug,
    clock: Date.now
  };

  return { context, close: () => database.close() };
};

/** Latest status report per module for the configured organization. */
export const runStatusReport = async (): Promise<PersistedStatusReport[]> => {
  const env = loadEnv();
  const database = new MongoPipelineDatabase(env.MONGO_URI, "status-report", env.MONGO_DB);

  try {
    return await database.loadLastRunDetail(env.ORGANIZATION_ID);
  } finally {
    await database.close();
  }
};
