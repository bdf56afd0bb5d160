export type { ExecutionContext } from "./application/run-module/executionContext";
export type { ModuleOutcome } from "./application/run-module/moduleOutcome";
export { createAppendWriter, type ModuleWriter, type WriteHints } from "./application/run-module/appendWriter";
export { defineModule, executeModule, type ModuleDefinition } from "./application/run-module/moduleExecutor";
export { finishPipeline } from "./application/run-module/finishPipeline";
export { ModuleFatalError, StatusReportWriteError, WriteFailureError } from "./application/run-module/module.error-handler";
export { SchemaValidationError } from "./core/dataset/dataset.types";
export type { RequiredColumn, RequiredSchema, Row } from "./core/dataset/dataset.types";
export type { Module, WatermarkPolicy } from "./core/module/module.types";
export type { PipelineTarget, RecordCountPolicy } from "./core/module/target.types";
export { getLastOptimized, needsOptimize } from "./core/optimize/optimizeScheduler";
export type { ModuleStatus, PersistedStatusReport, StatusReport } from "./core/report/StatusReport";
export { defineStage, type Dataset, type DatasetFactory, type TransformStage } from "./ports/Dataset";
export type { PipelineDatabase } from "./ports/PipelineDatabase";
export type { PostProcessor } from "./ports/PostProcessor";
export { InMemoryDataset, inMemoryDatasets, mapRowsStage } from "./infrastructure/memory/InMemoryDataset";
export { MongoPipelineDatabase } from "./infrastructure/mongo/MongoPipelineDatabase";
export { MongoPostProcessor } from "./infrastructure/mongo/MongoPostProcessor";
export { createPipelineRuntime } from "./composition/root";
