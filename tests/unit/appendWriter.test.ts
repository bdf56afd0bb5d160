import { createAppendWriter } from "../../src/application/run-module/appendWriter";
import { finishPipeline } from "../../src/application/run-module/finishPipeline";
import { computeWritePartitions, SHUFFLE_PARTITIONS_KEY } from "../../src/application/run-module/writePartitions";
import type { Module } from "../../src/core/module/module.types";
import type { PipelineTarget } from "../../src/core/module/target.types";
import { InMemoryDataset } from "../../src/infrastructure/memory/InMemoryDataset";
import { defaultSizeHints } from "../../src/shared/config/runtime.config";
import {
  auditTarget,
  createRecordingDatabase,
  createTestContext,
  DAY_MS,
  makeHistoryReport,
  NOW,
  RUN_UNTIL_TS
} from "./support/testContext";

const auditModule: Module = { moduleID: 1010, moduleName: "Bronze_AuditLogs" };
const rows = [{ requestId: "r1" }, { requestId: "r2" }];

describe("createAppendWriter", () => {
  it("schedules optimize when the module was last optimized ten days ago", async () => {
    const { ctx, recordingPost } = createTestContext({
      history: [makeHistoryReport({ lastOptimizedTS: NOW - 10 * DAY_MS })]
    });

    const outcome = await createAppendWriter(ctx, auditTarget).write(InMemoryDataset.of(rows, 2), auditModule, {
      sourcePartitions: 2
    });

    expect(outcome.kind).toBe("success");
    expect(outcome.report.lastOptimizedTS).toBe(RUN_UNTIL_TS);
    expect(recordingPost.marked).toEqual(["pipeline.audit_log_bronze"]);
  });

  it("carries lastOptimizedTS forward when the module was optimized yesterday", async () => {
    const { ctx, recordingPost } = createTestContext({ history: [makeHistoryReport({ lastOptimizedTS: NOW - DAY_MS })] });

    const outcome = await createAppendWriter(ctx, auditTarget).write(InMemoryDataset.of(rows), auditModule, {
      sourcePartitions: 1
    });

    expect(outcome.report.lastOptimizedTS).toBe(NOW - DAY_MS);
    expect(recordingPost.marked).toEqual([]);
  });

  it("never schedules optimize in local testing mode, even on the first run", async () => {
    const { ctx, recordingPost } = createTestContext({ isLocalTesting: true });

    const outcome = await createAppendWriter(ctx, auditTarget).write(InMemoryDataset.of(rows), auditModule, {
      sourcePartitions: 1
    });

    expect(outcome.report.lastOptimizedTS).toBe(0);
    expect(recordingPost.marked).toEqual([]);
  });

  it("keeps the seven-day threshold when the target carries an optimize frequency hint", async () => {
    const { ctx, recordingPost } = createTestContext({
      history: [makeHistoryReport({ lastOptimizedTS: NOW - 2 * DAY_MS })]
    });
    const target: PipelineTarget = { ...auditTarget, optimizeFrequencyHours: 24 };

    const outcome = await createAppendWriter(ctx, target).write(InMemoryDataset.of(rows), auditModule, {
      sourcePartitions: 1
    });

    expect(outcome.report.lastOptimizedTS).toBe(NOW - 2 * DAY_MS);
    expect(recordingPost.marked).toEqual([]);
  });

  it("does not mark the target for optimize when the SUCCESS report cannot be stored", async () => {
    const db = createRecordingDatabase({ rejectFirstReport: true });
    const { ctx, recordingPost } = createTestContext({
      history: [makeHistoryReport({ lastOptimizedTS: NOW - 10 * DAY_MS })],
      database: db.database
    });

    const outcome = await createAppendWriter(ctx, auditTarget).write(InMemoryDataset.of(rows), auditModule, {
      sourcePartitions: 1
    });

    expect(outcome.kind).toBe("failure");
    expect(outcome.report.lastOptimizedTS).toBe(NOW - 10 * DAY_MS);
    expect(db.calls).toEqual(["write", "report", "rollback", "report"]);
    expect(recordingPost.marked).toEqual([]);
  });

  it("counts from the written table for targets with a materialized count policy", async () => {
    const db = createRecordingDatabase({ windowCount: 42 });
    const { ctx } = createTestContext({ history: [makeHistoryReport()], database: db.database });
    const target: PipelineTarget = {
      ...auditTarget,
      name: "spark_events_bronze",
      recordCount: { kind: "materialized", lagDays: 2, dateColumn: "fileCreateDate", epochColumn: "fileCreateEpochMS" }
    };

    const outcome = await createAppendWriter(ctx, target).write(InMemoryDataset.of(rows), auditModule, {
      sourcePartitions: 1
    });

    expect(outcome.report.recordsAppended).toBe(42);
    expect(db.windows).toEqual([
      {
        fromTS: RUN_UNTIL_TS - DAY_MS,
        untilTS: RUN_UNTIL_TS,
        lagDays: 2,
        dateColumn: "fileCreateDate",
        epochColumn: "fileCreateEpochMS"
      }
    ]);
  });

  it("applies the partition override for the write and restores the session afterwards", async () => {
    const { ctx } = createTestContext({
      history: [makeHistoryReport()],
      initialSessionConf: { [SHUFFLE_PARTITIONS_KEY]: "64", "broadcast.threshold": "10m" }
    });
    const recording = createRecordingDatabase();
    const seen: Array<string | undefined> = [];
    ctx.database = {
      ...recording.database,
      write: async (dataset, target) => {
        seen.push(ctx.session.get(SHUFFLE_PARTITIONS_KEY));
        return recording.database.write(dataset, target);
      }
    };

    await createAppendWriter(ctx, auditTarget).write(InMemoryDataset.of(rows, 8), auditModule, { sourcePartitions: 8 });

    expect(seen).toEqual(["8", "64"]);
    expect(ctx.session.snapshot()).toEqual({ [SHUFFLE_PARTITIONS_KEY]: "64", "broadcast.threshold": "10m" });
  });

  it("leaves the session override in place on the failure path", async () => {
    const db = createRecordingDatabase({ writeResult: false });
    const { ctx } = createTestContext({ database: db.database, initialSessionConf: { [SHUFFLE_PARTITIONS_KEY]: "64" } });

    await createAppendWriter(ctx, auditTarget).write(InMemoryDataset.of(rows, 8), auditModule, { sourcePartitions: 8 });

    expect(ctx.session.get(SHUFFLE_PARTITIONS_KEY)).toBe("8");
  });

  it("routes unexpected write errors to the failure path with message and cause logged", async () => {
    const db = createRecordingDatabase({ writeError: new Error("disk full", { cause: new Error("quota") }) });
    const { ctx, log } = createTestContext({ database: db.database });

    const outcome = await createAppendWriter(ctx, auditTarget).write(InMemoryDataset.of(rows), auditModule, {
      sourcePartitions: 1
    });

    expect(outcome).toMatchObject({ kind: "failure", code: "unhandled", message: "disk full" });
    expect(outcome.report.status).toBe("FAILED --> ROLLBACK SUCCESSFUL: ERROR:disk full");
    const appendFailed = log.entries.find((entry) => entry.event === "module.append_failed");
    expect(appendFailed?.fields).toEqual({
      moduleID: 1010,
      moduleName: "Bronze_AuditLogs",
      target: "pipeline.audit_log_bronze",
      code: "unhandled",
      message: "disk full",
      cause: "quota"
    });
    expect(db.calls).toEqual(["write", "rollback", "report"]);
  });
});

describe("computeWritePartitions", () => {
  it("follows the source partitioning within the session ceiling", () => {
    expect(computeWritePartitions(8, auditTarget, defaultSizeHints)).toBe(8);
    expect(computeWritePartitions(500, auditTarget, defaultSizeHints)).toBe(200);
    expect(computeWritePartitions(0, auditTarget, defaultSizeHints)).toBe(1);
  });

  it("prefers a fixed hint on the target", () => {
    expect(computeWritePartitions(8, { ...auditTarget, writePartitions: 16 }, defaultSizeHints)).toBe(16);
  });
});

describe("finishPipeline", () => {
  it("optimizes marked targets and resets session overrides", async () => {
    const { ctx, recordingPost, log } = createTestContext({ initialSessionConf: { [SHUFFLE_PARTITIONS_KEY]: "64" } });
    ctx.session.set(SHUFFLE_PARTITIONS_KEY, "8");

    await finishPipeline(ctx);

    expect(recordingPost.optimizeCalls()).toBe(1);
    expect(ctx.session.snapshot()).toEqual({ [SHUFFLE_PARTITIONS_KEY]: "64" });
    expect(log.events()).toEqual(["pipeline.post_processing_completed"]);
  });
});
