import type { Collection, Db, Document, MongoClient } from "mongodb";
import type { PipelineTarget } from "../../core/module/target.types";
import { tableFullName } from "../../core/module/target.types";
import type { PersistedStatusReport } from "../../core/report/StatusReport";
import type { Dataset } from "../../ports/Dataset";
import type { CountWindow, PipelineDatabase } from "../../ports/PipelineDatabase";
import { createMongoClient } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";
import { parsePersistedStatusReport } from "./statusReport.schema";

export const STATUS_LOG_COLLECTION = "pipeline_report";

const DAY_MS = 24 * 60 * 60 * 1000;

export class RollbackFailedError extends Error {
  constructor(target: string, detail: string) {
    super(`Rollback of ${target} failed: ${detail}`);
    this.name = "RollbackFailedError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const buildWindowFilter = (window: CountWindow): Document => ({
  [window.epochColumn]: { $gte: window.fromTS, $lt: window.untilTS },
  [window.dateColumn]: { $gte: new Date(window.fromTS - window.lagDays * DAY_MS) }
});

export const latestReportPerModulePipeline = (organizationId: string): Document[] => [
  { $match: { organization_id: organizationId } },
  { $sort: { pipeline_snap_ts: -1 } },
  { $group: { _id: "$moduleID", report: { $first: "$$ROOT" } } },
  { $replaceRoot: { newRoot: "$report" } },
  { $sort: { moduleID: 1 } }
];

/**
 * Targets are collections. Every document this run writes is stamped with
 * `_runId`, which is what rollback removes.
 */
export class MongoPipelineDatabase implements PipelineDatabase {
  private client?: MongoClient;
  private readonly indexed = new Set<string>();

  constructor(
    private readonly mongoUri: string,
    private readonly runId: string,
    private readonly defaultDbName = "pipeline"
  ) {}

  private async getDb(name: string): Promise<Db> {
    if (!this.client) {
      this.client = await createMongoClient(this.mongoUri);
    }
    return this.client.db(name);
  }

  private async getCollection(target: PipelineTarget): Promise<Collection<Document>> {
    const db = await this.getDb(target.database ?? this.defaultDbName);
    const col = db.collection(target.name);

    const key = tableFullName(target);
    if (!this.indexed.has(key)) {
      const plan = target.name === STATUS_LOG_COLLECTION ? mongoIndexes.statusLog : mongoIndexes.target;
      for (const idx of plan) {
        await col.createIndex(idx.keys, idx.options);
      }
      this.indexed.add(key);
    }

    return col;
  }

  async write(dataset: Dataset, target: PipelineTarget): Promise<boolean> {
    const rows = await dataset.collect();
    if (rows.length === 0) return true;

    const col = await this.getCollection(target);
    const docs = rows.map((row) => ({ ...row, _runId: this.runId }));
    const res = await col.insertMany(docs, { ordered: true });
    return res.acknowledged && res.insertedCount === docs.length;
  }

  async rollbackTarget(target: PipelineTarget): Promise<void> {
    const col = await this.getCollection(target);
    const res = await col.deleteMany({ _runId: this.runId });
    if (!res.acknowledged) {
      throw new RollbackFailedError(tableFullName(target), "delete was not acknowledged");
    }
  }

  async countWindow(target: PipelineTarget, window: CountWindow): Promise<number> {
    const col = await this.getCollection(target);
    return col.countDocuments(buildWindowFilter(window));
  }

  async loadLastRunDetail(organizationId: string): Promise<PersistedStatusReport[]> {
    const col = await this.getCollection({
      name: STATUS_LOG_COLLECTION,
      keys: ["organization_id", "run_id"],
      incrementalColumns: ["pipeline_snap_ts"],
      dataFrequency: "milestone"
    });
    const docs = await col.aggregate(latestReportPerModulePipeline(organizationId)).toArray();
    return docs.map((doc) => parsePersistedStatusReport(doc));
  }

  async compact(target: PipelineTarget): Promise<void> {
    const db = await this.getDb(target.database ?? this.defaultDbName);
    await db.command({ compact: target.name });
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.indexed.clear();
  }
}
