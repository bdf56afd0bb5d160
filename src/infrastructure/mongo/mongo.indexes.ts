import type { IndexSpecification, CreateIndexesOptions } from "mongodb";

type IndexPlan = { keys: IndexSpecification; options: CreateIndexesOptions };

/**
 * Index plan per collection, applied lazily on first access:
 * - status log lookups by run and by latest report per module
 * - `_runId` on every target so rollback removes one run's documents
 */
export const mongoIndexes: { statusLog: IndexPlan[]; target: IndexPlan[] } = {
  statusLog: [
    { keys: { organization_id: 1, run_id: 1 }, options: { name: "org_run" } },
    { keys: { organization_id: 1, moduleID: 1, pipeline_snap_ts: -1 }, options: { name: "org_module_latest" } }
  ],
  target: [{ keys: { _runId: 1 }, options: { name: "run_id" } }]
};
