export type DataFrequency = "milestone" | "daily";

export type DirectCountPolicy = { kind: "direct" };

/**
 * Count from the already-written target instead of re-scanning the source.
 * Used where the source encoding is too costly to read twice.
 */
export type MaterializedCountPolicy = {
  kind: "materialized";
  lagDays: number;
  dateColumn: string;
  epochColumn: string;
};

export type RecordCountPolicy = DirectCountPolicy | MaterializedCountPolicy;

export type PipelineTarget = {
  name: string;
  database?: string;
  keys: string[];
  incrementalColumns: string[];
  dataFrequency: DataFrequency;
  optimizeFrequencyHours?: number;
  writePartitions?: number;
  recordCount?: RecordCountPolicy;
};

export const DEFAULT_TARGET_DATABASE = "pipeline";

export const tableFullName = (target: PipelineTarget): string =>
  `${target.database ?? DEFAULT_TARGET_DATABASE}.${target.name}`;

export const resolveCountPolicy = (target: PipelineTarget): RecordCountPolicy =>
  target.recordCount ?? { kind: "direct" };
