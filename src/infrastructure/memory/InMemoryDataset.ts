import { z } from "zod";
import type { ColumnType, RequiredColumn, RequiredSchema, Row } from "../../core/dataset/dataset.types";
import { SchemaValidationError } from "../../core/dataset/dataset.types";
import type { Dataset, DatasetFactory, TransformStage } from "../../ports/Dataset";

const columnValidator = (type: ColumnType): z.ZodTypeAny => {
  switch (type) {
    case "string":
      return z.string();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
    case "date":
      return z.date();
    case "object":
      return z.record(z.unknown());
  }
};

const buildRowSchema = (columns: RequiredColumn[], enforceNonNull: boolean) => {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const column of columns) {
    const base = columnValidator(column.type);
    shape[column.name] = enforceNonNull && !column.nullable ? base : base.nullable().optional();
  }
  return z.object(shape).passthrough();
};

/**
 * Array-backed dataset. A dataset built without a partition count behaves as
 * a streaming source: it cannot report its partitioning.
 */
export class InMemoryDataset implements Dataset {
  constructor(
    private readonly rows: readonly Row[],
    private readonly partitions?: number
  ) {}

  static of(rows: readonly Row[], partitions = 1): InMemoryDataset {
    return new InMemoryDataset(rows, partitions);
  }

  static streaming(rows: readonly Row[]): InMemoryDataset {
    return new InMemoryDataset(rows);
  }

  async isEmpty(): Promise<boolean> {
    return this.rows.length === 0;
  }

  async verifyMinimumSchema(schema: RequiredSchema, enforceNonNull: boolean, debug: boolean): Promise<Dataset> {
    const rowSchema = buildRowSchema(schema.columns, enforceNonNull);
    const failedColumns = new Set<string>();
    let firstIssue: string | undefined;

    for (const [index, row] of this.rows.entries()) {
      const result = rowSchema.safeParse(row);
      if (result.success) continue;
      for (const issue of result.error.issues) {
        failedColumns.add(String(issue.path[0] ?? "<row>"));
        if (firstIssue === undefined) firstIssue = `row ${index}: ${issue.path.join(".")} ${issue.message}`;
      }
    }

    if (failedColumns.size > 0) {
      const columns = Array.from(failedColumns).sort();
      const detail = debug && firstIssue !== undefined ? ` (${firstIssue})` : "";
      throw new SchemaValidationError(`Minimum schema verification failed for columns: ${columns.join(", ")}${detail}`, columns);
    }

    const nullable = schema.columns.filter((column) => column.nullable || !enforceNonNull);
    const filled = this.rows.map((row) => {
      const next: Row = { ...row };
      for (const column of nullable) {
        if (!(column.name in next)) next[column.name] = null;
      }
      return next;
    });
    return new InMemoryDataset(filled, this.partitions);
  }

  async tryPartitionCount(): Promise<number | undefined> {
    return this.partitions;
  }

  transform(stage: TransformStage): Promise<Dataset> {
    return stage.apply(this);
  }

  async repartition(partitions: number): Promise<Dataset> {
    return new InMemoryDataset(this.rows, partitions);
  }

  async count(): Promise<number> {
    return this.rows.length;
  }

  async collect(): Promise<Row[]> {
    return this.rows.map((row) => ({ ...row }));
  }
}

export const inMemoryDatasets: DatasetFactory = {
  fromRecords: (rows) => InMemoryDataset.of(rows)
};

/** Transform stage over the rows of any dataset; the result is held in memory. */
export const mapRowsStage = (name: string, fn: (row: Row) => Row | undefined): TransformStage => ({
  name,
  apply: async (dataset) => {
    const rows = await dataset.collect();
    const partitions = await dataset.tryPartitionCount();
    const mapped = rows.flatMap((row) => {
      const next = fn(row);
      return next === undefined ? [] : [next];
    });
    return new InMemoryDataset(mapped, partitions);
  }
});
