import type { RequiredSchema, Row } from "../core/dataset/dataset.types";

/**
 * Narrow view of the dataset engine. Heavy work (transforms, counting,
 * writing) happens behind this interface; every call resolves to a definite
 * result or rejects.
 */
export interface Dataset {
  isEmpty(): Promise<boolean>;
  verifyMinimumSchema(schema: RequiredSchema, enforceNonNull: boolean, debug: boolean): Promise<Dataset>;
  /** Resolves to `undefined` for unbounded (streaming) sources. */
  tryPartitionCount(): Promise<number | undefined>;
  transform(stage: TransformStage): Promise<Dataset>;
  repartition(partitions: number): Promise<Dataset>;
  count(): Promise<number>;
  collect(): Promise<Row[]>;
}

export interface TransformStage {
  readonly name: string;
  apply(dataset: Dataset): Promise<Dataset>;
}

export interface DatasetFactory {
  fromRecords(rows: Row[]): Dataset;
}

export const defineStage = (name: string, apply: (dataset: Dataset) => Promise<Dataset>): TransformStage => ({
  name,
  apply
});
