export type Row = Record<string, unknown>;

export type ColumnType = "string" | "number" | "boolean" | "date" | "object";

export type RequiredColumn = {
  name: string;
  type: ColumnType;
  nullable?: boolean;
};

export type RequiredSchema = {
  columns: RequiredColumn[];
};

export class SchemaValidationError extends Error {
  readonly columns: string[];

  constructor(message: string, columns: string[]) {
    super(message);
    this.name = "SchemaValidationError";
    this.columns = columns;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
