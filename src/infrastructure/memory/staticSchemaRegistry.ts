import type { RequiredSchema } from "../../core/dataset/dataset.types";
import type { SchemaRegistry } from "../../ports/SchemaRegistry";

const emptySchema: RequiredSchema = { columns: [] };

/** Modules without a registered schema have no minimum requirement. */
export const createStaticSchemaRegistry = (byModuleID: Readonly<Record<number, RequiredSchema>>): SchemaRegistry => ({
  get: (module) => byModuleID[module.moduleID] ?? emptySchema
});
