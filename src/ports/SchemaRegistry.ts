import type { RequiredSchema } from "../core/dataset/dataset.types";
import type { Module } from "../core/module/module.types";

export interface SchemaRegistry {
  get(module: Module): RequiredSchema;
}
