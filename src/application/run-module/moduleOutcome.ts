import type { StatusReport } from "../../core/report/StatusReport";
import type { ModuleFailureCode } from "./module.error-handler";

export type ModuleOutcome =
  | { kind: "success"; report: StatusReport }
  | { kind: "empty"; reason: string; report: StatusReport }
  | { kind: "failure"; code: ModuleFailureCode; message: string; report: StatusReport };
