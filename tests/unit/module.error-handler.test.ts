import {
  classifyPreWriteFailure,
  classifyWriteFailure,
  ModuleFatalError,
  WriteFailureError
} from "../../src/application/run-module/module.error-handler";
import { SchemaValidationError } from "../../src/core/dataset/dataset.types";

const context = { moduleID: 1010, moduleName: "Bronze_AuditLogs", target: "pipeline.audit_log_bronze" };

describe("module.error-handler", () => {
  it("classifies schema verification errors", () => {
    const reason = new SchemaValidationError("Minimum schema verification failed for columns: requestId", ["requestId"]);
    const error = classifyPreWriteFailure(reason, context);

    expect(error).toBeInstanceOf(ModuleFatalError);
    expect(error.code).toBe("schema_validation_failed");
    expect(error.message).toBe("Minimum schema verification failed for columns: requestId");
    expect(error.cause).toBe(reason);
  });

  it("names the stage for transform failures", () => {
    const error = classifyPreWriteFailure(new Error("bad row"), { ...context, stage: "explode" });

    expect(error.code).toBe("transform_failed");
    expect(error.message).toBe("Transform explode failed: bad row");
    expect(error.context).toEqual({ ...context, stage: "explode" });
  });

  it("treats failures outside any stage as unhandled", () => {
    const error = classifyPreWriteFailure("source unreachable", context);

    expect(error.code).toBe("unhandled");
    expect(error.message).toBe("source unreachable");
  });

  it("classifies unacknowledged writes and keeps the innermost cause", () => {
    const writeFailure = classifyWriteFailure(new WriteFailureError("pipeline.audit_log_bronze"), context);
    expect(writeFailure.code).toBe("write_failed");
    expect(writeFailure.message).toBe("Write to pipeline.audit_log_bronze reported failure");

    const driverError = new Error("socket closed");
    const error = classifyWriteFailure(new Error("insert failed", { cause: driverError }), context);
    expect(error.code).toBe("unhandled");
    expect(error.cause).toBe(driverError);
  });

  it("passes module fatal errors through unchanged", () => {
    const original = new ModuleFatalError({ code: "write_failed", message: "x", context });

    expect(classifyWriteFailure(original, context)).toBe(original);
  });
});
