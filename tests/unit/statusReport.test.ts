import {
  failedStatus,
  isFailedStatus,
  isModuleStatus,
  toPersistedReport
} from "../../src/core/report/StatusReport";
import { makeHistoryReport } from "./support/testContext";

describe("StatusReport", () => {
  it("composes the failed status from rollback outcome and message", () => {
    expect(failedStatus("ROLLBACK SUCCESSFUL", "disk full")).toBe("FAILED --> ROLLBACK SUCCESSFUL: ERROR:disk full");
    expect(failedStatus("ROLLBACK FAILED", "disk full")).toBe("FAILED --> ROLLBACK FAILED: ERROR:disk full");
  });

  it.each([
    ["SUCCESS", true],
    ["EMPTY", true],
    ["FAILED --> ROLLBACK FAILED: ERROR:x", true],
    ["FAILED", false],
    ["success", false],
    [42, false]
  ])("recognizes %p as module status: %p", (value, expected) => {
    expect(isModuleStatus(value)).toBe(expected);
  });

  it("detects failed statuses", () => {
    expect(isFailedStatus("FAILED --> ROLLBACK SUCCESSFUL: ERROR:x")).toBe(true);
    expect(isFailedStatus("EMPTY")).toBe(false);
  });

  it("keys persisted rows by run", () => {
    const report = makeHistoryReport();

    expect(toPersistedReport(report, "run-9", 123)).toEqual({ ...report, run_id: "run-9", pipeline_snap_ts: 123 });
  });
});
