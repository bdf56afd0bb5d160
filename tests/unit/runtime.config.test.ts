import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("runtime config", () => {
  it("defaults to production mode with the default size hints", () => {
    expect(loadRuntimeConfigFromEnv({})).toEqual({
      sizeHints: { defaultSourcePartitions: 200, maxWritePartitions: 200 },
      isLocalTesting: false,
      debug: false
    });
  });

  it("accepts boundary values and flags", () => {
    const runtime = loadRuntimeConfigFromEnv({
      PIPELINE_MAX_WRITE_PARTITIONS: "10000",
      PIPELINE_LOCAL_TESTING: "true",
      DEBUG: "1"
    });

    expect(runtime).toEqual({
      sizeHints: { defaultSourcePartitions: 200, maxWritePartitions: 10000 },
      isLocalTesting: true,
      debug: true
    });
  });

  it.each([
    { raw: "0", message: "PIPELINE_MAX_WRITE_PARTITIONS=0 is out of allowed range [1..10000]" },
    { raw: "10001", message: "PIPELINE_MAX_WRITE_PARTITIONS=10001 is out of allowed range [1..10000]" },
    { raw: "2.5", message: "PIPELINE_MAX_WRITE_PARTITIONS=2.5 is out of allowed range [1..10000]" }
  ])("rejects out-of-range config: $message", ({ raw, message }) => {
    expect(() => loadRuntimeConfigFromEnv({ PIPELINE_MAX_WRITE_PARTITIONS: raw })).toThrow(message);
  });

  it("treats anything but 1/true as off", () => {
    expect(loadRuntimeConfigFromEnv({ PIPELINE_LOCAL_TESTING: "yes", DEBUG: "0" })).toMatchObject({
      isLocalTesting: false,
      debug: false
    });
  });
});
