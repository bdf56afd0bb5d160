export const runtimeCaps = {
  maxWritePartitions: { min: 1, max: 10000 }
} as const;

export type SizeHints = {
  /** Partition count assumed when the source cannot report one. */
  defaultSourcePartitions: number;
  maxWritePartitions: number;
};

export type RuntimeConfig = {
  sizeHints: SizeHints;
  isLocalTesting: boolean;
  debug: boolean;
};

export const defaultSizeHints: SizeHints = {
  defaultSourcePartitions: 200,
  maxWritePartitions: 200
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const parseFlag = (raw: string | undefined): boolean => {
  const value = raw?.trim().toLowerCase();
  return value === "1" || value === "true";
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const maxWritePartitions =
    parseOptionalIntInRange(env, "PIPELINE_MAX_WRITE_PARTITIONS", runtimeCaps.maxWritePartitions) ??
    defaultSizeHints.maxWritePartitions;

  return {
    sizeHints: { ...defaultSizeHints, maxWritePartitions },
    isLocalTesting: parseFlag(env.PIPELINE_LOCAL_TESTING),
    debug: parseFlag(env.DEBUG)
  };
};
