export type Env = {
  MONGO_URI: string;
  MONGO_DB: string;
  ORGANIZATION_ID: string;
  PIPELINE_PRIMORDIAL_DATE: string;
};

const validateMongoUri = (name: string, value: string): string => {
  if (!/^mongodb(\+srv)?:\/\/\S+$/.test(value)) {
    throw new Error(`${name} must be a mongodb:// or mongodb+srv:// connection string. Received: ${value}`);
  }
  return value;
};

const validateDateString = (name: string, value: string): string => {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || Number.isNaN(Date.parse(`${value}T00:00:00.000Z`))) {
    throw new Error(`${name} must be a calendar date formatted as YYYY-MM-DD. Received: ${value}`);
  }
  return value;
};

const requireNonEmpty = (name: string, value: string | undefined): string => {
  const normalized = value?.trim() ?? "";
  if (normalized === "") {
    throw new Error(`${name} is required`);
  }
  return normalized;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = validateMongoUri("MONGO_URI", env.MONGO_URI ?? "mongodb://localhost:27017/pipeline");
  const MONGO_DB = env.MONGO_DB?.trim() || "pipeline";
  const ORGANIZATION_ID = requireNonEmpty("ORGANIZATION_ID", env.ORGANIZATION_ID);
  const PIPELINE_PRIMORDIAL_DATE = validateDateString(
    "PIPELINE_PRIMORDIAL_DATE",
    env.PIPELINE_PRIMORDIAL_DATE?.trim() || "2020-01-01"
  );

  return { MONGO_URI, MONGO_DB, ORGANIZATION_ID, PIPELINE_PRIMORDIAL_DATE };
};
