import { runStatusReport } from "../composition/root";
import { parseFlag } from "../shared/config/runtime.config";

type ErrorContext = Partial<{
  moduleID: number;
  moduleName: string;
  target: string;
  stage: string;
}>;

type CliErrorEnvelope = {
  event: "status.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  if (typeof value.moduleID === "number" && Number.isFinite(value.moduleID)) {
    sanitizedContext.moduleID = value.moduleID;
  }
  if (typeof value.moduleName === "string") sanitizedContext.moduleName = value.moduleName;
  if (typeof value.target === "string") sanitizedContext.target = value.target;
  if (typeof value.stage === "string") sanitizedContext.stage = value.stage;

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => parseFlag(env.DEBUG);

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "status.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeStatusCli = async (): Promise<void> => {
  try {
    const reports = await runStatusReport();
    for (const report of reports) {
      // eslint-disable-next-line no-console
      console.log(
        JSON.stringify({
          event: "status.module",
          moduleID: report.moduleID,
          moduleName: report.moduleName,
          status: report.status,
          recordsAppended: report.recordsAppended,
          fromTS: report.fromTS,
          untilTS: report.untilTS,
          runId: report.run_id
        })
      );
    }
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeStatusCli();
}
