import { SchemaValidationError } from "../../core/dataset/dataset.types";
import { toErrorMessage } from "../../shared/logging/logger";

export type ModuleFailureCode = "schema_validation_failed" | "transform_failed" | "write_failed" | "unhandled";

export type ModuleErrorContext = {
  moduleID: number;
  moduleName: string;
  target?: string;
  stage?: string;
};

export class ModuleFatalError extends Error {
  readonly code: ModuleFailureCode;
  readonly context: ModuleErrorContext;

  constructor(args: { code: ModuleFailureCode; message: string; context: ModuleErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "ModuleFatalError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when the storage layer acknowledges less than the full write. */
export class WriteFailureError extends Error {
  readonly target: string;

  constructor(target: string) {
    super(`Write to ${target} reported failure`);
    this.name = "WriteFailureError";
    this.target = target;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class StatusReportWriteError extends Error {
  readonly moduleID: number;

  constructor(moduleID: number, status: string) {
    super(`Status report for module ${moduleID} (${status}) was not persisted`);
    this.name = "StatusReportWriteError";
    this.moduleID = moduleID;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const unwrapCause = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

/**
 * Failure raised before the write step. `context.stage` names the transform
 * stage that was running, if any.
 */
export const classifyPreWriteFailure = (reason: unknown, context: ModuleErrorContext): ModuleFatalError => {
  if (reason instanceof SchemaValidationError) {
    return new ModuleFatalError({
      code: "schema_validation_failed",
      message: reason.message,
      context,
      cause: reason
    });
  }

  if (context.stage) {
    return new ModuleFatalError({
      code: "transform_failed",
      message: `Transform ${context.stage} failed: ${toErrorMessage(reason)}`,
      context,
      cause: unwrapCause(reason)
    });
  }

  return new ModuleFatalError({
    code: "unhandled",
    message: toErrorMessage(reason),
    context,
    cause: unwrapCause(reason)
  });
};

export const classifyWriteFailure = (reason: unknown, context: ModuleErrorContext): ModuleFatalError => {
  if (reason instanceof ModuleFatalError) return reason;

  const code: ModuleFailureCode = reason instanceof WriteFailureError ? "write_failed" : "unhandled";
  return new ModuleFatalError({
    code,
    message: toErrorMessage(reason),
    context,
    cause: unwrapCause(reason)
  });
};
