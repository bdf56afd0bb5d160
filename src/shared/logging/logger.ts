export type LogFields = Record<string, unknown>;

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export const toErrorCause = (reason: unknown): string | undefined => {
  if (!(reason instanceof Error)) return undefined;
  const cause = reason.cause;
  return cause == null ? undefined : toErrorMessage(cause);
};

/**
 * One JSON object per line, `event` first.
 */
export const createJsonConsoleLogger = (base: LogFields = {}): Logger => {
  const emit = (level: LogLevel, event: string, fields: LogFields = {}) => {
    const line = JSON.stringify({ event, level, ...base, ...fields });
    // eslint-disable-next-line no-console
    if (level === "error") console.error(line);
    // eslint-disable-next-line no-console
    else if (level === "warn") console.warn(line);
    // eslint-disable-next-line no-console
    else console.log(line);
  };

  return {
    info: (event, fields) => emit("info", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    error: (event, fields) => emit("error", event, fields)
  };
};
