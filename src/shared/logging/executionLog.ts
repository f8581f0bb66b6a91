import { appendFileSync } from "fs";

export type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, unknown> & { event: string };

/**
 * Append-only, line-oriented execution log. Every entry is one JSON object with `ts` and
 * `level` so the file can be tail-followed and grepped by `event`.
 */
export interface ExecutionLog {
  info(fields: LogFields): void;
  warn(fields: LogFields): void;
  error(fields: LogFields): void;
}

export type ExecutionLogOptions = {
  filePath?: string;
  console?: boolean;
  now?: () => Date;
};

export const formatLogLine = (level: LogLevel, fields: LogFields, ts: Date): string =>
  JSON.stringify({ ts: ts.toISOString(), level, ...fields });

export const createExecutionLog = (options: ExecutionLogOptions = {}): ExecutionLog => {
  const { filePath, now = () => new Date() } = options;
  const toConsole = options.console ?? true;
  let fileFailureReported = false;

  const write = (level: LogLevel, fields: LogFields) => {
    const line = formatLogLine(level, fields, now());

    if (toConsole) {
      /* eslint-disable no-console */
      if (level === "error") console.error(line);
      else if (level === "warn") console.warn(line);
      else console.log(line);
      /* eslint-enable no-console */
    }

    if (!filePath) return;
    try {
      appendFileSync(filePath, `${line}\n`, "utf8");
      fileFailureReported = false;
    } catch (err) {
      // Report once per outage; the loop keeps running on console logging.
      if (!fileFailureReported) {
        fileFailureReported = true;
        // eslint-disable-next-line no-console
        console.error(
          formatLogLine("error", { event: "log.append_failed", filePath, message: String(err) }, now())
        );
      }
    }
  };

  return {
    info: (fields) => write("info", fields),
    warn: (fields) => write("warn", fields),
    error: (fields) => write("error", fields)
  };
};
