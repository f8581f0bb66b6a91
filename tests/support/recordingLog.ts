import type { ExecutionLog, LogFields, LogLevel } from "../../src/shared/logging/executionLog";

export type RecordedEntry = LogFields & { level: LogLevel };

export const createRecordingLog = () => {
  const entries: RecordedEntry[] = [];
  const log: ExecutionLog = {
    info: (fields) => entries.push({ ...fields, level: "info" }),
    warn: (fields) => entries.push({ ...fields, level: "warn" }),
    error: (fields) => entries.push({ ...fields, level: "error" })
  };

  return {
    log,
    entries,
    events: () => entries.map((entry) => entry.event),
    find: (event: string) => entries.filter((entry) => entry.event === event)
  };
};
