#!/usr/bin/env node
import { createSchedulerApp, runScheduler } from "../composition/root";

type CliErrorEnvelope = {
  event: "scheduler.failed";
  name: string;
  message: string;
  code?: string;
  status?: number;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "scheduler.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = isRecord(errorRecord.context) ? errorRecord.context : {};
  if (typeof context.status === "number" && Number.isFinite(context.status)) {
    envelope.status = context.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeSchedulerCli = async (): Promise<void> => {
  try {
    const app = createSchedulerApp();
    const requestStop = (signal: NodeJS.Signals) => {
      app.log.info({ event: "scheduler.signal_received", signal });
      app.scheduler.stop().catch((err: unknown) => {
        app.log.error({ event: "scheduler.stop_failed", message: String(err) });
      });
    };
    process.once("SIGINT", requestStop);
    process.once("SIGTERM", requestStop);

    await runScheduler(app);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeSchedulerCli();
}
