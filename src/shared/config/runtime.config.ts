import {
  defaultSchedulerConfig,
  type SchedulerConfig,
  validateSchedulerConfig
} from "../../application/scheduler/scheduler.config";

export const runtimeCaps = {
  pollIntervalMs: { min: 1000, max: 3_600_000 },
  dueBufferMs: { min: 0, max: 3_600_000 },
  staleAfterMs: { min: 60_000, max: 86_400_000 },
  agentTimeoutMs: { min: 1000, max: 3_600_000 },
  interJobDelayMs: { min: 0, max: 600_000 }
} as const;

export type RuntimeConfig = {
  schedulerConfig: SchedulerConfig;
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

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const schedulerConfig = validateSchedulerConfig({
    pollIntervalMs:
      parseOptionalIntInRange(env, "SCHEDULER_POLL_INTERVAL_MS", runtimeCaps.pollIntervalMs) ??
      defaultSchedulerConfig.pollIntervalMs,
    dueBufferMs:
      parseOptionalIntInRange(env, "SCHEDULER_DUE_BUFFER_MS", runtimeCaps.dueBufferMs) ??
      defaultSchedulerConfig.dueBufferMs,
    staleAfterMs:
      parseOptionalIntInRange(env, "SCHEDULER_STALE_AFTER_MS", runtimeCaps.staleAfterMs) ??
      defaultSchedulerConfig.staleAfterMs,
    agentTimeoutMs:
      parseOptionalIntInRange(env, "AGENT_TIMEOUT_MS", runtimeCaps.agentTimeoutMs) ??
      defaultSchedulerConfig.agentTimeoutMs,
    interJobDelayMs:
      parseOptionalIntInRange(env, "SCHEDULER_INTER_JOB_DELAY_MS", runtimeCaps.interJobDelayMs) ??
      defaultSchedulerConfig.interJobDelayMs
  });

  return { schedulerConfig };
};
