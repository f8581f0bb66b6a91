import { ConfigError } from "../../core/errors";

export type SchedulerConfig = {
  pollIntervalMs: number;
  dueBufferMs: number;
  staleAfterMs: number;
  agentTimeoutMs: number;
  interJobDelayMs: number;
};

export type SchedulerConfigInput = Partial<SchedulerConfig>;

export const defaultSchedulerConfig: SchedulerConfig = {
  pollIntervalMs: 60_000,
  dueBufferMs: 2 * 60_000,
  staleAfterMs: 15 * 60_000,
  agentTimeoutMs: 10 * 60_000,
  interJobDelayMs: 5_000
};

// Code-level bounds. Env-level caps in runtime.config are stricter.
export const schedulerCaps = {
  pollIntervalMs: { min: 1, max: 24 * 60 * 60_000 },
  dueBufferMs: { min: 0, max: 24 * 60 * 60_000 },
  staleAfterMs: { min: 1, max: 7 * 24 * 60 * 60_000 },
  agentTimeoutMs: { min: 1, max: 24 * 60 * 60_000 },
  interJobDelayMs: { min: 0, max: 60 * 60_000 }
} as const;

const schedulerConfigKeys: ReadonlyArray<keyof SchedulerConfig> = [
  "pollIntervalMs",
  "dueBufferMs",
  "staleAfterMs",
  "agentTimeoutMs",
  "interJobDelayMs"
];

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name}=${String(value)} is out of allowed range [${min}..${max}]`, { field: name });
  }
};

export const validateSchedulerConfig = (config: SchedulerConfig): SchedulerConfig => {
  for (const key of schedulerConfigKeys) {
    assertIntegerInRange(key, config[key], schedulerCaps[key].min, schedulerCaps[key].max);
  }

  // A job still inside its agent timeout must never look stale to another loop.
  if (config.staleAfterMs <= config.agentTimeoutMs) {
    throw new ConfigError(
      `staleAfterMs=${config.staleAfterMs} must be greater than agentTimeoutMs=${config.agentTimeoutMs}`,
      { field: "staleAfterMs" }
    );
  }

  return config;
};

export const resolveSchedulerConfig = (input: SchedulerConfigInput = {}): SchedulerConfig =>
  validateSchedulerConfig({
    pollIntervalMs: input.pollIntervalMs ?? defaultSchedulerConfig.pollIntervalMs,
    dueBufferMs: input.dueBufferMs ?? defaultSchedulerConfig.dueBufferMs,
    staleAfterMs: input.staleAfterMs ?? defaultSchedulerConfig.staleAfterMs,
    agentTimeoutMs: input.agentTimeoutMs ?? defaultSchedulerConfig.agentTimeoutMs,
    interJobDelayMs: input.interJobDelayMs ?? defaultSchedulerConfig.interJobDelayMs
  });
