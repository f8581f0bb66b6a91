import { ConfigError } from "../errors";
import { addMilliseconds, type LocalDateTime } from "../time/localDateTime";

export const recurrencePolicies = ["none", "daily", "weekly", "monthly"] as const;

export type Recurrence = (typeof recurrencePolicies)[number];

const DAY_MS = 24 * 60 * 60 * 1000;

// "monthly" is a fixed 30 days, not calendar-month arithmetic.
export const recurrenceIntervalMs: Record<Exclude<Recurrence, "none">, number> = {
  daily: DAY_MS,
  weekly: 7 * DAY_MS,
  monthly: 30 * DAY_MS
};

export const isRecurrence = (value: unknown): value is Recurrence =>
  typeof value === "string" && recurrencePolicies.some((candidate) => candidate === value);

export const parseRecurrence = (value: unknown): Recurrence => {
  if (value == null || value === "") return "none";
  if (isRecurrence(value)) return value;
  throw new ConfigError(`Invalid recurrence policy: ${String(value)}. Expected one of ${recurrencePolicies.join("|")}`, {
    field: "recurrence"
  });
};

export const nextOccurrence = (base: LocalDateTime, policy: Recurrence): LocalDateTime | null => {
  if (policy === "none") return null;
  return addMilliseconds(base, recurrenceIntervalMs[policy]);
};
