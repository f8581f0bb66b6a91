import { StoreError, ValidationError } from "../../core/errors";
import { jobStatuses, type JobStatus, type NewScheduledJob, type ScheduledJob } from "../../core/jobs/ScheduledJob";
import { parseRecurrence } from "../../core/jobs/recurrence";
import {
  addMilliseconds,
  compareLocalDateTime,
  parseLocalDateTime,
  toLocalDateTime,
  type LocalDateTime
} from "../../core/time/localDateTime";
import type { RescheduleChange, ScheduledJobFilter, ScheduledJobRepository } from "../../ports/ScheduledJobRepository";

export type SchedulePostInput = {
  listingRef?: unknown;
  profileRef?: unknown;
  profileDisplayName?: unknown;
  profileFolderPath?: unknown;
  location?: unknown;
  scheduledAt?: unknown;
  recurrence?: unknown;
};

export type ReschedulePostInput = {
  scheduledAt?: unknown;
  recurrence?: unknown;
};

export type ScheduleStats = Record<JobStatus, number> & {
  total: number;
  upcomingSevenDays: number;
};

export const fieldLimits = {
  profileDisplayName: 100,
  profileFolderPath: 500,
  location: 200
} as const;

const SEVEN_DAYS_MS = 7 * 24 * 60 * 60 * 1000;

const requiredFields = [
  "listingRef",
  "profileRef",
  "profileDisplayName",
  "profileFolderPath",
  "location",
  "scheduledAt"
] as const;

const readString = (input: SchedulePostInput, field: (typeof requiredFields)[number]): string | undefined => {
  const raw = input[field];
  // Listing and profile ids arrive as numbers from the dashboard.
  if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
  if (typeof raw !== "string") return undefined;
  const trimmed = raw.trim();
  return trimmed === "" ? undefined : trimmed;
};

const parseFutureScheduledAt = (raw: string, now: Date): LocalDateTime => {
  const scheduledAt = parseLocalDateTime(raw, "scheduledAt");
  if (compareLocalDateTime(scheduledAt, toLocalDateTime(now)) <= 0) {
    throw new ValidationError("Scheduled time must be in the future", { field: "scheduledAt" });
  }
  return scheduledAt;
};

export const validateSchedulePostInput = (input: SchedulePostInput, now: Date): NewScheduledJob => {
  const values = new Map<string, string>();
  const missing: string[] = [];
  for (const field of requiredFields) {
    const value = readString(input, field);
    if (value == null) missing.push(field);
    else values.set(field, value);
  }
  if (missing.length > 0) {
    throw new ValidationError(`Missing required fields: ${missing.join(", ")}`, { field: missing[0] });
  }

  const get = (field: (typeof requiredFields)[number]) => values.get(field) ?? "";
  const scheduledAt = parseFutureScheduledAt(get("scheduledAt"), now);

  return {
    listingRef: get("listingRef"),
    profileRef: get("profileRef"),
    profileDisplayName: get("profileDisplayName").slice(0, fieldLimits.profileDisplayName),
    profileFolderPath: get("profileFolderPath").slice(0, fieldLimits.profileFolderPath),
    location: get("location").slice(0, fieldLimits.location),
    scheduledAt,
    nextRunAt: scheduledAt,
    recurrence: parseRecurrence(input.recurrence)
  };
};

/**
 * A new `scheduledAt` also resets `nextRunAt`, which is the one way a lineage's next run may
 * move earlier.
 */
export const validateRescheduleInput = (input: ReschedulePostInput, now: Date): RescheduleChange => {
  const change: RescheduleChange = {};
  if (input.scheduledAt != null) {
    if (typeof input.scheduledAt !== "string" || input.scheduledAt.trim() === "") {
      throw new ValidationError("scheduledAt must be a timestamp string", { field: "scheduledAt" });
    }
    const scheduledAt = parseFutureScheduledAt(input.scheduledAt.trim(), now);
    change.scheduledAt = scheduledAt;
    change.nextRunAt = scheduledAt;
  }
  if (input.recurrence != null) change.recurrence = parseRecurrence(input.recurrence);

  if (change.scheduledAt == null && change.recurrence == null) {
    throw new ValidationError("Nothing to update: provide scheduledAt or recurrence");
  }
  return change;
};

/**
 * Dashboard-facing commands over the schedule store. They never touch the running loop;
 * the next poll picks up whatever they change.
 */
export const createScheduleCommands = (deps: { repo: ScheduledJobRepository; clock?: () => Date }) => {
  const { repo } = deps;
  const clock = deps.clock ?? (() => new Date());

  return {
    schedulePost: async (input: SchedulePostInput): Promise<ScheduledJob> => {
      const now = clock();
      const job = validateSchedulePostInput(input, now);
      const id = await repo.insert(job, toLocalDateTime(now));
      const created = await repo.get(id);
      if (!created) {
        throw new StoreError(`Scheduled job ${id} was not readable after insert`, { jobId: id, operation: "get" });
      }
      return created;
    },

    getPost: (id: string): Promise<ScheduledJob | null> => repo.get(id),

    listPosts: (filter: ScheduledJobFilter = {}): Promise<ScheduledJob[]> => repo.listAll(filter),

    cancelPost: (id: string): Promise<ScheduledJob> => repo.cancel(id, toLocalDateTime(clock())),

    reschedulePost: (id: string, input: ReschedulePostInput): Promise<ScheduledJob> => {
      const now = clock();
      return repo.reschedule(id, validateRescheduleInput(input, now), toLocalDateTime(now));
    },

    deletePost: (id: string): Promise<void> => repo.delete(id),

    getStats: async (): Promise<ScheduleStats> => {
      const now = toLocalDateTime(clock());
      const until = addMilliseconds(now, SEVEN_DAYS_MS);
      const [counts, pending] = await Promise.all([repo.countByStatus(), repo.listAll({ status: "pending" })]);

      const total = jobStatuses.reduce((sum, status) => sum + counts[status], 0);
      const upcomingSevenDays = pending.filter((job) => job.nextRunAt >= now && job.nextRunAt <= until).length;
      return { ...counts, total, upcomingSevenDays };
    }
  };
};

export type ScheduleCommands = ReturnType<typeof createScheduleCommands>;
