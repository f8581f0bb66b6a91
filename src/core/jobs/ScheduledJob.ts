import type { LocalDateTime } from "../time/localDateTime";

export const jobStatuses = ["pending", "running", "completed", "failed", "cancelled"] as const;

export type JobStatus = (typeof jobStatuses)[number];

/**
 * A persisted request to post a listing at/after `nextRunAt`, optionally recurring.
 *
 * Profile fields are a snapshot taken at schedule time so the job stays executable
 * after the source profile is edited or deleted.
 */
export type ScheduledJob = {
  id: string;
  listingRef: string;
  profileRef: string;
  profileDisplayName: string;
  profileFolderPath: string;
  location: string;
  scheduledAt: LocalDateTime;
  nextRunAt: LocalDateTime;
  /** Raw stored policy; resolve with `parseRecurrence` before use. */
  recurrence: string;
  status: JobStatus;
  errorMessage?: string;
  startedAt?: LocalDateTime;
  previousJobId?: string;
  createdAt: LocalDateTime;
  updatedAt: LocalDateTime;
};

export type NewScheduledJob = Omit<ScheduledJob, "id" | "status" | "errorMessage" | "startedAt" | "createdAt" | "updatedAt">;

/**
 * Directed edges of the job state machine, keyed by target status.
 * `pending` is never entered by a transition: recurring follow-ups are inserted as new rows.
 */
export const allowedPreviousStatuses: Record<JobStatus, readonly JobStatus[]> = {
  pending: [],
  running: ["pending"],
  completed: ["running"],
  failed: ["running"],
  cancelled: ["pending"]
};

export const isJobStatus = (value: unknown): value is JobStatus =>
  typeof value === "string" && jobStatuses.some((candidate) => candidate === value);

export const ERROR_MESSAGE_MAX_LENGTH = 500;

export const truncateErrorMessage = (message: string): string =>
  message.length > ERROR_MESSAGE_MAX_LENGTH ? message.slice(0, ERROR_MESSAGE_MAX_LENGTH) : message;
