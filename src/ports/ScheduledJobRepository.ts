import type { JobStatus, NewScheduledJob, ScheduledJob } from "../core/jobs/ScheduledJob";
import type { LocalDateTime } from "../core/time/localDateTime";

export type StatusUpdate = {
  now: LocalDateTime;
  errorMessage?: string;
};

export type ScheduledJobFilter = Partial<{
  status: JobStatus;
  profileRef: string;
  listingRef: string;
}>;

/** Fields an explicit reschedule may change on a pending job. */
export type RescheduleChange = Partial<Pick<ScheduledJob, "scheduledAt" | "nextRunAt" | "recurrence">>;

export type StoreHealth = {
  serverTime?: Date;
};

/**
 * Durable schedule store. Every call reads through to the datastore; nothing is cached.
 */
export interface ScheduledJobRepository {
  /** Pending jobs with `nextRunAt <= before`, earliest first. */
  listDue(before: LocalDateTime): Promise<ScheduledJob[]>;
  /**
   * Single conditional update from one of `allowedPreviousStatuses[next]`.
   * Rejects with `NotFoundError` when the job is gone or in another status.
   */
  updateStatus(id: string, next: JobStatus, update: StatusUpdate): Promise<ScheduledJob>;
  /**
   * Moves `running` jobs started at or before `startedBefore` to `failed`. Rows without
   * `startedAt` are judged by `updatedAt`.
   */
  failStaleRunning(startedBefore: LocalDateTime, errorMessage: string, now: LocalDateTime): Promise<ScheduledJob[]>;
  insert(job: NewScheduledJob, now: LocalDateTime): Promise<string>;
  get(id: string): Promise<ScheduledJob | null>;
  listAll(filter?: ScheduledJobFilter): Promise<ScheduledJob[]>;
  nextPending(): Promise<ScheduledJob | null>;
  countByStatus(): Promise<Record<JobStatus, number>>;
  /** Rejects with `NotFoundError` when nothing was deleted. */
  delete(id: string): Promise<void>;
  cancel(id: string, now: LocalDateTime): Promise<ScheduledJob>;
  /** Conditional on `pending`; rejects with `NotFoundError` otherwise. */
  reschedule(id: string, change: RescheduleChange, now: LocalDateTime): Promise<ScheduledJob>;
  /** Sets `errorMessage` without changing status, for failures that happen after a job finished. */
  annotate(id: string, errorMessage: string, now: LocalDateTime): Promise<void>;
  ping(): Promise<StoreHealth>;
}
