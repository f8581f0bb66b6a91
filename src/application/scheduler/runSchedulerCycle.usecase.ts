import { randomUUID } from "crypto";
import { AgentExecutionError, ConfigError, StoreError, ValidationError } from "../../core/errors";
import type { ScheduledJob } from "../../core/jobs/ScheduledJob";
import { nextOccurrence, parseRecurrence, type Recurrence } from "../../core/jobs/recurrence";
import { addMilliseconds, toLocalDateTime, type LocalDateTime } from "../../core/time/localDateTime";
import type { ExecutionAgent, ExecutionRequest } from "../../ports/ExecutionAgent";
import type { PostHistoryRepository } from "../../ports/PostHistoryRepository";
import type { ScheduledJobRepository } from "../../ports/ScheduledJobRepository";
import type { KeyedLock } from "../../shared/concurrency/limiter";
import { sleep } from "../../shared/concurrency/sleep";
import { withTimeout } from "../../shared/concurrency/timeout";
import type { ExecutionLog } from "../../shared/logging/executionLog";
import { retry } from "../../shared/retry/retry";
import type { SchedulerConfig } from "./scheduler.config";
import {
  agentTimeoutError,
  classifyJobFailure,
  createCycleSummaryTracker,
  followUpFailedMessage,
  isExpectedRace,
  staleJobErrorMessage,
  wrapStoreFailure,
  type CycleSummary,
  type JobOutcome
} from "./scheduler.error-handler";

export type StoreRetryPolicy = {
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
};

export const defaultStoreRetryPolicy: StoreRetryPolicy = { retries: 2, minDelayMs: 500, maxDelayMs: 5000 };

export type SchedulerCycleDeps = {
  repo: ScheduledJobRepository;
  agent: ExecutionAgent;
  log: ExecutionLog;
  config: SchedulerConfig;
  profileLock: KeyedLock;
  history?: PostHistoryRepository;
  clock?: () => Date;
  /** Aborted on stop: no new job is started once it fires, the job in flight finishes. */
  signal?: AbortSignal;
  /** Polled before each job, next to `signal`, for stop requests made outside this process. */
  isStopRequested?: () => boolean;
  storeRetry?: StoreRetryPolicy;
};

type CycleContext = SchedulerCycleDeps & {
  clock: () => Date;
  storeRetry: StoreRetryPolicy;
};

const withStoreRetry = <T>(ctx: CycleContext, operation: string, fn: () => Promise<T>, signal?: AbortSignal) =>
  retry(fn, {
    ...ctx.storeRetry,
    signal,
    shouldRetry: (err) => err instanceof StoreError,
    onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
      ctx.log.warn({ event: "store.retry", operation, attempt, maxAttempts, delayMs, message: String(error) });
    }
  });

const stopRequested = (ctx: CycleContext): boolean => Boolean(ctx.signal?.aborted) || (ctx.isStopRequested?.() ?? false);

const localNow = (ctx: CycleContext): LocalDateTime => toLocalDateTime(ctx.clock());

const requireField = (job: ScheduledJob, field: keyof ExecutionRequest & keyof ScheduledJob): string => {
  const value = job[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`Scheduled job ${job.id} is missing ${field}`, { jobId: job.id, field });
  }
  return value;
};

export const buildExecutionRequest = (job: ScheduledJob): ExecutionRequest => ({
  jobId: job.id,
  listingRef: requireField(job, "listingRef"),
  profileRef: requireField(job, "profileRef"),
  profileFolderPath: requireField(job, "profileFolderPath"),
  location: requireField(job, "location"),
  profileDisplayName: job.profileDisplayName
});

const resolveRecurrence = (ctx: CycleContext, job: ScheduledJob): Recurrence => {
  try {
    return parseRecurrence(job.recurrence);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    ctx.log.warn({ event: "job.recurrence_invalid", jobId: job.id, recurrence: job.recurrence, message: err.message });
    return "none";
  }
};

const sweepStaleJobs = async (ctx: CycleContext, now: LocalDateTime): Promise<number> => {
  const startedBefore = addMilliseconds(now, -ctx.config.staleAfterMs);
  const swept = await withStoreRetry(ctx, "failStaleRunning", () =>
    ctx.repo.failStaleRunning(startedBefore, staleJobErrorMessage(ctx.config.staleAfterMs), now)
  );
  for (const job of swept) {
    ctx.log.warn({ event: "scheduler.stale_swept", jobId: job.id, startedAt: job.startedAt ?? null });
  }
  return swept.length;
};

const recordHistory = async (ctx: CycleContext, job: ScheduledJob) => {
  if (!ctx.history) return;
  try {
    await ctx.history.record({
      _id: randomUUID(),
      jobId: job.id,
      listingRef: job.listingRef,
      profileRef: job.profileRef,
      profileDisplayName: job.profileDisplayName,
      status: "completed",
      recordedAt: ctx.clock()
    });
  } catch (err) {
    ctx.log.warn({ event: "history.record_failed", jobId: job.id, message: String(err) });
  }
};

type RescheduleOutcome = "none" | "rescheduled" | "failed";

// The completed row is the only trace of a lineage whose follow-up was lost.
const annotateLostFollowUp = async (ctx: CycleContext, job: ScheduledJob, next: LocalDateTime, reason: unknown) => {
  const errorMessage = followUpFailedMessage(next, reason);
  ctx.log.error({ event: "job.reschedule_failed", jobId: job.id, nextRunAt: next, message: errorMessage });
  try {
    await withStoreRetry(ctx, "annotate", () => ctx.repo.annotate(job.id, errorMessage, localNow(ctx)));
  } catch (err) {
    ctx.log.error({ event: "job.record_failed", jobId: job.id, status: "completed", message: String(err) });
  }
};

const rescheduleJob = async (ctx: CycleContext, job: ScheduledJob, recurrence: Recurrence): Promise<RescheduleOutcome> => {
  // Computed from the occurrence just run, not from the wall clock, so the lineage does not drift.
  const next = nextOccurrence(job.nextRunAt, recurrence);
  if (next == null) return "none";

  try {
    const followUpJobId = await withStoreRetry(ctx, "insert", () =>
      ctx.repo.insert(
        {
          listingRef: job.listingRef,
          profileRef: job.profileRef,
          profileDisplayName: job.profileDisplayName,
          profileFolderPath: job.profileFolderPath,
          location: job.location,
          scheduledAt: next,
          nextRunAt: next,
          recurrence,
          previousJobId: job.id
        },
        localNow(ctx)
      )
    );
    ctx.log.info({ event: "job.rescheduled", jobId: job.id, followUpJobId, nextRunAt: next, recurrence });
    return "rescheduled";
  } catch (err) {
    await annotateLostFollowUp(ctx, job, next, err);
    return "failed";
  }
};

const completeJob = async (
  ctx: CycleContext,
  job: ScheduledJob,
  recurrence: Recurrence,
  tracker: ReturnType<typeof createCycleSummaryTracker>
): Promise<JobOutcome> => {
  try {
    await withStoreRetry(ctx, "updateStatus", () => ctx.repo.updateStatus(job.id, "completed", { now: localNow(ctx) }));
  } catch (err) {
    // The post went out but the record did not move; the stale sweep will surface it.
    ctx.log.error({ event: "job.record_failed", jobId: job.id, status: "completed", message: String(err) });
    return "failed";
  }

  ctx.log.info({ event: "job.completed", jobId: job.id, listingRef: job.listingRef, profileRef: job.profileRef });
  await recordHistory(ctx, job);
  const rescheduled = await rescheduleJob(ctx, job, recurrence);
  if (rescheduled === "rescheduled") tracker.addRescheduled();
  if (rescheduled === "failed") tracker.addRescheduleFailed();
  return "completed";
};

const failJob = async (ctx: CycleContext, job: ScheduledJob, reason: unknown): Promise<JobOutcome> => {
  const failure = classifyJobFailure(reason);
  try {
    await withStoreRetry(ctx, "updateStatus", () =>
      ctx.repo.updateStatus(job.id, "failed", { now: localNow(ctx), errorMessage: failure.errorMessage })
    );
  } catch (err) {
    ctx.log.error({ event: "job.record_failed", jobId: job.id, status: "failed", message: String(err) });
  }

  ctx.log.error({ event: "job.failed", jobId: job.id, code: failure.code, errorMessage: failure.errorMessage });
  return "failed";
};

const executeJob = async (ctx: CycleContext, job: ScheduledJob): Promise<void> => {
  const request = buildExecutionRequest(job);
  const result = await ctx.profileLock.run(job.profileRef, () =>
    withTimeout(
      (signal) => ctx.agent.execute(request, signal),
      ctx.config.agentTimeoutMs,
      () => agentTimeoutError(job.id, ctx.config.agentTimeoutMs)
    )
  );

  if (!result.success) {
    const message = result.errorMessage?.trim();
    throw new AgentExecutionError(message ? message : "Execution agent reported failure", { jobId: job.id });
  }
};

const processDueJob = async (
  ctx: CycleContext,
  due: ScheduledJob,
  tracker: ReturnType<typeof createCycleSummaryTracker>
): Promise<JobOutcome> => {
  let job: ScheduledJob;
  try {
    // Single conditional update: the only guard against a cancel or a second loop racing us.
    job = await ctx.repo.updateStatus(due.id, "running", { now: localNow(ctx) });
  } catch (err) {
    if (isExpectedRace(err)) {
      ctx.log.info({ event: "job.skipped", jobId: due.id, reason: err.message });
    } else {
      ctx.log.error({ event: "job.skipped", jobId: due.id, reason: String(err) });
    }
    return "skipped";
  }

  tracker.addStarted();
  ctx.log.info({
    event: "job.started",
    jobId: job.id,
    listingRef: job.listingRef,
    profileRef: job.profileRef,
    nextRunAt: job.nextRunAt
  });

  let recurrence: Recurrence = "none";
  try {
    recurrence = resolveRecurrence(ctx, job);
    await executeJob(ctx, job);
  } catch (err) {
    return failJob(ctx, job, err);
  }

  return completeJob(ctx, job, recurrence, tracker);
};

/**
 * One poll cycle: sweep stale `running` jobs, fetch due jobs, and execute them one by one in
 * `nextRunAt` order. Job failures never escape; a store outage while polling aborts only this
 * cycle.
 */
export const runSchedulerCycle = async (deps: SchedulerCycleDeps): Promise<CycleSummary> => {
  const ctx: CycleContext = {
    ...deps,
    clock: deps.clock ?? (() => new Date()),
    storeRetry: deps.storeRetry ?? defaultStoreRetryPolicy
  };
  const now = localNow(ctx);
  const checkBefore = addMilliseconds(now, ctx.config.dueBufferMs);
  const tracker = createCycleSummaryTracker(now, checkBefore);

  let dueJobs: ScheduledJob[];
  try {
    tracker.addSwept(await sweepStaleJobs(ctx, now));
    dueJobs = await withStoreRetry(ctx, "listDue", () => ctx.repo.listDue(checkBefore), ctx.signal);
  } catch (err) {
    const error = wrapStoreFailure(err, "poll");
    tracker.markAborted();
    const summary = tracker.summary(localNow(ctx));
    ctx.log.error({ event: "scheduler.cycle_aborted", code: error.code, message: error.message, ...summary });
    return summary;
  }

  tracker.addDue(dueJobs.length);
  let previousExecuted = false;
  for (const job of dueJobs) {
    if (stopRequested(ctx)) break;
    if (previousExecuted && ctx.config.interJobDelayMs > 0) {
      const waited = await sleep(ctx.config.interJobDelayMs, ctx.signal);
      if (!waited || stopRequested(ctx)) break;
    }

    let outcome: JobOutcome;
    try {
      outcome = await processDueJob(ctx, job, tracker);
    } catch (err) {
      ctx.log.error({ event: "job.unhandled_error", jobId: job.id, message: String(err) });
      outcome = "failed";
    }
    tracker.addOutcome(outcome);
    previousExecuted = outcome !== "skipped";
  }

  const summary = tracker.summary(localNow(ctx));
  ctx.log.info({ event: "scheduler.cycle_completed", ...summary });
  return summary;
};
