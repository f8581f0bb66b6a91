import {
  AgentExecutionError,
  NotFoundError,
  SchedulerError,
  StoreError,
  toErrorMessage,
  type SchedulerErrorCode
} from "../../core/errors";
import { truncateErrorMessage } from "../../core/jobs/ScheduledJob";
import type { LocalDateTime } from "../../core/time/localDateTime";

export type JobFailure = {
  code: SchedulerErrorCode | "unexpected";
  errorMessage: string;
};

/**
 * Turns anything thrown while executing one job into the text stored on the job record.
 */
export const classifyJobFailure = (reason: unknown): JobFailure => {
  const message = toErrorMessage(reason).trim() || "Unknown error";
  if (reason instanceof SchedulerError) {
    return { code: reason.code, errorMessage: truncateErrorMessage(message) };
  }
  return { code: "unexpected", errorMessage: truncateErrorMessage(message) };
};

export const wrapStoreFailure = (reason: unknown, operation: string): SchedulerError => {
  if (reason instanceof SchedulerError) return reason;
  return new StoreError(`Schedule store ${operation} failed: ${toErrorMessage(reason)}`, { operation }, reason);
};

export const isExpectedRace = (reason: unknown): reason is NotFoundError => reason instanceof NotFoundError;

export const agentTimeoutError = (jobId: string, timeoutMs: number): AgentExecutionError =>
  new AgentExecutionError(`Execution agent timed out after ${timeoutMs}ms`, { jobId, timeoutMs });

export const staleJobErrorMessage = (staleAfterMs: number): string =>
  `Interrupted: job was still running ${Math.round(staleAfterMs / 1000)}s after it started and no result was recorded`;

export const followUpFailedMessage = (nextRunAt: LocalDateTime, reason: unknown): string =>
  truncateErrorMessage(`Follow-up run at ${nextRunAt} could not be scheduled: ${toErrorMessage(reason)}`);

export type JobOutcome = "completed" | "failed" | "skipped";

export type CycleSummary = {
  startedAt: LocalDateTime;
  finishedAt: LocalDateTime;
  checkBefore: LocalDateTime;
  due: number;
  started: number;
  completed: number;
  failed: number;
  skipped: number;
  rescheduled: number;
  rescheduleFailed: number;
  swept: number;
  aborted: boolean;
};

export const createCycleSummaryTracker = (startedAt: LocalDateTime, checkBefore: LocalDateTime) => {
  let due = 0;
  let started = 0;
  let rescheduled = 0;
  let rescheduleFailed = 0;
  let swept = 0;
  let aborted = false;
  const outcomes: Record<JobOutcome, number> = { completed: 0, failed: 0, skipped: 0 };

  return {
    addDue: (count: number) => {
      due += count;
    },
    addStarted: () => {
      started += 1;
    },
    addOutcome: (outcome: JobOutcome) => {
      outcomes[outcome] += 1;
    },
    addRescheduled: () => {
      rescheduled += 1;
    },
    addRescheduleFailed: () => {
      rescheduleFailed += 1;
    },
    addSwept: (count: number) => {
      swept += count;
    },
    markAborted: () => {
      aborted = true;
    },
    summary: (finishedAt: LocalDateTime): CycleSummary => ({
      startedAt,
      finishedAt,
      checkBefore,
      due,
      started,
      completed: outcomes.completed,
      failed: outcomes.failed,
      skipped: outcomes.skipped,
      rescheduled,
      rescheduleFailed,
      swept,
      aborted
    })
  };
};
