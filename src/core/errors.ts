import type { JobStatus } from "./jobs/ScheduledJob";

export type SchedulerErrorCode =
  | "not_found"
  | "validation_failed"
  | "agent_execution_failed"
  | "store_unavailable"
  | "config_invalid";

export type SchedulerErrorContext = Partial<{
  jobId: string;
  operation: string;
  field: string;
  currentStatus: JobStatus;
  timeoutMs: number;
  status: number;
}>;

export abstract class SchedulerError extends Error {
  abstract readonly code: SchedulerErrorCode;
  readonly context: SchedulerErrorContext;
  readonly cause?: unknown;

  constructor(message: string, context: SchedulerErrorContext = {}, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.context = context;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The job vanished or is no longer in a status the requested transition starts from.
 * During polling this is an expected race (e.g. a cancel from the dashboard), not a fault.
 */
export class NotFoundError extends SchedulerError {
  readonly code = "not_found";

  static forJob(jobId: string, currentStatus?: JobStatus): NotFoundError {
    const message = currentStatus
      ? `Scheduled job ${jobId} is ${currentStatus}, transition not applicable`
      : `Scheduled job ${jobId} not found`;
    return new NotFoundError(message, currentStatus ? { jobId, currentStatus } : { jobId });
  }
}

export class ValidationError extends SchedulerError {
  readonly code = "validation_failed";
}

export class AgentExecutionError extends SchedulerError {
  readonly code = "agent_execution_failed";
}

export class StoreError extends SchedulerError {
  readonly code = "store_unavailable";
}

export class ConfigError extends SchedulerError {
  readonly code = "config_invalid";
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
