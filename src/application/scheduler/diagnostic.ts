import { toErrorMessage } from "../../core/errors";
import type { JobStatus } from "../../core/jobs/ScheduledJob";
import { isRecurrence } from "../../core/jobs/recurrence";
import {
  addMilliseconds,
  diffMilliseconds,
  isLocalDateTime,
  toLocalDateTime,
  type LocalDateTime
} from "../../core/time/localDateTime";
import type { ScheduledJobRepository } from "../../ports/ScheduledJobRepository";
import type { SchedulerConfig } from "./scheduler.config";

export const CLOCK_SKEW_WARNING_MS = 60_000;
const SEVEN_DAYS_MS = 7 * 24 * 60 * 60 * 1000;

export type DiagnosticJob = {
  id: string;
  status: JobStatus;
  listingRef: string;
  profileRef: string;
  nextRunAt: LocalDateTime;
  recurrence: string;
  due: boolean;
  secondsUntilDue: number | null;
};

export type DiagnosticReport = {
  generatedAt: LocalDateTime;
  checkBefore: LocalDateTime;
  store: { ok: boolean; error?: string };
  counts: Record<JobStatus, number> & { total: number };
  upcomingSevenDays: number;
  jobs: DiagnosticJob[];
  warnings: string[];
};

const emptyCounts = (): Record<JobStatus, number> & { total: number } => ({
  pending: 0,
  running: 0,
  completed: 0,
  failed: 0,
  cancelled: 0,
  total: 0
});

/**
 * Read-only health report: store connectivity, every job with its due flag, and warnings
 * for clock skew, overdue work and unschedulable recurrence values.
 */
export const buildDiagnosticReport = async (deps: {
  repo: ScheduledJobRepository;
  config: SchedulerConfig;
  clock?: () => Date;
}): Promise<DiagnosticReport> => {
  const clock = deps.clock ?? (() => new Date());
  const hostNow = clock();
  const now = toLocalDateTime(hostNow);
  const checkBefore = addMilliseconds(now, deps.config.dueBufferMs);
  const upcomingUntil = addMilliseconds(now, SEVEN_DAYS_MS);
  const overdueAfterMs = deps.config.pollIntervalMs + deps.config.dueBufferMs;

  const report: DiagnosticReport = {
    generatedAt: now,
    checkBefore,
    store: { ok: true },
    counts: emptyCounts(),
    upcomingSevenDays: 0,
    jobs: [],
    warnings: []
  };

  try {
    const health = await deps.repo.ping();
    if (health.serverTime) {
      const skewMs = health.serverTime.getTime() - hostNow.getTime();
      if (Math.abs(skewMs) > CLOCK_SKEW_WARNING_MS) {
        report.warnings.push(
          `Store clock differs from host clock by ${Math.round(skewMs / 1000)}s; due times use the host clock`
        );
      }
    }

    const jobs = await deps.repo.listAll();
    for (const job of jobs) {
      report.counts[job.status] += 1;
      report.counts.total += 1;

      const parseable = isLocalDateTime(job.nextRunAt);
      if (!parseable) {
        report.warnings.push(`Job ${job.id} has an unparseable nextRunAt "${job.nextRunAt}"`);
      }
      if (!isRecurrence(job.recurrence)) {
        report.warnings.push(`Job ${job.id} has unknown recurrence "${job.recurrence}"; it will not be rescheduled`);
      }

      const untilDueMs = parseable ? diffMilliseconds(job.nextRunAt, now) : null;
      const pending = job.status === "pending";
      const due = pending && parseable && job.nextRunAt <= checkBefore;

      if (pending && parseable && job.nextRunAt >= now && job.nextRunAt <= upcomingUntil) {
        report.upcomingSevenDays += 1;
      }
      if (pending && untilDueMs != null && -untilDueMs > overdueAfterMs) {
        report.warnings.push(
          `Job ${job.id} is overdue by ${Math.round(-untilDueMs / 1000)}s; check that the scheduler is running`
        );
      }

      report.jobs.push({
        id: job.id,
        status: job.status,
        listingRef: job.listingRef,
        profileRef: job.profileRef,
        nextRunAt: job.nextRunAt,
        recurrence: job.recurrence,
        due,
        secondsUntilDue: untilDueMs == null ? null : Math.round(untilDueMs / 1000)
      });
    }
  } catch (err) {
    report.store = { ok: false, error: toErrorMessage(err) };
    report.warnings.push("Schedule store is unreachable; no jobs could be inspected");
  }

  return report;
};
