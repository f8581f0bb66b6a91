import { toLocalDateTime, type LocalDateTime } from "../../core/time/localDateTime";
import type { ExecutionAgent } from "../../ports/ExecutionAgent";
import type { PostHistoryRepository } from "../../ports/PostHistoryRepository";
import type { ScheduledJobRepository } from "../../ports/ScheduledJobRepository";
import type { StopSignal } from "../../ports/StopSignal";
import { createKeyedLock, type KeyedLock } from "../../shared/concurrency/limiter";
import { sleep } from "../../shared/concurrency/sleep";
import type { ExecutionLog } from "../../shared/logging/executionLog";
import { buildDiagnosticReport, type DiagnosticReport } from "./diagnostic";
import { runSchedulerCycle, type StoreRetryPolicy } from "./runSchedulerCycle.usecase";
import { resolveSchedulerConfig, type SchedulerConfig, type SchedulerConfigInput } from "./scheduler.config";
import type { CycleSummary } from "./scheduler.error-handler";

export type SchedulerState = "stopped" | "running" | "stopping";

export type DueJobSummary = {
  id: string;
  listingRef: string;
  profileRef: string;
  nextRunAt: LocalDateTime;
};

export type SchedulerStatus = {
  state: SchedulerState;
  startedAt: LocalDateTime | null;
  lastCycleAt: LocalDateTime | null;
  lastCycle: CycleSummary | null;
  nextDueJob: DueJobSummary | null;
};

export type SchedulerServiceDeps = {
  repo: ScheduledJobRepository;
  agent: ExecutionAgent;
  log: ExecutionLog;
  config?: SchedulerConfigInput;
  history?: PostHistoryRepository;
  stopSignal?: StopSignal;
  /** Share one lock between services that may drive the same profiles. */
  profileLock?: KeyedLock;
  clock?: () => Date;
  storeRetry?: StoreRetryPolicy;
};

/**
 * Lifecycle owner of one polling loop. Each instance is independent; all shared state
 * lives in the schedule store.
 */
export class SchedulerService {
  readonly config: SchedulerConfig;
  private readonly profileLock: KeyedLock;
  private readonly clock: () => Date;

  private state: SchedulerState = "stopped";
  private startedAt: LocalDateTime | null = null;
  private lastCycle: CycleSummary | null = null;
  private nextDueJob: DueJobSummary | null = null;
  private stopController?: AbortController;
  private loop?: Promise<void>;

  constructor(private readonly deps: SchedulerServiceDeps) {
    this.config = resolveSchedulerConfig(deps.config);
    this.profileLock = deps.profileLock ?? createKeyedLock();
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Idempotent: a second call while running (or stopping) only reports status. */
  start(): SchedulerStatus {
    if (this.state !== "stopped") return this.status();

    this.clearStopSignal();
    const controller = new AbortController();
    this.stopController = controller;
    this.state = "running";
    this.startedAt = toLocalDateTime(this.clock());
    this.deps.log.info({
      event: "scheduler.started",
      pollIntervalMs: this.config.pollIntervalMs,
      dueBufferMs: this.config.dueBufferMs,
      staleAfterMs: this.config.staleAfterMs,
      agentTimeoutMs: this.config.agentTimeoutMs,
      localTime: this.startedAt
    });

    this.loop = this.runLoop(controller.signal)
      .catch((err: unknown) => {
        this.deps.log.error({ event: "scheduler.crashed", message: String(err) });
      })
      .finally(() => {
        this.state = "stopped";
        this.stopController = undefined;
        this.deps.log.info({ event: "scheduler.stopped", lastCycleAt: this.lastCycle?.finishedAt ?? null });
      });

    return this.status();
  }

  /** Signals the loop and returns at once; the job in flight (if any) still finishes. */
  requestStop(): SchedulerStatus {
    if (this.state === "running") {
      this.state = "stopping";
      this.stopController?.abort();
    }
    return this.status();
  }

  /** Signals the loop and resolves once the job in flight (if any) has finished. */
  async stop(): Promise<SchedulerStatus> {
    this.requestStop();
    await this.loop;
    return this.status();
  }

  status(): SchedulerStatus {
    return {
      state: this.state,
      startedAt: this.startedAt,
      lastCycleAt: this.lastCycle?.finishedAt ?? null,
      lastCycle: this.lastCycle,
      nextDueJob: this.nextDueJob
    };
  }

  /** Resolves when the current loop exits, whatever stopped it. */
  async whenStopped(): Promise<void> {
    await this.loop;
  }

  runDiagnostic(): Promise<DiagnosticReport> {
    return buildDiagnosticReport({ repo: this.deps.repo, config: this.config, clock: this.clock });
  }

  private clearStopSignal() {
    if (!this.deps.stopSignal?.isRaised()) return;
    try {
      this.deps.stopSignal.clear();
      this.deps.log.info({ event: "scheduler.stop_signal_cleared" });
    } catch (err) {
      this.deps.log.warn({ event: "scheduler.stop_signal_clear_failed", message: String(err) });
    }
  }

  private stopSignalRaised = (): boolean => this.deps.stopSignal?.isRaised() ?? false;

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      if (this.stopSignalRaised()) {
        this.deps.log.info({ event: "scheduler.stop_signal_detected" });
        this.state = "stopping";
        this.clearStopSignal();
        return;
      }

      this.lastCycle = await runSchedulerCycle({
        repo: this.deps.repo,
        agent: this.deps.agent,
        log: this.deps.log,
        history: this.deps.history,
        config: this.config,
        profileLock: this.profileLock,
        clock: this.clock,
        storeRetry: this.deps.storeRetry,
        signal,
        isStopRequested: this.stopSignalRaised
      });
      await this.refreshNextDueJob();

      if (this.stopSignalRaised()) continue;
      await sleep(this.config.pollIntervalMs, signal);
    }
  }

  private async refreshNextDueJob() {
    try {
      const next = await this.deps.repo.nextPending();
      this.nextDueJob = next
        ? { id: next.id, listingRef: next.listingRef, profileRef: next.profileRef, nextRunAt: next.nextRunAt }
        : null;
    } catch (err) {
      this.deps.log.warn({ event: "scheduler.next_due_unknown", message: String(err) });
    }
  }
}
