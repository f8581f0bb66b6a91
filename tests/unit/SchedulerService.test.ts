import { SchedulerService } from "../../src/application/scheduler/SchedulerService";
import type { ExecutionRequest, ExecutionResult } from "../../src/ports/ExecutionAgent";
import type { StopSignal } from "../../src/ports/StopSignal";
import { InMemoryJobRepository } from "../support/inMemoryJobRepository";
import { createRecordingLog } from "../support/recordingLog";

const NOW = new Date(2025, 0, 1, 10, 0, 0);
const tick = (ms: number) => new Promise((r) => setTimeout(r, ms));

const waitFor = async (condition: () => boolean, timeoutMs = 2000) => {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await tick(5);
  }
};

const createFlagStopSignal = () => {
  const flag = { raised: false };
  const signal: StopSignal = {
    isRaised: () => flag.raised,
    clear: () => {
      flag.raised = false;
    }
  };
  return { flag, signal };
};

const setup = () => {
  const repo = new InMemoryJobRepository();
  const recorder = createRecordingLog();
  const execute = jest
    .fn<Promise<ExecutionResult>, [ExecutionRequest, AbortSignal?]>()
    .mockResolvedValue({ success: true });
  const stop = createFlagStopSignal();
  const service = new SchedulerService({
    repo,
    agent: { execute },
    log: recorder.log,
    config: { pollIntervalMs: 10, interJobDelayMs: 0 },
    stopSignal: stop.signal,
    clock: () => NOW,
    storeRetry: { retries: 0, minDelayMs: 1, maxDelayMs: 1 }
  });
  return { repo, recorder, execute, stop, service };
};

describe("SchedulerService", () => {
  it("starts once, polls, and stops cleanly", async () => {
    const { repo, recorder, service } = setup();
    repo.seed({ id: "a" });

    const started = service.start();
    expect(started).toMatchObject({ state: "running", startedAt: "2025-01-01T10:00:00" });
    expect(service.start().state).toBe("running");
    expect(recorder.find("scheduler.started")).toHaveLength(1);

    await waitFor(() => repo.jobs.get("a")?.status === "completed");
    const stopped = await service.stop();

    expect(stopped.state).toBe("stopped");
    expect(stopped.lastCycle).toMatchObject({ aborted: false });
    expect(stopped.lastCycleAt).toBe("2025-01-01T10:00:00");
    expect(recorder.events()).toContain("scheduler.stopped");
  });

  it("reports the next pending job after a cycle", async () => {
    const { repo, service } = setup();
    repo.seed({ id: "later", listingRef: "listing-9", nextRunAt: "2025-01-02T08:00:00" });

    service.start();
    await waitFor(() => service.status().nextDueJob != null);
    await service.stop();

    expect(service.status().nextDueJob).toEqual({
      id: "later",
      listingRef: "listing-9",
      profileRef: "profile-1",
      nextRunAt: "2025-01-02T08:00:00"
    });
  });

  it("lets the job in flight finish when stopped", async () => {
    const { repo, execute, service } = setup();
    execute.mockImplementation(async () => {
      await tick(30);
      return { success: true };
    });
    repo.seed({ id: "a" });

    service.start();
    await waitFor(() => execute.mock.calls.length === 1);
    await service.stop();

    expect(repo.jobs.get("a")?.status).toBe("completed");
    expect(service.status().state).toBe("stopped");
  });

  it("clears a leftover stop sentinel on start and exits when it is raised again", async () => {
    const { stop, recorder, service } = setup();
    stop.flag.raised = true;

    service.start();
    expect(stop.flag.raised).toBe(false);
    expect(recorder.events()).toContain("scheduler.stop_signal_cleared");

    stop.flag.raised = true;
    await service.whenStopped();

    expect(service.status().state).toBe("stopped");
    expect(stop.flag.raised).toBe(false);
    expect(recorder.events()).toContain("scheduler.stop_signal_detected");
  });

  it("honours a stop sentinel raised while a job is executing", async () => {
    const { repo, execute, stop, recorder, service } = setup();
    repo.seed({ id: "a", nextRunAt: "2025-01-01T09:58:00" });
    repo.seed({ id: "b", nextRunAt: "2025-01-01T09:59:00" });
    execute.mockImplementation(async () => {
      stop.flag.raised = true;
      return { success: true };
    });

    service.start();
    await service.whenStopped();

    expect(execute.mock.calls.map(([request]) => request.jobId)).toEqual(["a"]);
    expect(repo.jobs.get("a")?.status).toBe("completed");
    expect(repo.jobs.get("b")?.status).toBe("pending");
    expect(stop.flag.raised).toBe(false);
    expect(recorder.events()).toContain("scheduler.stop_signal_detected");
  });

  it("returns from requestStop before the job in flight finishes", async () => {
    const { repo, execute, service } = setup();
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    execute.mockImplementation(async () => {
      await gate;
      return { success: true };
    });
    repo.seed({ id: "a" });

    service.start();
    await waitFor(() => execute.mock.calls.length === 1);

    expect(service.requestStop().state).toBe("stopping");
    expect(repo.jobs.get("a")?.status).toBe("running");

    release();
    await service.whenStopped();
    expect(repo.jobs.get("a")?.status).toBe("completed");
    expect(service.status().state).toBe("stopped");
  });

  it("can be stopped when idle and restarted", async () => {
    const { service, recorder } = setup();

    await expect(service.stop()).resolves.toMatchObject({ state: "stopped" });

    service.start();
    await service.stop();
    service.start();
    expect(service.status().state).toBe("running");
    await service.stop();

    expect(recorder.find("scheduler.started")).toHaveLength(2);
  });

  it("keeps running through a store outage", async () => {
    const { repo, recorder, service } = setup();
    repo.seed({ id: "a" });
    repo.failNext("failStaleRunning", 1);

    service.start();
    await waitFor(() => repo.jobs.get("a")?.status === "completed");
    await service.stop();

    expect(recorder.find("scheduler.cycle_aborted")).toHaveLength(1);
  });

  it("produces a diagnostic report from its store and config", async () => {
    const { repo, service } = setup();
    repo.seed({ id: "a", nextRunAt: "2025-01-01T10:01:00" });

    const report = await service.runDiagnostic();

    expect(report.store).toEqual({ ok: true });
    expect(report.counts).toMatchObject({ pending: 1, total: 1 });
    expect(report.jobs[0]).toMatchObject({ id: "a", due: true, secondsUntilDue: 60 });
  });
});
