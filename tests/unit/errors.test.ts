import {
  AgentExecutionError,
  ConfigError,
  NotFoundError,
  SchedulerError,
  StoreError,
  ValidationError,
  toErrorMessage
} from "../../src/core/errors";

describe("scheduler errors", () => {
  it.each([
    [new ValidationError("bad"), "ValidationError", "validation_failed"],
    [new AgentExecutionError("bad"), "AgentExecutionError", "agent_execution_failed"],
    [new StoreError("bad"), "StoreError", "store_unavailable"],
    [new ConfigError("bad"), "ConfigError", "config_invalid"],
    [new NotFoundError("bad"), "NotFoundError", "not_found"]
  ])("keeps name, code and prototype chain for %s", (error, name, code) => {
    expect(error).toBeInstanceOf(SchedulerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
  });

  it("describes missing jobs and inapplicable transitions", () => {
    expect(NotFoundError.forJob("j1").message).toBe("Scheduled job j1 not found");
    const stale = NotFoundError.forJob("j1", "cancelled");
    expect(stale.message).toBe("Scheduled job j1 is cancelled, transition not applicable");
    expect(stale.context).toEqual({ jobId: "j1", currentStatus: "cancelled" });
  });

  it("keeps the cause", () => {
    const cause = new Error("socket closed");
    expect(new StoreError("store down", { operation: "listDue" }, cause).cause).toBe(cause);
  });

  it("stringifies non-errors", () => {
    expect(toErrorMessage(new Error("boom"))).toBe("boom");
    expect(toErrorMessage("plain")).toBe("plain");
    expect(toErrorMessage(404)).toBe("404");
  });
});
