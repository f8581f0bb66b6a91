import {
  ERROR_MESSAGE_MAX_LENGTH,
  allowedPreviousStatuses,
  isJobStatus,
  jobStatuses,
  truncateErrorMessage,
  type JobStatus
} from "../../src/core/jobs/ScheduledJob";

const canTransition = (from: JobStatus, to: JobStatus) => allowedPreviousStatuses[to].includes(from);

describe("ScheduledJob state machine", () => {
  const allowed: Array<[JobStatus, JobStatus]> = [
    ["pending", "running"],
    ["pending", "cancelled"],
    ["running", "completed"],
    ["running", "failed"]
  ];

  it("allows exactly the documented transitions", () => {
    for (const from of jobStatuses) {
      for (const to of jobStatuses) {
        const expected = allowed.some(([a, b]) => a === from && b === to);
        expect({ from, to, ok: canTransition(from, to) }).toEqual({ from, to, ok: expected });
      }
    }
  });

  it("never re-enters pending", () => {
    expect(jobStatuses.filter((from) => canTransition(from, "pending"))).toEqual([]);
  });

  it("recognises status strings", () => {
    expect(isJobStatus("cancelled")).toBe(true);
    expect(isJobStatus("done")).toBe(false);
    expect(isJobStatus(undefined)).toBe(false);
  });

  it("truncates error messages to the stored maximum", () => {
    expect(truncateErrorMessage("x".repeat(600))).toHaveLength(ERROR_MESSAGE_MAX_LENGTH);
    expect(truncateErrorMessage("login expired")).toBe("login expired");
  });
});
