import {
  createScheduleCommands,
  validateRescheduleInput,
  validateSchedulePostInput,
  type ReschedulePostInput,
  type SchedulePostInput
} from "../../src/application/schedule-posts/schedulePosts.usecase";
import { ConfigError, NotFoundError, StoreError, ValidationError } from "../../src/core/errors";
import { InMemoryJobRepository } from "../support/inMemoryJobRepository";

const NOW = new Date(2025, 0, 1, 10, 0, 0);

const validInput: SchedulePostInput = {
  listingRef: 42,
  profileRef: "p-7",
  profileDisplayName: "Main Profile",
  profileFolderPath: "/profiles/main",
  location: "Springfield",
  scheduledAt: "2025-01-02T09:30",
  recurrence: "weekly"
};

describe("validateSchedulePostInput", () => {
  it("normalizes a valid request", () => {
    expect(validateSchedulePostInput(validInput, NOW)).toEqual({
      listingRef: "42",
      profileRef: "p-7",
      profileDisplayName: "Main Profile",
      profileFolderPath: "/profiles/main",
      location: "Springfield",
      scheduledAt: "2025-01-02T09:30:00",
      nextRunAt: "2025-01-02T09:30:00",
      recurrence: "weekly"
    });
  });

  it("defaults recurrence to none", () => {
    expect(validateSchedulePostInput({ ...validInput, recurrence: undefined }, NOW).recurrence).toBe("none");
  });

  it("lists every missing field", () => {
    let caught: unknown;
    try {
      validateSchedulePostInput({ listingRef: "1", location: "  " }, NOW);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: "Missing required fields: profileRef, profileDisplayName, profileFolderPath, location, scheduledAt",
      context: { field: "profileRef" }
    });
  });

  it("rejects times that are not in the future", () => {
    expect(() => validateSchedulePostInput({ ...validInput, scheduledAt: "2025-01-01T10:00:00" }, NOW)).toThrow(
      "Scheduled time must be in the future"
    );
  });

  it("rejects timestamps with a zone", () => {
    expect(() => validateSchedulePostInput({ ...validInput, scheduledAt: "2025-01-02T09:30:00Z" }, NOW)).toThrow(
      "scheduledAt must be a naive local timestamp without timezone. Received: 2025-01-02T09:30:00Z"
    );
  });

  it("rejects unknown recurrence with ConfigError", () => {
    expect(() => validateSchedulePostInput({ ...validInput, recurrence: "hourly" }, NOW)).toThrow(ConfigError);
  });

  it("truncates long free-text fields", () => {
    const job = validateSchedulePostInput(
      {
        ...validInput,
        profileDisplayName: "n".repeat(150),
        profileFolderPath: "f".repeat(600),
        location: "l".repeat(250)
      },
      NOW
    );

    expect(job.profileDisplayName).toHaveLength(100);
    expect(job.profileFolderPath).toHaveLength(500);
    expect(job.location).toHaveLength(200);
  });
});

describe("schedule commands", () => {
  const setup = () => {
    const repo = new InMemoryJobRepository();
    return { repo, commands: createScheduleCommands({ repo, clock: () => NOW }) };
  };

  it("stores a new post as pending and returns it", async () => {
    const { repo, commands } = setup();

    const job = await commands.schedulePost(validInput);

    expect(job).toMatchObject({
      id: "job-1",
      status: "pending",
      listingRef: "42",
      nextRunAt: "2025-01-02T09:30:00",
      createdAt: "2025-01-01T10:00:00"
    });
    expect(repo.jobs.get("job-1")?.status).toBe("pending");
  });

  it("reports a post that cannot be read back as a store failure", async () => {
    const { repo, commands } = setup();
    jest.spyOn(repo, "get").mockResolvedValue(null);

    await expect(commands.schedulePost(validInput)).rejects.toThrow(StoreError);
  });

  it("gets and lists posts with filters", async () => {
    const { repo, commands } = setup();
    repo.seed({ id: "a", profileRef: "p-1", scheduledAt: "2025-01-03T10:00:00" });
    repo.seed({ id: "b", profileRef: "p-2", scheduledAt: "2025-01-02T10:00:00" });
    repo.seed({ id: "c", profileRef: "p-1", scheduledAt: "2025-01-01T11:00:00", status: "failed" });

    await expect(commands.getPost("missing")).resolves.toBeNull();
    expect((await commands.listPosts()).map((job) => job.id)).toEqual(["c", "b", "a"]);
    expect((await commands.listPosts({ profileRef: "p-1", status: "pending" })).map((job) => job.id)).toEqual(["a"]);
  });

  it("cancels pending posts only", async () => {
    const { repo, commands } = setup();
    repo.seed({ id: "a" });
    repo.seed({ id: "b", status: "running" });

    await expect(commands.cancelPost("a")).resolves.toMatchObject({
      status: "cancelled",
      updatedAt: "2025-01-01T10:00:00"
    });
    await expect(commands.cancelPost("b")).rejects.toThrow("Scheduled job b is running, transition not applicable");
    await expect(commands.cancelPost("zzz")).rejects.toThrow(NotFoundError);
  });

  it("reschedules pending posts and resets their next run", async () => {
    const { repo, commands } = setup();
    repo.seed({ id: "a", scheduledAt: "2025-01-05T10:00:00", nextRunAt: "2025-01-05T10:00:00", recurrence: "daily" });
    repo.seed({ id: "b", status: "running" });

    await expect(
      commands.reschedulePost("a", { scheduledAt: "2025-01-02T07:00", recurrence: "weekly" })
    ).resolves.toMatchObject({
      id: "a",
      status: "pending",
      scheduledAt: "2025-01-02T07:00:00",
      nextRunAt: "2025-01-02T07:00:00",
      recurrence: "weekly",
      updatedAt: "2025-01-01T10:00:00"
    });
    await expect(commands.reschedulePost("b", { recurrence: "daily" })).rejects.toThrow(
      "Scheduled job b is running, transition not applicable"
    );
    await expect(commands.reschedulePost("zzz", { recurrence: "daily" })).rejects.toThrow(NotFoundError);
    expect(repo.jobs.get("b")?.recurrence).toBe("none");
  });

  it("changes only the recurrence when no new time is given", async () => {
    const { repo, commands } = setup();
    repo.seed({ id: "a", nextRunAt: "2025-01-05T10:00:00" });

    await commands.reschedulePost("a", { recurrence: "monthly" });

    expect(repo.jobs.get("a")).toMatchObject({ nextRunAt: "2025-01-05T10:00:00", recurrence: "monthly" });
  });

  it("deletes posts and reports unknown ids", async () => {
    const { repo, commands } = setup();
    repo.seed({ id: "a" });

    await commands.deletePost("a");
    expect(repo.jobs.has("a")).toBe(false);
    await expect(commands.deletePost("a")).rejects.toThrow("Scheduled job a not found");
  });

  it("summarizes counts and the coming week", async () => {
    const { repo, commands } = setup();
    repo.seed({ id: "soon", nextRunAt: "2025-01-03T10:00:00" });
    repo.seed({ id: "later", nextRunAt: "2025-01-11T10:00:00" });
    repo.seed({ id: "done", status: "completed" });
    repo.seed({ id: "broken", status: "failed" });

    await expect(commands.getStats()).resolves.toEqual({
      pending: 2,
      running: 0,
      completed: 1,
      failed: 1,
      cancelled: 0,
      total: 4,
      upcomingSevenDays: 1
    });
  });
});

describe("validateRescheduleInput", () => {
  it("moves scheduledAt and nextRunAt together", () => {
    expect(validateRescheduleInput({ scheduledAt: " 2025-01-03T08:00 " }, NOW)).toEqual({
      scheduledAt: "2025-01-03T08:00:00",
      nextRunAt: "2025-01-03T08:00:00"
    });
  });

  it("accepts a recurrence change alone", () => {
    expect(validateRescheduleInput({ recurrence: "monthly" }, NOW)).toEqual({ recurrence: "monthly" });
  });

  it.each<[ReschedulePostInput, string]>([
    [{}, "Nothing to update: provide scheduledAt or recurrence"],
    [{ scheduledAt: 5 }, "scheduledAt must be a timestamp string"],
    [{ scheduledAt: "2025-01-01T09:00:00" }, "Scheduled time must be in the future"]
  ])("rejects %j", (input, message) => {
    expect(() => validateRescheduleInput(input, NOW)).toThrow(ValidationError);
    expect(() => validateRescheduleInput(input, NOW)).toThrow(message);
  });

  it("rejects unknown recurrence with ConfigError", () => {
    expect(() => validateRescheduleInput({ recurrence: "yearly" }, NOW)).toThrow(ConfigError);
  });
});
