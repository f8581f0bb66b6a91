import { randomUUID } from "crypto";
import type { Collection, Db, Filter, UpdateFilter } from "mongodb";
import { NotFoundError, SchedulerError, StoreError, ValidationError, toErrorMessage } from "../../core/errors";
import {
  allowedPreviousStatuses,
  isJobStatus,
  truncateErrorMessage,
  type JobStatus,
  type NewScheduledJob,
  type ScheduledJob
} from "../../core/jobs/ScheduledJob";
import type { LocalDateTime } from "../../core/time/localDateTime";
import type {
  RescheduleChange,
  ScheduledJobFilter,
  ScheduledJobRepository,
  StatusUpdate,
  StoreHealth
} from "../../ports/ScheduledJobRepository";
import { mongoIndexes } from "./mongo.indexes";

export type ScheduledJobDoc = Omit<ScheduledJob, "id"> & { _id: string };

const optionalString = (value: unknown): string | undefined => (typeof value === "string" ? value : undefined);

/**
 * Maps a stored document to the domain shape. Nulls written by other tools become absent fields.
 */
export const toScheduledJob = (doc: ScheduledJobDoc): ScheduledJob => {
  const job: ScheduledJob = {
    id: doc._id,
    listingRef: doc.listingRef,
    profileRef: doc.profileRef,
    profileDisplayName: doc.profileDisplayName ?? "",
    profileFolderPath: doc.profileFolderPath ?? "",
    location: doc.location ?? "",
    scheduledAt: doc.scheduledAt,
    nextRunAt: doc.nextRunAt,
    recurrence: optionalString(doc.recurrence) ?? "none",
    status: doc.status,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt
  };

  const errorMessage = optionalString(doc.errorMessage);
  if (errorMessage != null) job.errorMessage = errorMessage;
  const startedAt = optionalString(doc.startedAt);
  if (startedAt != null) job.startedAt = startedAt;
  const previousJobId = optionalString(doc.previousJobId);
  if (previousJobId != null) job.previousJobId = previousJobId;
  return job;
};

/**
 * Mongo-backed schedule store. Status changes are single `findOneAndUpdate` calls filtered
 * on the allowed previous statuses, so two loops racing on one job cannot both win.
 */
export class MongoScheduledJobRepository implements ScheduledJobRepository {
  private collection?: Collection<ScheduledJobDoc>;

  constructor(
    private readonly getDb: () => Promise<Db>,
    private readonly collectionName = "scheduled_jobs"
  ) {}

  private async getCollection(): Promise<Collection<ScheduledJobDoc>> {
    if (this.collection) return this.collection;

    const db = await this.getDb();
    const col = db.collection<ScheduledJobDoc>(this.collectionName);

    // Index creation is idempotent.
    for (const idx of mongoIndexes.scheduledJobs) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  private async run<T>(operation: string, fn: (col: Collection<ScheduledJobDoc>) => Promise<T>): Promise<T> {
    try {
      return await fn(await this.getCollection());
    } catch (err) {
      if (err instanceof SchedulerError) throw err;
      throw new StoreError(`Schedule store ${operation} failed: ${toErrorMessage(err)}`, { operation }, err);
    }
  }

  async listDue(before: LocalDateTime): Promise<ScheduledJob[]> {
    const docs = await this.run("listDue", (col) =>
      col
        .find({ status: "pending", nextRunAt: { $lte: before } })
        .sort({ nextRunAt: 1, createdAt: 1 })
        .toArray()
    );
    return docs.map(toScheduledJob);
  }

  async updateStatus(id: string, next: JobStatus, update: StatusUpdate): Promise<ScheduledJob> {
    const from = allowedPreviousStatuses[next];
    if (from.length === 0) {
      throw new ValidationError(`Status ${next} cannot be entered by a transition`, { jobId: id });
    }

    const set: Partial<ScheduledJobDoc> = { status: next, updatedAt: update.now };
    if (next === "running") set.startedAt = update.now;
    if (next === "failed") set.errorMessage = truncateErrorMessage(update.errorMessage ?? "Unknown error");
    const change: UpdateFilter<ScheduledJobDoc> =
      next === "completed" ? { $set: set, $unset: { errorMessage: "" } } : { $set: set };

    const doc = await this.run("updateStatus", (col) =>
      col.findOneAndUpdate({ _id: id, status: { $in: [...from] } }, change, { returnDocument: "after" })
    );
    if (doc) return toScheduledJob(doc);

    // Only used to make the rejection precise; the update above is the guard.
    const current = await this.run("updateStatus", (col) =>
      col.findOne({ _id: id }, { projection: { status: 1 } })
    );
    throw NotFoundError.forJob(id, current && isJobStatus(current.status) ? current.status : undefined);
  }

  async failStaleRunning(startedBefore: LocalDateTime, errorMessage: string, now: LocalDateTime): Promise<ScheduledJob[]> {
    const staleFilter: Filter<ScheduledJobDoc> = {
      status: "running",
      $or: [
        { startedAt: { $lte: startedBefore } },
        // Rows moved to running by another tool carry no startedAt.
        { startedAt: { $exists: false }, updatedAt: { $lte: startedBefore } }
      ]
    };
    const candidates = await this.run("failStaleRunning", (col) =>
      col.find(staleFilter, { projection: { _id: 1 } }).toArray()
    );

    const swept: ScheduledJob[] = [];
    for (const candidate of candidates) {
      const doc = await this.run("failStaleRunning", (col) =>
        col.findOneAndUpdate(
          { ...staleFilter, _id: candidate._id },
          { $set: { status: "failed", errorMessage: truncateErrorMessage(errorMessage), updatedAt: now } },
          { returnDocument: "after" }
        )
      );
      if (doc) swept.push(toScheduledJob(doc));
    }
    return swept;
  }

  async insert(job: NewScheduledJob, now: LocalDateTime): Promise<string> {
    const doc: ScheduledJobDoc = {
      _id: randomUUID(),
      listingRef: job.listingRef,
      profileRef: job.profileRef,
      profileDisplayName: job.profileDisplayName,
      profileFolderPath: job.profileFolderPath,
      location: job.location,
      scheduledAt: job.scheduledAt,
      nextRunAt: job.nextRunAt,
      recurrence: job.recurrence,
      status: "pending",
      createdAt: now,
      updatedAt: now
    };
    if (job.previousJobId != null) doc.previousJobId = job.previousJobId;

    await this.run("insert", (col) => col.insertOne(doc));
    return doc._id;
  }

  async get(id: string): Promise<ScheduledJob | null> {
    const doc = await this.run("get", (col) => col.findOne({ _id: id }));
    return doc ? toScheduledJob(doc) : null;
  }

  async listAll(filter: ScheduledJobFilter = {}): Promise<ScheduledJob[]> {
    const query: Filter<ScheduledJobDoc> = {};
    if (filter.status) query.status = filter.status;
    if (filter.profileRef) query.profileRef = filter.profileRef;
    if (filter.listingRef) query.listingRef = filter.listingRef;

    const docs = await this.run("listAll", (col) => col.find(query).sort({ scheduledAt: 1, createdAt: 1 }).toArray());
    return docs.map(toScheduledJob);
  }

  async nextPending(): Promise<ScheduledJob | null> {
    const doc = await this.run("nextPending", (col) =>
      col.findOne({ status: "pending" }, { sort: { nextRunAt: 1, createdAt: 1 } })
    );
    return doc ? toScheduledJob(doc) : null;
  }

  async countByStatus(): Promise<Record<JobStatus, number>> {
    const rows = await this.run("countByStatus", (col) =>
      col.aggregate<{ _id: unknown; count: number }>([{ $group: { _id: "$status", count: { $sum: 1 } } }]).toArray()
    );

    const counts: Record<JobStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0, cancelled: 0 };
    for (const row of rows) {
      if (isJobStatus(row._id)) counts[row._id] = row.count;
    }
    return counts;
  }

  async delete(id: string): Promise<void> {
    const res = await this.run("delete", (col) => col.deleteOne({ _id: id }));
    if (res.deletedCount === 0) throw NotFoundError.forJob(id);
  }

  cancel(id: string, now: LocalDateTime): Promise<ScheduledJob> {
    return this.updateStatus(id, "cancelled", { now });
  }

  async reschedule(id: string, change: RescheduleChange, now: LocalDateTime): Promise<ScheduledJob> {
    const set: Partial<ScheduledJobDoc> = { updatedAt: now };
    if (change.scheduledAt != null) set.scheduledAt = change.scheduledAt;
    if (change.nextRunAt != null) set.nextRunAt = change.nextRunAt;
    if (change.recurrence != null) set.recurrence = change.recurrence;
    const doc = await this.run("reschedule", (col) =>
      col.findOneAndUpdate({ _id: id, status: "pending" }, { $set: set }, { returnDocument: "after" })
    );
    if (doc) return toScheduledJob(doc);

    const current = await this.run("reschedule", (col) => col.findOne({ _id: id }, { projection: { status: 1 } }));
    throw NotFoundError.forJob(id, current && isJobStatus(current.status) ? current.status : undefined);
  }

  async annotate(id: string, errorMessage: string, now: LocalDateTime): Promise<void> {
    const res = await this.run("annotate", (col) =>
      col.updateOne({ _id: id }, { $set: { errorMessage: truncateErrorMessage(errorMessage), updatedAt: now } })
    );
    if (res.matchedCount === 0) throw NotFoundError.forJob(id);
  }

  async ping(): Promise<StoreHealth> {
    try {
      const db = await this.getDb();
      const hello = await db.command({ hello: 1 });
      const localTime: unknown = hello.localTime;
      return localTime instanceof Date ? { serverTime: localTime } : {};
    } catch (err) {
      throw new StoreError(`Schedule store ping failed: ${toErrorMessage(err)}`, { operation: "ping" }, err);
    }
  }
}
