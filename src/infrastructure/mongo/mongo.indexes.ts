import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

type IndexPlan = Array<{ keys: IndexSpecification; options?: CreateIndexesOptions }>;

/**
 * Index plan applied on first use of each collection:
 * - scheduled_jobs { status, nextRunAt } backs due scanning and nextPending
 * - scheduled_jobs { status, startedAt } backs the stale `running` sweep
 * - listing_history { jobId } for history lookups by job
 */
export const mongoIndexes: { scheduledJobs: IndexPlan; postHistory: IndexPlan } = {
  scheduledJobs: [
    { keys: { status: 1, nextRunAt: 1 } },
    { keys: { status: 1, startedAt: 1 } }
  ],
  postHistory: [{ keys: { jobId: 1 } }]
};
