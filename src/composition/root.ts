import { createScheduleCommands, type ScheduleCommands } from "../application/schedule-posts/schedulePosts.usecase";
import { SchedulerService } from "../application/scheduler/SchedulerService";
import { HttpExecutionAgent } from "../infrastructure/agent/HttpExecutionAgent";
import { createMongoConnection } from "../infrastructure/mongo/MongoClientFactory";
import { MongoPostHistoryRepository } from "../infrastructure/mongo/MongoPostHistoryRepository";
import { MongoScheduledJobRepository } from "../infrastructure/mongo/MongoScheduledJobRepository";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";
import { createKeyedLock } from "../shared/concurrency/limiter";
import { createExecutionLog, type ExecutionLog } from "../shared/logging/executionLog";
import { createFileStopSignal } from "../shared/signal/fileStopSignal";

export type SchedulerApp = {
  env: Env;
  log: ExecutionLog;
  scheduler: SchedulerService;
  commands: ScheduleCommands;
  close(): Promise<void>;
};

export const createSchedulerApp = (
  env: Env = loadEnv(),
  runtime: RuntimeConfig = loadRuntimeConfigFromEnv()
): SchedulerApp => {
  const log = createExecutionLog({ filePath: env.SCHEDULER_LOG_FILE });
  const mongo = createMongoConnection(env.MONGO_URI, env.MONGO_DB_NAME);
  const repo = new MongoScheduledJobRepository(mongo.getDb);
  const history = new MongoPostHistoryRepository(mongo.getDb);
  const agent = new HttpExecutionAgent(env.AGENT_BASE_URL, env.AGENT_API_KEY, log);

  const scheduler = new SchedulerService({
    repo,
    agent,
    log,
    history,
    config: runtime.schedulerConfig,
    stopSignal: createFileStopSignal(env.SCHEDULER_STOP_FILE),
    profileLock: createKeyedLock()
  });

  return {
    env,
    log,
    scheduler,
    commands: createScheduleCommands({ repo }),
    close: () => mongo.close()
  };
};

/** Runs the loop in the foreground until it is stopped, then releases the store connection. */
export const runScheduler = async (app: SchedulerApp = createSchedulerApp()): Promise<void> => {
  try {
    app.scheduler.start();
    await app.scheduler.whenStopped();
  } finally {
    await app.close();
  }
};
