import http from "http";
import { URL } from "url";
import type { ScheduleCommands } from "./application/schedule-posts/schedulePosts.usecase";
import type { SchedulerService } from "./application/scheduler/SchedulerService";
import { createSchedulerApp } from "./composition/root";
import { ConfigError, NotFoundError, ValidationError, toErrorMessage } from "./core/errors";
import { isJobStatus } from "./core/jobs/ScheduledJob";
import type { ScheduledJobFilter } from "./ports/ScheduledJobRepository";

export type ControlSurface = Pick<SchedulerService, "start" | "requestStop" | "status" | "runDiagnostic">;

export type ServerDeps = {
  scheduler: ControlSurface;
  commands: ScheduleCommands;
};

const MAX_BODY_BYTES = 1024 * 1024;

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

const statusForError = (err: unknown): number => {
  if (err instanceof HttpError) return err.status;
  if (err instanceof ValidationError || err instanceof ConfigError) return 400;
  if (err instanceof NotFoundError) return 404;
  return 500;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonBody = (req: http.IncomingMessage): Promise<Record<string, unknown>> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new HttpError(413, "Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("error", reject);
    req.on("end", () => {
      const text = Buffer.concat(chunks).toString("utf8");
      if (text.trim() === "") {
        reject(new HttpError(400, "No data provided"));
        return;
      }
      try {
        const parsed: unknown = JSON.parse(text);
        if (!isRecord(parsed)) {
          reject(new HttpError(400, "Request body must be a JSON object"));
          return;
        }
        resolve(parsed);
      } catch {
        reject(new HttpError(400, "Request body is not valid JSON"));
      }
    });
  });

const parseFilter = (url: URL): ScheduledJobFilter => {
  const filter: ScheduledJobFilter = {};
  const status = url.searchParams.get("status");
  if (status) {
    if (!isJobStatus(status)) throw new HttpError(400, `Unknown status filter: ${status}`);
    filter.status = status;
  }
  const profileRef = url.searchParams.get("profileRef");
  if (profileRef) filter.profileRef = profileRef;
  const listingRef = url.searchParams.get("listingRef");
  if (listingRef) filter.listingRef = listingRef;
  return filter;
};

const decodeJobId = (raw: string): string => {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new HttpError(400, `Malformed job id: ${raw}`);
  }
};

const JOB_ROUTE = /^\/jobs\/([^/]+)$/;
const JOB_CANCEL_ROUTE = /^\/jobs\/([^/]+)\/cancel$/;

const route = async (deps: ServerDeps, req: http.IncomingMessage, url: URL): Promise<{ status: number; body: unknown }> => {
  const method = req.method ?? "GET";
  const path = url.pathname;

  if (method === "GET" && path === "/health") return { status: 200, body: { ok: true } };

  if (path === "/scheduler/status" && method === "GET") return { status: 200, body: deps.scheduler.status() };
  if (path === "/scheduler/start" && method === "POST") return { status: 200, body: deps.scheduler.start() };
  if (path === "/scheduler/stop" && method === "POST") return { status: 200, body: deps.scheduler.requestStop() };
  if (path === "/scheduler/diagnostic" && method === "GET") {
    return { status: 200, body: await deps.scheduler.runDiagnostic() };
  }

  if (path === "/jobs" && method === "GET") {
    const jobs = await deps.commands.listPosts(parseFilter(url));
    return { status: 200, body: { status: "success", jobs, total: jobs.length } };
  }
  if (path === "/jobs" && method === "POST") {
    const job = await deps.commands.schedulePost(await readJsonBody(req));
    return { status: 201, body: { status: "success", job } };
  }
  if (path === "/jobs/stats" && method === "GET") {
    return { status: 200, body: { status: "success", stats: await deps.commands.getStats() } };
  }

  const cancelMatch = JOB_CANCEL_ROUTE.exec(path);
  if (cancelMatch && method === "POST") {
    const job = await deps.commands.cancelPost(decodeJobId(cancelMatch[1]));
    return { status: 200, body: { status: "success", job } };
  }

  const jobMatch = JOB_ROUTE.exec(path);
  if (jobMatch) {
    const id = decodeJobId(jobMatch[1]);
    if (method === "GET") {
      const job = await deps.commands.getPost(id);
      if (!job) throw NotFoundError.forJob(id);
      return { status: 200, body: { status: "success", job } };
    }
    if (method === "PATCH") {
      const body = await readJsonBody(req);
      const job = await deps.commands.reschedulePost(id, { scheduledAt: body.scheduledAt, recurrence: body.recurrence });
      return { status: 200, body: { status: "success", job } };
    }
    if (method === "DELETE") {
      await deps.commands.deletePost(id);
      return { status: 200, body: { status: "success" } };
    }
  }

  throw new HttpError(404, `No route for ${method} ${path}`);
};

const handle = async (deps: ServerDeps, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
  try {
    const { status, body } = await route(deps, req, new URL(req.url ?? "/", "http://localhost"));
    sendJson(res, status, body);
  } catch (err) {
    sendJson(res, statusForError(err), { status: "error", message: toErrorMessage(err) });
  }
};

/**
 * Thin control surface for the dashboard: scheduler lifecycle plus schedule CRUD.
 */
export const createServer = (deps: ServerDeps) =>
  http.createServer((req, res) => {
    void handle(deps, req, res);
  });

if (require.main === module) {
  const app = createSchedulerApp();
  const server = createServer(app);

  server.listen(app.env.PORT, () => {
    app.log.info({ event: "server.listening", url: `http://localhost:${app.env.PORT}` });
  });
}
