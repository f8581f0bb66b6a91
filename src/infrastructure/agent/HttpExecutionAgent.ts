import { AgentExecutionError, toErrorMessage } from "../../core/errors";
import type { ExecutionAgent, ExecutionRequest, ExecutionResult } from "../../ports/ExecutionAgent";
import { createExecutionLog, type ExecutionLog } from "../../shared/logging/executionLog";
import { retry } from "../../shared/retry/retry";

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

/**
 * Only a refused connection is safe to retry: the request never reached the agent, so no
 * post can have been made.
 */
export const isConnectionRefused = (err: unknown): boolean => {
  if (!(err instanceof Error)) return false;
  if (isRecord(err.cause) && err.cause.code === "ECONNREFUSED") return true;
  return isRecord(err) && err.code === "ECONNREFUSED";
};

const readJsonBody = async (res: Response): Promise<unknown> => {
  const text = await res.text().catch(() => "");
  if (text.trim() === "") return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

export const parseExecutionResult = (body: unknown, jobId: string): ExecutionResult => {
  if (!isRecord(body) || typeof body.success !== "boolean") {
    throw new AgentExecutionError("Execution agent response is malformed", { jobId });
  }

  const result: ExecutionResult = { success: body.success };
  if (typeof body.errorMessage === "string") result.errorMessage = body.errorMessage;
  return result;
};

/**
 * Client for an automation agent reachable over HTTP (`POST {baseUrl}/executions`).
 * Uses native fetch (Node 20); the caller owns the overall timeout through `signal`.
 */
export class HttpExecutionAgent implements ExecutionAgent {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly log: ExecutionLog = createExecutionLog()
  ) {}

  async execute(request: ExecutionRequest, signal?: AbortSignal): Promise<ExecutionResult> {
    const url = new URL(this.baseUrl);
    url.pathname = url.pathname.endsWith("/") ? `${url.pathname}executions` : `${url.pathname}/executions`;
    const safeRequestUrl = `${url.origin}${url.pathname}`;

    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.apiKey) headers["X-API-Key"] = this.apiKey;

    const doPost = async (): Promise<ExecutionResult> => {
      const res = await fetch(url.toString(), {
        method: "POST",
        headers,
        body: JSON.stringify(request),
        signal
      });

      const body = await readJsonBody(res);
      if (!res.ok) {
        const message = isRecord(body) && typeof body.errorMessage === "string" && body.errorMessage.trim() !== ""
          ? body.errorMessage
          : `Execution agent request failed: ${res.status}`;
        throw new AgentExecutionError(message, { jobId: request.jobId, status: res.status });
      }

      return parseExecutionResult(body, request.jobId);
    };

    try {
      return await retry(doPost, {
        retries: 3,
        minDelayMs: 500,
        maxDelayMs: 5000,
        signal,
        shouldRetry: isConnectionRefused,
        onRetry: ({ attempt, maxAttempts, delayMs }) => {
          this.log.warn({ event: "agent.retry", url: safeRequestUrl, jobId: request.jobId, attempt, maxAttempts, delayMs });
        }
      });
    } catch (err) {
      if (err instanceof AgentExecutionError) throw err;
      if (signal?.aborted) {
        throw new AgentExecutionError("Execution agent request was aborted", { jobId: request.jobId }, err);
      }
      throw new AgentExecutionError(`Execution agent unreachable: ${toErrorMessage(err)}`, { jobId: request.jobId }, err);
    }
  }
}
