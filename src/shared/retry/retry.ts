import { sleep } from "../concurrency/sleep";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 2 means up to 3 total tries)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  /** Aborting gives up immediately with the last error instead of waiting out the backoff. */
  signal?: AbortSignal;
};

const normalizeDecision = (decision: RetryDecision): { retry: boolean; delayMs?: number } =>
  typeof decision === "boolean" ? { retry: decision } : decision;

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">,
  customDelayMs?: number
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const validCustomDelay =
    typeof customDelayMs === "number" && Number.isFinite(customDelayMs) && customDelayMs >= 0
      ? customDelayMs
      : undefined;
  const backoff =
    validCustomDelay != null
      ? Math.min(maxDelayMs, validCustomDelay)
      : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
  const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
  const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
  return backoff + Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, signal } = opts;
  const maxAttempts = retries + 1;

  // attempt=0 is first try, then up to retries extra
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = normalizeDecision(shouldRetry(err));
      if (attempt >= retries || !decision.retry || signal?.aborted) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const waitMs = computeBackoffMs(attempt, opts, decision.delayMs);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      const completed = await sleep(waitMs, signal);
      if (!completed) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }
    }
  }
};
