export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number;          // extra attempts after the first one
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryContext) => void;
  randomFn?: () => number;
  jitterRatio?: number;
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

const normalizeDecision = (decision: RetryDecision): { retry: boolean; delayMs?: number } =>
  typeof decision === "boolean" ? { retry: decision } : decision;

/**
 * Exponential backoff capped at `maxDelayMs`, or the server-provided delay when one
 * is given, plus up to `jitterRatio` of random jitter.
 */
export const computeRetryDelayMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio"> & { customDelayMs?: number }
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2, customDelayMs } = opts;
  const usableCustomDelay =
    typeof customDelayMs === "number" && Number.isFinite(customDelayMs) && customDelayMs >= 0
      ? customDelayMs
      : undefined;

  const backoff = Math.min(maxDelayMs, usableCustomDelay ?? minDelayMs * Math.pow(2, attempt));
  const jitter = Math.floor(backoff * clamp01(jitterRatio) * clamp01(randomFn()));
  return backoff + jitter;
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp } = opts;
  const maxAttempts = retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = normalizeDecision(shouldRetry(err));
      if (attempt >= retries || !decision.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const delayMs = computeRetryDelayMs(attempt, { ...opts, customDelayMs: decision.delayMs });
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
};
